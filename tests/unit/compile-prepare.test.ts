import { describe, it, expect, vi } from 'vitest';
import { sql } from '../../src/sql.js';
import { compileShape, prepareShape } from '../../src/fragment/compile.js';
import { CompositionError, UnfilledSlotError, UnsupportedTypeError } from '../../src/errors.js';

describe('compileShape', () => {
  it('splits fixed runs around slots and indexes names once', () => {
    const f = sql.named('a {x} b {} {y} {x}', { }, 1);
    const shape = compileShape(f.parts);
    expect(shape.names).toEqual(['x', 'y']);
    expect(shape.steps.map((s) => s.slot)).toEqual([0, 1, 0]);
    expect(shape.steps[0]!.before).toEqual([{ kind: 'literal', text: 'a ' }]);
    expect(shape.tail).toEqual([]);
  });
});

describe('Fragment.compile()', () => {
  const byStatus = sql('SELECT * FROM tickets WHERE status = {status} AND owner = {owner}').compile();

  it('fills slots at their positions', () => {
    expect(byStatus({ status: 'open', owner: 'ana' }).query()).toEqual({
      text: 'SELECT * FROM tickets WHERE status = $1 AND owner = $2',
      values: ['open', 'ana'],
    });
  });

  it('can be called repeatedly with independent values', () => {
    const first = byStatus({ status: 'open', owner: 'ana' });
    const second = byStatus({ status: 'closed', owner: 'bo' });
    expect(first.query().values).toEqual(['open', 'ana']);
    expect(second.query().values).toEqual(['closed', 'bo']);
  });

  it('splices fragment values', () => {
    const compiled = sql('SELECT {cols} FROM t WHERE {cond}').compile();
    const f = compiled({ cols: sql.list([sql.identifier('a'), sql.identifier('b')]), cond: sql('a > {}', 3) });
    expect(f.query()).toEqual({ text: 'SELECT "a", "b" FROM t WHERE a > $1', values: [3] });
  });

  it('keeps bound values from the source fragment', () => {
    const compiled = sql.named('{a} {b}', { a: 'A' }).compile();
    expect(compiled({ b: 'B' }).query()).toEqual({ text: '$1 $2', values: ['A', 'B'] });
  });

  it('leaves missing names open for a later fill', () => {
    const compiled = sql('{a} {b}').compile();
    const partial = compiled({ a: 1 });
    expect(partial.slots()).toEqual(['b']);
    expect(partial.fill({ b: 2 }).query()).toEqual({ text: '$1 $2', values: [1, 2] });
  });

  it('a repeated name shares one value', () => {
    expect(sql('{a} {a}').compile()({ a: 9 }).query()).toEqual({ text: '$1 $1', values: [9] });
  });

  it('reports unused names', () => {
    const onUnusedName = vi.fn();
    sql('{a}').compile()({ a: 1, b: 2 }, { onUnusedName });
    expect(onUnusedName).toHaveBeenCalledOnce();
    expect(onUnusedName).toHaveBeenCalledWith('b');
  });
});

describe('prepareShape', () => {
  it('reserves one index per placeholder and per slot name', () => {
    const shape = prepareShape(sql.named('{} {s} {t} {s}', {}, 'fixed').parts);
    expect(shape.text).toBe('$1 $2 $3 $2');
    expect(shape.slots).toEqual([
      { name: 's', index: 1 },
      { name: 't', index: 2 },
    ]);
    expect(shape.baked).toEqual(['fixed', undefined, undefined]);
  });
});

describe('Fragment.prepare()', () => {
  const prepared = sql.named(
    'UPDATE t SET a = {a}, b = {b} WHERE id = {id} AND tenant = {tenant}',
    { tenant: 'acme' },
  ).prepare();

  it('renders the text once with reserved slot markers', () => {
    expect(prepared.text).toBe('UPDATE t SET a = $1, b = $2 WHERE id = $3 AND tenant = $4');
    expect(prepared.slots).toEqual(['a', 'b', 'id']);
  });

  it('binds values to fixed positions whatever the key order', () => {
    expect(prepared.bind({ id: 7, b: 'B', a: 'A' })).toEqual(['A', 'B', 7, 'acme']);
    expect(prepared.bind({ a: 1, id: 2, b: 3 })).toEqual([1, 3, 2, 'acme']);
  });

  it('text does not change between calls', () => {
    prepared.bind({ a: 1, b: 2, id: 3 });
    expect(prepared.text).toBe('UPDATE t SET a = $1, b = $2 WHERE id = $3 AND tenant = $4');
  });

  it('missing names throw UnfilledSlotError naming the first', () => {
    try {
      prepared.bind({ a: 1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnfilledSlotError);
      if (err instanceof UnfilledSlotError) expect(err.slotName).toBe('b');
    }
  });

  it('fragment values throw CompositionError', () => {
    const bindFragment = () => prepared.bind({ a: sql('now()'), b: 1, id: 2 });
    expect(bindFragment).toThrow(CompositionError);
    expect(bindFragment).toThrow(UnsupportedTypeError);
  });

  it('a repeated slot takes one position', () => {
    const p = sql('{x} < {y} AND {y} < {z}').prepare();
    expect(p.text).toBe('$1 < $2 AND $2 < $3');
    expect(p.bind({ x: 1, y: 2, z: 3 })).toEqual([1, 2, 3]);
  });

  it('a fragment with no slots binds its own values', () => {
    const p = sql('x = {}', 1).prepare();
    expect(p.bind()).toEqual([1]);
  });

  it('builds pg query configs, named when asked', () => {
    const p = sql('SELECT * FROM t WHERE id = {id}').prepare();
    expect(p.toQueryConfig({ id: 4 })).toEqual({ text: 'SELECT * FROM t WHERE id = $1', values: [4] });
    expect(p.toQueryConfig({ id: 4 }, 'ticket-by-id')).toEqual({
      name: 'ticket-by-id',
      text: 'SELECT * FROM t WHERE id = $1',
      values: [4],
    });
  });

  it('reports unused names', () => {
    const onUnusedName = vi.fn();
    sql('{a}').prepare().bind({ a: 1, zz: 0 }, { onUnusedName });
    expect(onUnusedName.mock.calls).toEqual([['zz']]);
  });
});

describe('fill, compile and prepare agree', () => {
  const cases = [
    { template: 'SELECT {a}', named: {}, args: [], values: { a: 1 } },
    { template: '{} {a} {} {b} {a}', named: {}, args: ['p', 'q'], values: { a: 'A', b: 'B' } },
    { template: '{k} = {v} OR {v} IS NULL', named: { k: 'key' }, args: [], values: { v: null } },
    { template: '{} AND {x}', named: {}, args: [sql('y IN ({}, {})', 1, 2)], values: { x: true } },
  ];

  it.each(cases)('$template', ({ template, named, args, values }) => {
    const f = sql.named(template, named, ...args);
    const filled = f.fill(values).query();
    const compiled = f.compile()(values).query();
    const prepared = f.prepare();
    expect(compiled).toEqual(filled);
    expect({ text: prepared.text, values: prepared.bind(values) }).toEqual(filled);
  });
});

describe('fill and compile agree on fragment values', () => {
  const cases = [
    { template: 'WHERE {cond}', values: { cond: sql('x = {x}'), x: 3 } },
    { template: '{a} AND {cond}', values: { a: 1, cond: sql('{a} < {b}'), b: 2 } },
    { template: 'x = {a}', values: { a: sql.slot('a') } },
    { template: '{a}', values: { a: sql('a{b}'), b: sql('b{a}') } },
  ];

  it.each(cases)('$template', ({ template, values }) => {
    const f = sql(template);
    const filled = f.fill(values);
    const compiled = f.compile()(values);
    expect(compiled.slots()).toEqual(filled.slots());
    if (filled.slots().length === 0) {
      expect(compiled.query()).toEqual(filled.query());
    } else {
      expect(compiled.parts).toEqual(filled.parts);
    }
  });

  it('a fully filled result prepares to the same query', () => {
    const filled = sql('WHERE {cond}').fill({ cond: sql('x = {x}'), x: 3 });
    const prepared = filled.prepare();
    expect({ text: prepared.text, values: prepared.bind() }).toEqual(filled.query());
    expect(filled.query()).toEqual({ text: 'WHERE x = $1', values: [3] });
  });
});
