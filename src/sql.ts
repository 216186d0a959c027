import type { SlotValues } from './types.js';
import { Fragment } from './fragment/fragment.js';
import { resolveTemplate } from './fragment/resolver.js';
import { parseTemplate } from './template/parser.js';
import { all, any, list } from './builders/combinators.js';
import { escape, Uuid } from './builders/escape.js';
import { identifier, literal, slot, unnest, value } from './builders/values.js';

export interface SqlConfig {
  /** Column types `unnest` sends JSON-encoded. Compared case-insensitively. */
  jsonTypes?: readonly string[];
}

interface ResolvedSqlConfig {
  jsonTypes: ReadonlySet<string>;
}

export interface SqlFormatter {
  /** Builds a fragment from a template whose `{}` markers take `args` in order. */
  (template: string, ...args: unknown[]): Fragment;
  /**
   * Like the plain call, but `{name}` markers take values from `named`.
   * Names not supplied become open slots.
   */
  named(template: string, named: SlotValues, ...args: unknown[]): Fragment;
  literal(text: string): Fragment;
  value(v: unknown): Fragment;
  slot(name: string): Fragment;
  identifier(name: string, prefix?: string): Fragment;
  /** The value written inline as an SQL literal, not as a bind parameter. */
  escape(v: unknown): Fragment;
  uuid(text: string): Uuid;
  list(fragments: Iterable<Fragment>): Fragment;
  all(fragments: Iterable<Fragment>): Fragment;
  any(fragments: Iterable<Fragment>): Fragment;
  unnest(rows: Iterable<readonly unknown[]>, columnTypes: readonly string[]): Fragment;
}

const DEFAULT_JSON_TYPES = ['JSON', 'JSONB'];

/**
 * Creates a formatter.
 *
 * @example
 * const sql = createSql({ jsonTypes: ['JSONB'] });
 * const where = sql.all([sql('status = {}', 'open'), sql.named('owner = {owner}', { owner: 'ana' })]);
 * sql('SELECT * FROM tickets WHERE {}', where).query();
 * // { text: 'SELECT * FROM tickets WHERE (status = $1) AND (owner = $2)', values: ['open', 'ana'] }
 */
export function createSql(config: SqlConfig = {}): SqlFormatter {
  const resolved: ResolvedSqlConfig = {
    jsonTypes: new Set((config.jsonTypes ?? DEFAULT_JSON_TYPES).map((t) => t.toUpperCase())),
  };

  const format = (template: string, ...args: unknown[]): Fragment =>
    new Fragment(resolveTemplate(parseTemplate(template, args.length), args, {}));

  return Object.assign(format, {
    named: (template: string, named: SlotValues, ...args: unknown[]): Fragment =>
      new Fragment(resolveTemplate(parseTemplate(template, args.length), args, named)),
    literal,
    value,
    slot,
    identifier,
    escape: (v: unknown): Fragment => literal(escape(v)),
    uuid: (text: string): Uuid => new Uuid(text),
    list,
    all,
    any,
    unnest: (rows: Iterable<readonly unknown[]>, columnTypes: readonly string[]): Fragment =>
      unnest(rows, columnTypes, resolved.jsonTypes),
  });
}

export const sql: SqlFormatter = createSql();
