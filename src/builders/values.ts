import type { Part } from '../types.js';
import { ArityError, TemplateSyntaxError } from '../errors.js';
import { Fragment } from '../fragment/fragment.js';
import { literalPart, placeholderPart, slotPart } from '../fragment/parts.js';
import { NAME_PATTERN } from '../template/parser.js';

/** Raw SQL text. The caller vouches for its safety; nothing is escaped. */
export function literal(text: string): Fragment {
  return new Fragment([literalPart(text)]);
}

/** A single bound value. */
export function value(v: unknown): Fragment {
  return new Fragment([placeholderPart(v)]);
}

/** A single open slot. */
export function slot(name: string): Fragment {
  if (!NAME_PATTERN.test(name)) {
    throw new TemplateSyntaxError(name, 0, `Invalid slot name ${JSON.stringify(name)}`);
  }
  return new Fragment([slotPart(name)]);
}

export function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

/**
 * A double-quoted identifier, optionally qualified: `"prefix"."name"`.
 * An empty prefix counts as none.
 */
export function identifier(name: string, prefix?: string): Fragment {
  const text = prefix ? `${quoteIdentifier(prefix)}.${quoteIdentifier(name)}` : quoteIdentifier(name);
  return new Fragment([literalPart(text)]);
}

/** Encodes a JSON column's values so they can travel as a text array. */
function encodeJsonColumn(values: readonly unknown[]): unknown[] {
  return values.map((v) => (v === null || v === undefined || typeof v === 'string' ? v : JSON.stringify(v)));
}

/**
 * `UNNEST($1::T1[], $2::T2[], ...)` over row-major data: column i binds the
 * i-th value of every row, in row order. Columns whose type is in `jsonTypes`
 * are sent JSON-encoded as `TEXT[]` and cast to their declared type.
 */
export function unnest(
  rows: Iterable<readonly unknown[]>,
  columnTypes: readonly string[],
  jsonTypes: ReadonlySet<string>,
): Fragment {
  const data = [...rows];
  data.forEach((row, rowIndex) => {
    if (row.length !== columnTypes.length) {
      throw new ArityError(
        columnTypes.length,
        row.length,
        `unnest: row ${rowIndex} has ${row.length} value(s) but ${columnTypes.length} column type(s) were given`,
      );
    }
  });

  const parts: Part[] = [literalPart('UNNEST(')];
  columnTypes.forEach((type, i) => {
    const column = data.map((row) => row[i]);
    const isJson = jsonTypes.has(type.toUpperCase());
    const separator = i < columnTypes.length - 1 ? ', ' : '';
    parts.push(placeholderPart(isJson ? encodeJsonColumn(column) : column));
    parts.push(literalPart(isJson ? `::TEXT[]::${type}[]${separator}` : `::${type}[]${separator}`));
  });
  parts.push(literalPart(')'));
  return new Fragment(parts);
}
