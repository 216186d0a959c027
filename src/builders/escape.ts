import { validate as isUuid } from 'uuid';
import { InvalidUuidError, UnsupportedTypeError } from '../errors.js';

/** A UUID to be written as an SQL literal. The text is validated and lowercased. */
export class Uuid {
  readonly text: string;

  constructor(text: string) {
    if (!isUuid(text)) {
      throw new InvalidUuidError(text);
    }
    this.text = text.toLowerCase();
  }

  toString(): string {
    return this.text;
  }
}

function typeName(value: unknown): string {
  if (typeof value !== 'object' || value === null) return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'object';
}

/**
 * Renders a value as SQL literal text rather than a bind parameter.
 *
 * Strings are single-quoted with embedded quotes doubled, numbers and bigints
 * are written in decimal, `null`/`undefined` become `NULL` and arrays become
 * `ARRAY[...]` of their escaped elements.
 *
 * @throws UnsupportedTypeError for NaN, infinities and any other type
 */
export function escape(value: unknown): string {
  if (typeof value === 'string') {
    return `'${value.replaceAll("'", "''")}'`;
  }
  if (typeof value === 'number') {
    if (Number.isNaN(value)) {
      throw new UnsupportedTypeError('number', "Can't escape NaN");
    }
    if (!Number.isFinite(value)) {
      throw new UnsupportedTypeError('number', "Can't escape an infinite number");
    }
    return String(value);
  }
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Uuid) return `'${value.text}'::UUID`;
  if (Array.isArray(value)) {
    const elements: unknown[] = value;
    return `ARRAY[${elements.map((element) => escape(element)).join(', ')}]`;
  }
  throw new UnsupportedTypeError(typeName(value));
}
