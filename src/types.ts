import type { QueryConfig } from 'pg';

export interface LiteralPart {
  readonly kind: 'literal';
  readonly text: string;
}

/**
 * A bound value. Identity is significant: the same Placeholder object
 * rendered twice gets one `$n` and contributes its value once.
 */
export interface PlaceholderPart {
  readonly kind: 'placeholder';
  readonly value: unknown;
}

export interface SlotPart {
  readonly kind: 'slot';
  readonly name: string;
}

export type Part = LiteralPart | PlaceholderPart | SlotPart;

/** Named values for markers, slots, compiled and prepared calls. Own properties only. */
export type SlotValues = Readonly<Record<string, unknown>>;

export interface FillOptions {
  /** Called once per supplied name that matched no outstanding slot. */
  onUnusedName?: (name: string) => void;
}

/**
 * Final query text plus its bind values, in the shape pg's `client.query()`
 * accepts directly.
 */
export interface RenderedQuery extends QueryConfig<unknown[]> {
  text: string;
  values: unknown[];
}
