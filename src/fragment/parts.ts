import type { LiteralPart, Part, PlaceholderPart, SlotPart } from '../types.js';

export const FRAGMENT = Symbol.for('sqlweave:fragment');

/**
 * Structural view of a Fragment used by the low-level passes, so they can
 * splice fragments without importing the class.
 */
export interface FragmentLike {
  readonly [FRAGMENT]: true;
  readonly parts: readonly Part[];
}

export function isFragment(value: unknown): value is FragmentLike {
  return typeof value === 'object' && value !== null && FRAGMENT in value;
}

export function literalPart(text: string): LiteralPart {
  const part: LiteralPart = { kind: 'literal', text };
  return Object.freeze(part);
}

export function placeholderPart(value: unknown): PlaceholderPart {
  const part: PlaceholderPart = { kind: 'placeholder', value };
  return Object.freeze(part);
}

export function slotPart(name: string): SlotPart {
  const part: SlotPart = { kind: 'slot', name };
  return Object.freeze(part);
}

/** Parts a single value contributes at a marker: a fragment's own parts, else one placeholder. */
export function partsForValue(value: unknown): readonly Part[] {
  return isFragment(value) ? value.parts : [placeholderPart(value)];
}

/**
 * Parts for a named value, memoised per name so that every occurrence of
 * the name shares one placeholder.
 */
export function partsForName(
  cache: Map<string, readonly Part[]>,
  name: string,
  value: unknown,
): readonly Part[] {
  let parts = cache.get(name);
  if (parts === undefined) {
    parts = partsForValue(value);
    cache.set(name, parts);
  }
  return parts;
}

/** Appends without spreading, which would overflow the call stack on very large fragments. */
export function appendAll(target: Part[], source: readonly Part[]): void {
  for (const part of source) {
    target.push(part);
  }
}

/** Joins fragments with `infix` between each pair, optionally bracketed by `prefix` and `suffix`. */
export function joinParts(
  fragments: Iterable<FragmentLike>,
  infix: readonly Part[],
  prefix: readonly Part[] = [],
  suffix: readonly Part[] = [],
): Part[] {
  const out: Part[] = [...prefix];
  let first = true;
  for (const fragment of fragments) {
    if (!first) appendAll(out, infix);
    appendAll(out, fragment.parts);
    first = false;
  }
  appendAll(out, suffix);
  return out;
}

/** Returns parts with adjacent literal runs merged into one. */
export function mergeLiterals(parts: readonly Part[]): Part[] {
  const out: Part[] = [];
  let pending: string | null = null;
  for (const part of parts) {
    if (part.kind === 'literal') {
      pending = (pending ?? '') + part.text;
      continue;
    }
    if (pending !== null) {
      if (pending !== '') out.push(literalPart(pending));
      pending = null;
    }
    out.push(part);
  }
  if (pending !== null && pending !== '') out.push(literalPart(pending));
  return out;
}

/** Calls `onUnusedName` for each own key of `values` that `isKnown` rejects. */
export function reportUnusedNames(
  values: Readonly<Record<string, unknown>>,
  isKnown: (name: string) => boolean,
  onUnusedName: ((name: string) => void) | undefined,
): void {
  if (onUnusedName === undefined) return;
  for (const name of Object.keys(values)) {
    if (!isKnown(name)) onUnusedName(name);
  }
}
