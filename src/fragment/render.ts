import type { Part, PlaceholderPart, RenderedQuery } from '../types.js';
import { UnfilledSlotError } from '../errors.js';

/**
 * Renders parts to query text with `$1`, `$2`, ... markers numbered in
 * emission order. A placeholder seen again keeps its first number. Throws
 * on the first open slot.
 */
export function renderParts(parts: readonly Part[]): RenderedQuery {
  let text = '';
  const values: unknown[] = [];
  const numbers = new Map<PlaceholderPart, number>();

  for (const part of parts) {
    if (part.kind === 'literal') {
      text += part.text;
    } else if (part.kind === 'placeholder') {
      let n = numbers.get(part);
      if (n === undefined) {
        values.push(part.value);
        n = values.length;
        numbers.set(part, n);
      }
      text += `$${n}`;
    } else {
      throw new UnfilledSlotError(part.name);
    }
  }

  return { text, values };
}

/** Distinct open slot names in first-occurrence order. */
export function slotNames(parts: readonly Part[]): string[] {
  const seen = new Set<string>();
  for (const part of parts) {
    if (part.kind === 'slot') seen.add(part.name);
  }
  return [...seen];
}
