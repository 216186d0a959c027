import type { FillOptions, Part, PlaceholderPart, SlotValues } from '../types.js';
import { appendAll, isFragment, placeholderPart, reportUnusedNames } from './parts.js';

/**
 * State shared by one fill across nested fragment values, so that a name
 * binds one placeholder wherever it is reached.
 */
export interface FillContext {
  readonly values: SlotValues;
  readonly placeholders: Map<string, PlaceholderPart>;
  /** Names that replaced at least one slot. */
  readonly used: Set<string>;
}

const NOT_EXPANDING: ReadonlySet<string> = new Set();

export function createFillContext(values: SlotValues): FillContext {
  return { values, placeholders: new Map(), used: new Set() };
}

/**
 * Parts for the supplied value of `name`. A fragment value is itself filled
 * from the same values; slots named in `expanding` (the value's own name
 * among them) stay open so a self-referencing value cannot recurse.
 */
export function namedValueParts(
  ctx: FillContext,
  name: string,
  expanding: ReadonlySet<string> = NOT_EXPANDING,
): Part[] {
  ctx.used.add(name);
  const value = ctx.values[name];
  if (isFragment(value)) {
    const out: Part[] = [];
    fillInto(ctx, out, value.parts, new Set(expanding).add(name));
    return out;
  }
  let placeholder = ctx.placeholders.get(name);
  if (placeholder === undefined) {
    placeholder = placeholderPart(value);
    ctx.placeholders.set(name, placeholder);
  }
  return [placeholder];
}

function fillInto(
  ctx: FillContext,
  out: Part[],
  parts: readonly Part[],
  expanding: ReadonlySet<string>,
): void {
  for (const part of parts) {
    if (part.kind === 'slot' && Object.hasOwn(ctx.values, part.name) && !expanding.has(part.name)) {
      appendAll(out, namedValueParts(ctx, part.name, expanding));
    } else {
      out.push(part);
    }
  }
}

/**
 * Replaces every slot whose name is an own key of `values`, including slots
 * brought in by fragment values. Slots without a value stay open; keys that
 * match no slot change nothing.
 */
export function fillParts(
  parts: readonly Part[],
  values: SlotValues,
  options: FillOptions = {},
): Part[] {
  const ctx = createFillContext(values);
  const out: Part[] = [];
  fillInto(ctx, out, parts, NOT_EXPANDING);
  reportUnusedNames(values, (name) => ctx.used.has(name), options.onUnusedName);
  return out;
}
