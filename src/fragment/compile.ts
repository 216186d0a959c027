import type { FillOptions, Part, PlaceholderPart, SlotValues } from '../types.js';
import { CompositionError, UnfilledSlotError } from '../errors.js';
import { appendAll, isFragment, mergeLiterals, reportUnusedNames } from './parts.js';
import { createFillContext, namedValueParts } from './fill.js';

interface CompiledStep {
  /** Fixed parts emitted before the slot. */
  before: readonly Part[];
  /** Index into the distinct slot names. */
  slot: number;
  /** The slot itself, emitted when no value is supplied. */
  open: readonly Part[];
}

export interface CompiledShape {
  readonly names: readonly string[];
  readonly steps: readonly CompiledStep[];
  readonly tail: readonly Part[];
}

export type CompiledParts = (values?: SlotValues, options?: FillOptions) => Part[];

/**
 * Splits flattened parts into fixed runs separated by slot positions, with
 * each slot name mapped to an integer once.
 */
export function compileShape(parts: readonly Part[]): CompiledShape {
  const names: string[] = [];
  const indexOf = new Map<string, number>();
  const openByName = new Map<string, readonly Part[]>();
  const steps: CompiledStep[] = [];
  let run: Part[] = [];

  for (const part of mergeLiterals(parts)) {
    if (part.kind !== 'slot') {
      run.push(part);
      continue;
    }
    let slot = indexOf.get(part.name);
    let open = openByName.get(part.name);
    if (slot === undefined || open === undefined) {
      slot = names.length;
      open = [part];
      names.push(part.name);
      indexOf.set(part.name, slot);
      openByName.set(part.name, open);
    }
    steps.push({ before: run, slot, open });
    run = [];
  }

  return { names, steps, tail: run };
}

/**
 * Compiles parts into a function that fills slots at their precomputed
 * positions. Each distinct name is looked up once per call; names left out
 * keep their slots open. Fragment values are filled from the same values,
 * as `fill` does.
 */
export function compileParts(parts: readonly Part[]): CompiledParts {
  const { names, steps, tail } = compileShape(parts);

  return (values = {}, options = {}) => {
    const ctx = createFillContext(values);
    const resolved = names.map((name) =>
      Object.hasOwn(values, name) ? namedValueParts(ctx, name) : undefined,
    );
    const out: Part[] = [];
    for (const step of steps) {
      appendAll(out, step.before);
      appendAll(out, resolved[step.slot] ?? step.open);
    }
    appendAll(out, tail);
    reportUnusedNames(values, (name) => ctx.used.has(name), options.onUnusedName);
    return out;
  };
}

interface PreparedSlot {
  name: string;
  /** Zero-based position in the bind value list. */
  index: number;
}

export interface PreparedShape {
  readonly text: string;
  readonly slots: readonly PreparedSlot[];
  /** Values of bound placeholders at their fixed positions; slot positions are holes. */
  readonly baked: readonly unknown[];
  readonly slotNames: ReadonlySet<string>;
}

/**
 * Renders parts once, reserving a fixed `$n` for every distinct placeholder
 * and every distinct slot name in encounter order.
 */
export function prepareShape(parts: readonly Part[]): PreparedShape {
  let text = '';
  const baked: unknown[] = [];
  const slots: PreparedSlot[] = [];
  const placeholderIndex = new Map<PlaceholderPart, number>();
  const slotIndex = new Map<string, number>();

  for (const part of parts) {
    if (part.kind === 'literal') {
      text += part.text;
      continue;
    }
    let index = part.kind === 'placeholder' ? placeholderIndex.get(part) : slotIndex.get(part.name);
    if (index === undefined) {
      index = baked.length;
      if (part.kind === 'placeholder') {
        baked.push(part.value);
        placeholderIndex.set(part, index);
      } else {
        baked.push(undefined);
        slots.push({ name: part.name, index });
        slotIndex.set(part.name, index);
      }
    }
    text += `$${index + 1}`;
  }

  return { text, slots, baked, slotNames: new Set(slotIndex.keys()) };
}

/**
 * Produces the full bind value list for a prepared shape. Every slot must be
 * supplied with a plain value; a fragment cannot change text whose markers
 * are already fixed.
 */
export function bindPrepared(
  shape: PreparedShape,
  values: SlotValues,
  options: FillOptions = {},
): unknown[] {
  const out = shape.baked.slice();
  for (const slot of shape.slots) {
    if (!Object.hasOwn(values, slot.name)) {
      throw new UnfilledSlotError(slot.name);
    }
    const value = values[slot.name];
    if (isFragment(value)) {
      throw new CompositionError(slot.name);
    }
    out[slot.index] = value;
  }
  reportUnusedNames(values, (name) => shape.slotNames.has(name), options.onUnusedName);
  return out;
}
