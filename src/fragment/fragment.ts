import type { FillOptions, Part, RenderedQuery, SlotValues } from '../types.js';
import { FRAGMENT, joinParts, mergeLiterals, type FragmentLike } from './parts.js';
import { renderParts, slotNames } from './render.js';
import { fillParts } from './fill.js';
import { bindPrepared, compileParts, prepareShape } from './compile.js';

/** Result of {@link Fragment.compile}: fills slots at precomputed positions. */
export type CompiledFragment = (values?: SlotValues, options?: FillOptions) => Fragment;

/** Result of {@link Fragment.prepare}. */
export interface PreparedQuery {
  /** Final query text; slot markers are reserved and never move. */
  readonly text: string;
  /** Outstanding slot names, in the order of their markers. */
  readonly slots: readonly string[];
  /** Full bind value list for one set of slot values. */
  bind(values?: SlotValues, options?: FillOptions): unknown[];
  /**
   * Query config for pg. With a `name`, pg parses the statement once per
   * connection and reuses it.
   */
  toQueryConfig(values?: SlotValues, name?: string): RenderedQuery;
}

/**
 * Immutable SQL text plus bound values and open slots.
 *
 * A fragment never contains another fragment: nested fragments are spliced
 * in when they are supplied, so a fragment can be shared between any number
 * of parents.
 */
export class Fragment implements FragmentLike, Iterable<unknown> {
  readonly [FRAGMENT] = true as const;
  readonly parts: readonly Part[];

  /** Takes ownership of `parts` and freezes it. */
  constructor(parts: Part[]) {
    this.parts = Object.freeze(parts);
    Object.freeze(this);
  }

  /** Renders to `{ text, values }`; throws UnfilledSlotError on the first open slot. */
  query(): RenderedQuery {
    return renderParts(this.parts);
  }

  /** Yields the query text, then each bind value, for drivers taking a flat argument list. */
  *[Symbol.iterator](): Iterator<unknown> {
    const { text, values } = this.query();
    yield text;
    yield* values;
  }

  /** Same fragment with adjacent literal text merged. */
  flatten(): Fragment {
    return new Fragment(mergeLiterals(this.parts));
  }

  /** Distinct open slot names in first-occurrence order. */
  slots(): string[] {
    return slotNames(this.parts);
  }

  /**
   * Resolves the slots named in `values`. Fragment values are filled from
   * the same values and spliced, anything else is bound. Slots without a
   * value stay open; names that match no slot are ignored.
   */
  fill(values: SlotValues, options?: FillOptions): Fragment {
    return new Fragment(fillParts(this.parts, values, options));
  }

  /**
   * Precomputes the fixed parts and slot positions so repeated fills only
   * touch the slots.
   *
   * @example
   * const byId = sql('SELECT * FROM orders WHERE id = {id}').compile();
   * byId({ id: 7 }).query(); // { text: 'SELECT * FROM orders WHERE id = $1', values: [7] }
   */
  compile(): CompiledFragment {
    const fillCompiled = compileParts(this.parts);
    return (values, options) => new Fragment(fillCompiled(values, options));
  }

  /**
   * Renders the text once with a fixed marker for every bound value and every
   * open slot. Binding then only assembles the value list; slot values must
   * be plain values, never fragments.
   */
  prepare(): PreparedQuery {
    const shape = prepareShape(this.parts);
    const slots = Object.freeze(shape.slots.map((slot) => slot.name));
    return Object.freeze({
      text: shape.text,
      slots,
      bind: (values: SlotValues = {}, options?: FillOptions) => bindPrepared(shape, values, options),
      toQueryConfig: (values: SlotValues = {}, name?: string): RenderedQuery => ({
        text: shape.text,
        values: bindPrepared(shape, values),
        ...(name !== undefined ? { name } : {}),
      }),
    });
  }

  /** Joins `fragments` with this fragment between each consecutive pair. */
  join(fragments: Iterable<Fragment>): Fragment {
    return new Fragment(joinParts(fragments, this.parts));
  }
}
