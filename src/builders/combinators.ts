import { Fragment } from '../fragment/fragment.js';
import { joinParts, literalPart } from '../fragment/parts.js';

/** Comma-separated, unwrapped. Empty input gives an empty fragment. */
export function list(fragments: Iterable<Fragment>): Fragment {
  return new Fragment(joinParts(fragments, [literalPart(', ')]));
}

function conjunction(fragments: Iterable<Fragment>, op: 'AND' | 'OR', empty: 'TRUE' | 'FALSE'): Fragment {
  const items = [...fragments];
  if (items.length === 0) {
    return new Fragment([literalPart(empty)]);
  }
  return new Fragment(
    joinParts(items, [literalPart(`) ${op} (`)], [literalPart('(')], [literalPart(')')]),
  );
}

/** `(a) AND (b) AND ...`; `TRUE` when there is nothing to combine. */
export function all(fragments: Iterable<Fragment>): Fragment {
  return conjunction(fragments, 'AND', 'TRUE');
}

/** `(a) OR (b) OR ...`; `FALSE` when there is nothing to combine. */
export function any(fragments: Iterable<Fragment>): Fragment {
  return conjunction(fragments, 'OR', 'FALSE');
}
