import type { Part, SlotValues } from '../types.js';
import type { TemplateToken } from '../template/parser.js';
import { appendAll, literalPart, partsForName, partsForValue, slotPart } from './parts.js';

/**
 * Binds parsed template tokens to their values.
 *
 * Positional markers take their argument; named markers take the named
 * value when one is supplied and otherwise become open slots. Fragment
 * values are spliced in place, unwrapped; anything else is bound as a
 * placeholder, shared by every occurrence of the same name.
 */
export function resolveTemplate(
  tokens: readonly TemplateToken[],
  positional: readonly unknown[],
  named: SlotValues,
): Part[] {
  const parts: Part[] = [];
  const byName = new Map<string, readonly Part[]>();

  for (const token of tokens) {
    switch (token.kind) {
      case 'literal':
        parts.push(literalPart(token.text));
        break;
      case 'positional':
        appendAll(parts, partsForValue(positional[token.index]));
        break;
      case 'named':
        if (Object.hasOwn(named, token.name)) {
          appendAll(parts, partsForName(byName, token.name, named[token.name]));
        } else {
          parts.push(slotPart(token.name));
        }
        break;
    }
  }

  return parts;
}
