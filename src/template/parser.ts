import { ArityError, TemplateSyntaxError } from '../errors.js';

export type TemplateToken =
  | { kind: 'literal'; text: string }
  | { kind: 'positional'; index: number }
  | { kind: 'named'; name: string };

export interface ParsedTemplate {
  tokens: TemplateToken[];
  positionalCount: number;
}

export const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Splits a template into literal runs and markers, left to right.
 *
 * `{{` and `}}` are literal braces, `{}` takes the next positional argument
 * and `{name}` refers to a named argument or, failing that, an open slot.
 * Adjacent literal runs are merged.
 */
export function tokenize(template: string): ParsedTemplate {
  const tokens: TemplateToken[] = [];
  let positionalCount = 0;
  let literal = '';
  let i = 0;

  const flushLiteral = (): void => {
    if (literal !== '') {
      tokens.push({ kind: 'literal', text: literal });
      literal = '';
    }
  };

  while (i < template.length) {
    const ch = template.charAt(i);

    if (ch === '}') {
      if (template[i + 1] !== '}') {
        throw new TemplateSyntaxError(template, i, `Single '}' at offset ${i}; write '}}' for a literal brace`);
      }
      literal += '}';
      i += 2;
      continue;
    }

    if (ch !== '{') {
      literal += ch;
      i += 1;
      continue;
    }

    if (template[i + 1] === '{') {
      literal += '{';
      i += 2;
      continue;
    }

    const close = template.indexOf('}', i + 1);
    if (close === -1) {
      throw new TemplateSyntaxError(template, i, `Unterminated marker at offset ${i}`);
    }
    const name = template.slice(i + 1, close);
    flushLiteral();
    if (name === '') {
      tokens.push({ kind: 'positional', index: positionalCount });
      positionalCount += 1;
    } else if (NAME_PATTERN.test(name)) {
      tokens.push({ kind: 'named', name });
    } else {
      throw new TemplateSyntaxError(template, i, `Invalid marker name ${JSON.stringify(name)} at offset ${i}`);
    }
    i = close + 1;
  }

  flushLiteral();
  return { tokens, positionalCount };
}

/**
 * Tokenizes a template and checks that exactly `argCount` positional
 * arguments were supplied for its `{}` markers.
 */
export function parseTemplate(template: string, argCount: number): TemplateToken[] {
  const { tokens, positionalCount } = tokenize(template);
  if (positionalCount !== argCount) {
    throw new ArityError(
      positionalCount,
      argCount,
      `Template has ${positionalCount} positional marker(s) but ${argCount} argument(s) were supplied`,
    );
  }
  return tokens;
}
