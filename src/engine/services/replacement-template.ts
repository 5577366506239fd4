/**
 * Replacement template parsing and expansion.
 *
 * Syntax:
 *   $$            literal "$"
 *   $& or $0      whole match
 *   $1 .. $99     positional group (at most two digits, greedy)
 *   ${n} ${name}  positional or named group
 *   $<name>       named group
 *
 * Any other "$" is literal. A group that is missing from the pattern or did
 * not take part in the match expands to "".
 */

export type TemplatePart =
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'match' }
  | { readonly type: 'index'; readonly index: number }
  | { readonly type: 'name'; readonly name: string };

export interface ReplacementTemplate {
  readonly source: string;
  readonly parts: readonly TemplatePart[];
}

const GROUP_NAME = /^[\p{ID_Start}_$][\p{ID_Continue}_$\u200C\u200D]*$/u;
const GROUP_INDEX = /^\d+$/;

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function referencePart(ref: string): TemplatePart | null {
  if (GROUP_INDEX.test(ref)) {
    const index = Number(ref);
    return index === 0 ? { type: 'match' } : { type: 'index', index };
  }
  if (GROUP_NAME.test(ref)) return { type: 'name', name: ref };
  return null;
}

export function parseReplacementTemplate(source: string): ReplacementTemplate {
  const parts: TemplatePart[] = [];
  let text = '';

  const flush = (): void => {
    if (text.length > 0) {
      parts.push({ type: 'text', value: text });
      text = '';
    }
  };
  const pushRef = (part: TemplatePart): void => {
    flush();
    parts.push(part);
  };

  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (ch !== '$') {
      text += ch;
      i++;
      continue;
    }

    const next = source.charAt(i + 1);
    if (next === '$') {
      text += '$';
      i += 2;
      continue;
    }
    if (next === '&') {
      pushRef({ type: 'match' });
      i += 2;
      continue;
    }
    if (isDigit(next)) {
      const end = isDigit(source[i + 2]) ? i + 3 : i + 2;
      const part = referencePart(source.slice(i + 1, end));
      if (part !== null) pushRef(part);
      i = end;
      continue;
    }
    if (next === '{' || next === '<') {
      const close = source.indexOf(next === '{' ? '}' : '>', i + 2);
      const part = close > i + 2 ? referencePart(source.slice(i + 2, close)) : null;
      if (part !== null) {
        pushRef(part);
        i = close + 1;
        continue;
      }
    }

    text += '$';
    i++;
  }
  flush();

  return { source, parts };
}

/**
 * Expand a parsed template against one match.
 */
export function expandTemplate(template: ReplacementTemplate, match: RegExpMatchArray): string {
  let out = '';
  for (const part of template.parts) {
    switch (part.type) {
      case 'text':
        out += part.value;
        break;
      case 'match':
        out += match[0] ?? '';
        break;
      case 'index':
        out += match[part.index] ?? '';
        break;
      case 'name':
        out += match.groups?.[part.name] ?? '';
        break;
      default: {
        const _never: never = part;
        return out;
      }
    }
  }
  return out;
}
