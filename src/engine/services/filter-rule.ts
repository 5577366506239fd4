/**
 * A single pattern -> replacement rule.
 * The pattern is compiled when the rule is created; a rule that exists is
 * always applicable.
 */
import type { PatternInput, PatternSpec } from '@shared/filter-rule';
import { PatternKind } from '@shared/filter-rule';
import { InvalidPatternError } from './invalid-pattern';
import {
  expandTemplate,
  parseReplacementTemplate,
  type ReplacementTemplate,
} from './replacement-template';

export type FilterRuleResult =
  | { readonly ok: true; readonly rule: FilterRule }
  | { readonly ok: false; readonly error: InvalidPatternError };

/** Escape regex metacharacters so the text matches itself */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizePattern(input: PatternInput): PatternSpec {
  if (typeof input === 'string') {
    return { kind: PatternKind.Regex, source: input };
  }
  if (input instanceof RegExp) {
    return { kind: PatternKind.Regex, source: input.source, flags: input.flags };
  }
  return input;
}

function compilePattern(spec: PatternSpec): RegExp {
  if (spec.kind === PatternKind.Literal) {
    return new RegExp(escapeRegExp(spec.text), spec.ignoreCase === true ? 'gi' : 'g');
  }

  const flags = (spec.flags ?? '').replaceAll('g', '');
  if (flags.includes('y')) {
    throw new InvalidPatternError(spec.source, flags, 'sticky flag "y" is not supported');
  }
  try {
    return new RegExp(spec.source, `${flags}g`);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidPatternError(spec.source, flags, reason, err);
  }
}

export class FilterRule {
  readonly pattern: PatternSpec;
  readonly replacement: string;
  private readonly regex: RegExp;
  private readonly template: ReplacementTemplate;

  private constructor(pattern: PatternSpec, regex: RegExp, replacement: string) {
    this.pattern = Object.freeze({ ...pattern });
    this.replacement = replacement;
    this.regex = regex;
    this.template = parseReplacementTemplate(replacement);
    Object.freeze(this);
  }

  /**
   * Compile a rule.
   * @throws InvalidPatternError when the pattern does not compile
   */
  static create(pattern: PatternInput, replacement = ''): FilterRule {
    const spec = normalizePattern(pattern);
    return new FilterRule(spec, compilePattern(spec), replacement);
  }

  /**
   * Replace every non-overlapping match, left to right.
   * Returns the input itself when nothing matches.
   */
  apply(text: string): string {
    let result = '';
    let last = 0;
    let matched = false;
    // matchAll clones the regex, so lastIndex on the shared instance is never touched
    for (const match of text.matchAll(this.regex)) {
      const start = match.index ?? last;
      result += text.slice(last, start) + expandTemplate(this.template, match);
      last = start + (match[0] ?? '').length;
      matched = true;
    }
    return matched ? result + text.slice(last) : text;
  }

  toString(): string {
    return `${String(this.regex)} -> ${JSON.stringify(this.replacement)}`;
  }
}

/**
 * Non-throwing form of {@link FilterRule.create}.
 */
export function compileFilterRule(pattern: PatternInput, replacement = ''): FilterRuleResult {
  try {
    return { ok: true, rule: FilterRule.create(pattern, replacement) };
  } catch (err) {
    if (err instanceof InvalidPatternError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
