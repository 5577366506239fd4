/**
 * Filter rule types.
 * A rule pairs a text pattern with a replacement template.
 */

export const PatternKind = {
  Regex: 'regex',
  Literal: 'literal',
} as const;
export type PatternKind = (typeof PatternKind)[keyof typeof PatternKind];

/** Regular expression pattern (JavaScript syntax, named groups allowed) */
export interface RegexPatternSpec {
  readonly kind: typeof PatternKind.Regex;
  readonly source: string;
  /** Extra flags; `g` is implied and `y` is rejected */
  readonly flags?: string | undefined;
}

/** Literal substring pattern */
export interface LiteralPatternSpec {
  readonly kind: typeof PatternKind.Literal;
  readonly text: string;
  readonly ignoreCase?: boolean | undefined;
}

export type PatternSpec = RegexPatternSpec | LiteralPatternSpec;

/**
 * Anything a rule can be built from.
 * A bare string is a regex source; a RegExp contributes its source and flags.
 */
export type PatternInput = PatternSpec | RegExp | string;

/** A single rule-table error */
export interface RuleTableError {
  /**
   * 1-based line number for text tables, 0-based definition index for
   * structured tables, -1 when the table as a whole is malformed
   */
  readonly position: number;
  readonly message: string;
}
