/**
 * Raised when a rule's pattern cannot be compiled.
 * This is the only error the rule engine produces.
 */
export class InvalidPatternError extends Error {
  override readonly name = 'InvalidPatternError';
  readonly source: string;
  readonly flags: string;
  readonly reason: string;

  constructor(source: string, flags: string, reason: string, cause?: unknown) {
    super(`Invalid pattern /${source}/${flags}: ${reason}`, { cause });
    this.source = source;
    this.flags = flags;
    this.reason = reason;
  }
}
