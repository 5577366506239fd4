/**
 * Shapes of the engine's buffered log entries, as returned by getLogBuffer().
 */

/** Log severity level */
export const DiagLogLevel = {
  Info: 'info',
  Warn: 'warn',
  Error: 'error',
} as const;
export type DiagLogLevel = (typeof DiagLogLevel)[keyof typeof DiagLogLevel];

export interface DiagLogEntry {
  /** ISO 8601 */
  readonly timestamp: string;
  readonly level: DiagLogLevel;
  /** Module that logged it: "rule-table", "predefined-rules" or "apply-rules" */
  readonly tag: string;
  readonly message: string;
}
