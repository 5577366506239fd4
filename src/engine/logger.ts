/**
 * Tagged logger for the engine.
 * Table compilation and pass-limit warnings land in an in-memory buffer the
 * embedding application can read; console echo can be switched off.
 */
import type { DiagLogEntry, DiagLogLevel } from '@shared/diagnostic';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: Error): void;
}

const LOG_BUFFER_MAX = 1000;
const logBuffer: DiagLogEntry[] = [];

let echo = true;

/**
 * Turn console output on or off. Entries are buffered either way.
 */
export function setLogEcho(enabled: boolean): void {
  echo = enabled;
}

function record(level: DiagLogLevel, tag: string, message: string): void {
  if (logBuffer.length >= LOG_BUFFER_MAX) {
    logBuffer.shift();
  }
  logBuffer.push({ timestamp: new Date().toISOString(), level, tag, message });
}

/** Buffered entries, oldest first. */
export function getLogBuffer(): readonly DiagLogEntry[] {
  return [...logBuffer];
}

export function clearLogBuffer(): void {
  logBuffer.length = 0;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info(message) {
      if (echo) console.error(`${prefix} INFO: ${message}`);
      record('info', tag, message);
    },
    warn(message) {
      if (echo) console.warn(`${prefix} WARN: ${message}`);
      record('warn', tag, message);
    },
    error(message, err) {
      const detail = err?.message;
      if (echo) console.error(`${prefix} ERROR: ${message}`, detail ?? '');
      record('error', tag, detail === undefined ? message : `${message} ${detail}`);
    },
  };
}
