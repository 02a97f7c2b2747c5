export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Structured fields attached to a log line */
export type LogData = Record<string, unknown>;

/**
 * Logging port. Components take a child bound to `{ component }`; per-turn lines add `sessionId`.
 * Errors travel in their own argument so the adapter can serialize stack and cause.
 */
export interface ILogger {
  trace(message: string, data?: LogData): void;
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, error?: unknown, data?: LogData): void;
  fatal(message: string, error?: unknown, data?: LogData): void;
  child(bindings: LogData): ILogger;
}
