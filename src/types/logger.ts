/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured fields appended to a log line as JSON.
 */
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/**
 * Logger with bound context, merged under each call's meta.
 * Contexts nest: withContext(a).withContext(b) carries both.
 */
export interface ContextLogger extends Logger {
  withContext(context: LogMeta): ContextLogger;
}
