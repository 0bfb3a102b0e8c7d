/**
 * Micro-logger: console output with level filtering
 *
 * Lines look like:
 *   [2024-05-01T10:00:00.000Z] [WARN] Sample row skipped {"file":"s1.tsv","row":3}
 *
 * Level comes from LOG_LEVEL (debug, info, warn, error), default info.
 */

import type { ContextLogger, LogLevel, LogMeta } from "@/types";
import { LOG_LEVELS } from "@/constants";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
const threshold = LOG_LEVELS[isLogLevel(envLevel) ? envLevel : "info"];

function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

function write(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < threshold) {
    return;
  }

  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function debug(message: string, meta?: LogMeta): void {
  write("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  write("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  write("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  write("error", message, meta);
}

/**
 * Bind context fields to every line of the returned logger.
 */
export function withContext(context: LogMeta): ContextLogger {
  const bind =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void =>
      write(level, message, { ...context, ...meta });

  return {
    debug: bind("debug"),
    info: bind("info"),
    warn: bind("warn"),
    error: bind("error"),
    withContext: (inner: LogMeta) => withContext({ ...context, ...inner }),
  };
}
