/**
 * Logging types.
 *
 * Six levels, most to least verbose:
 * - DEBUG: loaded state, decider inputs
 * - TRACE: timing (console.time / timeEnd)
 * - INFO: command started / succeeded
 * - REPORT: structured JSON summaries (audits, batch totals)
 * - WARN: rejected commands
 * - ERROR: unexpected failures
 */

import type { UnknownRecord } from "../types.js";

export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  trace(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  report(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export function isValidLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
