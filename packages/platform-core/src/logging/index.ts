/**
 * Logging infrastructure.
 *
 * @example
 * ```typescript
 * import { createScopedLogger } from "@serial-ledger/platform-core";
 *
 * const logger = createScopedLogger("Ledger:Command", config.logLevel);
 * ```
 *
 * @module @serial-ledger/platform-core/logging
 */

export type { LogLevel, Logger } from "./types.js";
export {
  LOG_LEVELS,
  LOG_LEVEL_PRIORITY,
  DEFAULT_LOG_LEVEL,
  shouldLog,
  isValidLogLevel,
} from "./types.js";

export {
  createScopedLogger,
  createNoOpLogger,
  TRACE_TIMING,
} from "./scoped.js";

export {
  logCommandStart,
  logCommandSuccess,
  logCommandRejected,
  logCommandError,
  type BaseCommandLogContext,
} from "./commands.js";

export { createRecordingLogger, type RecordingLogger, type LogCall } from "./testing.js";
