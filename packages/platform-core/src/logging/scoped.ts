/**
 * ## Scoped Loggers
 *
 * Console-backed loggers that prefix every line with `[scope]` and drop
 * anything below the configured level.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Ledger:Command", "INFO");
 *
 * logger.debug("Loaded product");                     // suppressed
 * logger.info("Command started", { commandType });    // [Ledger:Command] Command started {...}
 * logger.report("Audit complete", { violations: 0 }); // {"scope":"Ledger:Command",...}
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * Marker values for the `timing` field of trace data.
 */
export const TRACE_TIMING = {
  START: "start",
  END: "end",
} as const;

// Resolved on every call so tests can swap globalThis.console after import.
function runtimeConsole(): Console {
  return globalThis.console;
}

export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const format = (message: string, data?: UnknownRecord): string =>
    data && Object.keys(data).length > 0
      ? `${prefix} ${message} ${JSON.stringify(data)}`
      : `${prefix} ${message}`;

  return {
    debug(message, data) {
      if (shouldLog("DEBUG", level)) runtimeConsole().debug(format(message, data));
    },

    trace(message, data) {
      if (!shouldLog("TRACE", level)) return;
      const timing = data?.["timing"];
      if (timing === TRACE_TIMING.START) {
        runtimeConsole().time(`${prefix} ${message}`);
      } else if (timing === TRACE_TIMING.END) {
        runtimeConsole().timeEnd(`${prefix} ${message}`);
      } else {
        runtimeConsole().debug(format(message, data));
      }
    },

    info(message, data) {
      if (shouldLog("INFO", level)) runtimeConsole().info(format(message, data));
    },

    report(message, data) {
      if (shouldLog("REPORT", level)) {
        runtimeConsole().log(JSON.stringify({ scope, message, ...data, timestamp: Date.now() }));
      }
    },

    warn(message, data) {
      if (shouldLog("WARN", level)) runtimeConsole().warn(format(message, data));
    },

    error(message, data) {
      if (shouldLog("ERROR", level)) runtimeConsole().error(format(message, data));
    },
  };
}

export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}
