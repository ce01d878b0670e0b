/**
 * Shared helpers for ledger command handlers.
 */
import {
  createScopedLogger,
  type BaseCommandLogContext,
  type Logger,
  type LogLevel,
} from "@serial-ledger/platform-core";

export {
  logCommandStart,
  logCommandSuccess,
  logCommandRejected,
  logCommandError,
} from "@serial-ledger/platform-core";

/**
 * Log format: [Ledger:Command] message {context}
 */
export function createLedgerCommandLogger(level: LogLevel): Logger {
  return createScopedLogger("Ledger:Command", level);
}

/**
 * Every ledger command is logged with the principal that issued it.
 */
export type LedgerCommandLogContext = BaseCommandLogContext & { caller: string };
