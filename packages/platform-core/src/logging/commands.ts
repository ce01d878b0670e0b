/**
 * Command lifecycle logging shared by every command handler.
 */
import type { Logger } from "./types.js";

export type BaseCommandLogContext = {
  commandType: string;
  commandId: string;
  correlationId: string;
  [key: string]: unknown;
};

export function logCommandStart(logger: Logger, context: BaseCommandLogContext): void {
  logger.info("Command started", context);
}

export function logCommandSuccess(
  logger: Logger,
  context: BaseCommandLogContext,
  result: { eventTypes: string[] }
): void {
  logger.info("Command succeeded", { ...context, eventTypes: result.eventTypes });
}

export function logCommandRejected(
  logger: Logger,
  context: BaseCommandLogContext,
  reason: { code: string; message: string }
): void {
  logger.warn("Command rejected", {
    ...context,
    rejectionCode: reason.code,
    rejectionMessage: reason.message,
  });
}

export function logCommandError(
  logger: Logger,
  context: BaseCommandLogContext,
  error: unknown
): void {
  logger.error("Command failed", {
    ...context,
    error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
  });
}
