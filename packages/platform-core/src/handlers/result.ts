/**
 * Result helpers for command handlers.
 *
 * A handler answers every command with one of two shapes. Rejections carry
 * no events: nothing was written.
 *
 * @example
 * ```typescript
 * if (!product) {
 *   return rejectedResult("PRODUCT_NOT_FOUND", "Product 7 does not exist", ids, { productId: 7 });
 * }
 * return successResult({ productId }, recordedEvents, ids);
 * ```
 */
import type { UnknownRecord } from "../types.js";

export interface CommandIds {
  commandId: string;
  correlationId: string;
}

export interface CommandSuccess<TData, TEvent> extends CommandIds {
  status: "success";
  data: TData;
  events: TEvent[];
}

export interface CommandRejected extends CommandIds {
  status: "rejected";
  code: string;
  message: string;
  context?: UnknownRecord;
}

export type CommandResult<TData, TEvent> = CommandSuccess<TData, TEvent> | CommandRejected;

export function successResult<TData, TEvent>(
  data: TData,
  events: TEvent[],
  ids: CommandIds
): CommandSuccess<TData, TEvent> {
  return {
    status: "success",
    data,
    events,
    commandId: ids.commandId,
    correlationId: ids.correlationId,
  };
}

export function rejectedResult(
  code: string,
  message: string,
  ids: CommandIds,
  context?: UnknownRecord
): CommandRejected {
  return {
    status: "rejected",
    code,
    message,
    commandId: ids.commandId,
    correlationId: ids.correlationId,
    ...(context !== undefined && { context }),
  };
}
