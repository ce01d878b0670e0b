/**
 * ## Decider Pattern - Pure Command Decisions
 *
 * A decider looks at the loaded state and a command and answers with one
 * of two outcomes:
 *
 * | Outcome | Meaning |
 * |---------|---------|
 * | `DeciderSuccess` | Events to record, data for the caller, state updates to apply |
 * | `DeciderRejected` | A rule was broken; nothing is recorded or written |
 *
 * Deciders never perform I/O. The handler around them loads state, calls
 * the decider, talks to external ports and only then writes the updates,
 * so a rejection leaves every table exactly as it was.
 *
 * A single command may touch many entities (a batch of items and their
 * products), so a success carries a list of events rather than one.
 *
 * @example
 * ```typescript
 * export function decideReadyForAuction(
 *   state: BatchState,
 *   command: ReadyForAuctionInput,
 *   context: DeciderContext
 * ): DeciderOutput<ItemReadiedEvent, ReadyForAuctionData, BatchStateUpdate> {
 *   if (command.itemIds.length === 0) {
 *     return rejected("EMPTY_BATCH", "Batch must name at least one item");
 *   }
 *   return success({ data, events, stateUpdate });
 * }
 * ```
 */

import type { UnknownRecord } from "../types.js";

/**
 * Event as produced by a decider; the event log adds ids and positions.
 */
export interface DeciderEvent<TPayload extends object = object> {
  eventType: string;
  streamType: string;
  streamId: string;
  payload: TPayload;
}

export interface DeciderSuccess<TEvent extends DeciderEvent, TData, TStateUpdate> {
  status: "success";
  data: TData;
  events: TEvent[];
  stateUpdate: TStateUpdate;
}

export interface DeciderRejected {
  status: "rejected";
  code: string;
  message: string;
  context?: UnknownRecord;
}

export type DeciderOutput<TEvent extends DeciderEvent, TData, TStateUpdate> =
  | DeciderSuccess<TEvent, TData, TStateUpdate>
  | DeciderRejected;

/**
 * Values a decider must not generate itself.
 */
export interface DeciderContext {
  now: number;
  commandId: string;
  correlationId: string;
}

export type DeciderFn<TState, TCommand, TEvent extends DeciderEvent, TData, TStateUpdate> = (
  state: TState,
  command: TCommand,
  context: DeciderContext
) => DeciderOutput<TEvent, TData, TStateUpdate>;

export function success<TEvent extends DeciderEvent, TData, TStateUpdate>(
  output: Omit<DeciderSuccess<TEvent, TData, TStateUpdate>, "status">
): DeciderSuccess<TEvent, TData, TStateUpdate> {
  return { status: "success", ...output };
}

export function rejected(code: string, message: string, context?: UnknownRecord): DeciderRejected {
  const result: DeciderRejected = { status: "rejected", code, message };
  if (context !== undefined) {
    result.context = context;
  }
  return result;
}

export function isSuccess<TEvent extends DeciderEvent, TData, TStateUpdate>(
  output: DeciderOutput<TEvent, TData, TStateUpdate>
): output is DeciderSuccess<TEvent, TData, TStateUpdate> {
  return output.status === "success";
}

export function isRejected<TEvent extends DeciderEvent, TData, TStateUpdate>(
  output: DeciderOutput<TEvent, TData, TStateUpdate>
): output is DeciderRejected {
  return output.status === "rejected";
}
