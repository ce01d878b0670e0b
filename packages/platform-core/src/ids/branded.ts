/**
 * Branded id strings.
 *
 * All three are plain strings at runtime; the brand keeps a correlation id
 * from being passed where a command id is expected.
 */

declare const CommandIdBrand: unique symbol;
declare const CorrelationIdBrand: unique symbol;
declare const EventIdBrand: unique symbol;

export type CommandId = string & { readonly [CommandIdBrand]: void };
export type CorrelationId = string & { readonly [CorrelationIdBrand]: void };
export type EventId = string & { readonly [EventIdBrand]: void };

export function isValidIdString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function brand<T extends string>(kind: string, id: string): T {
  if (!isValidIdString(id)) {
    throw new Error(`Invalid ${kind}: must be a non-empty string`);
  }
  return id as T;
}

export function toCommandId(id: string): CommandId {
  return brand<CommandId>("CommandId", id);
}

export function toCorrelationId(id: string): CorrelationId {
  return brand<CorrelationId>("CorrelationId", id);
}

export function toEventId(id: string): EventId {
  return brand<EventId>("EventId", id);
}
