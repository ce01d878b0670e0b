/**
 * Append-only event log.
 *
 * Events from one command are appended together, in decider order, with
 * consecutive global positions starting at 1.
 */
import {
  generateEventId,
  type DeciderContext,
  type DeciderEvent,
  type EventId,
} from "@serial-ledger/platform-core";

export interface RecordedEvent<TPayload extends object = object> {
  eventId: EventId;
  eventType: string;
  streamType: string;
  streamId: string;
  globalPosition: number;
  payload: TPayload;
  commandId: string;
  correlationId: string;
  timestamp: number;
}

export class LedgerEventLog {
  private readonly events: RecordedEvent[] = [];

  append(events: readonly DeciderEvent[], context: DeciderContext): RecordedEvent[] {
    const recorded = events.map((event, offset) => ({
      eventId: generateEventId("ledger"),
      eventType: event.eventType,
      streamType: event.streamType,
      streamId: event.streamId,
      globalPosition: this.events.length + offset + 1,
      payload: event.payload,
      commandId: context.commandId,
      correlationId: context.correlationId,
      timestamp: context.now,
    }));
    this.events.push(...recorded);
    return recorded.map((event) => structuredClone(event));
  }

  all(): RecordedEvent[] {
    return this.events.map((event) => structuredClone(event));
  }

  forStream(streamType: string, streamId: string): RecordedEvent[] {
    return this.events
      .filter((event) => event.streamType === streamType && event.streamId === streamId)
      .map((event) => structuredClone(event));
  }

  get size(): number {
    return this.events.length;
  }
}
