/**
 * Time-ordered id generation (UUID v7, RFC 9562).
 *
 * Formats:
 * - command:     `cmd_<uuidv7>`
 * - correlation: `corr_<uuidv7>`
 * - event:       `<context>_event_<uuidv7>`
 */
import { v7 as uuidv7 } from "uuid";
import {
  toCommandId,
  toCorrelationId,
  toEventId,
  type CommandId,
  type CorrelationId,
  type EventId,
} from "./branded.js";

const VALID_CONTEXT = /^[a-z0-9]+$/;

export function generateCommandId(): CommandId {
  return toCommandId(`cmd_${uuidv7()}`);
}

export function generateCorrelationId(): CorrelationId {
  return toCorrelationId(`corr_${uuidv7()}`);
}

/**
 * @throws Error if `context` is not lowercase alphanumeric
 */
export function generateEventId(context: string): EventId {
  if (!VALID_CONTEXT.test(context)) {
    throw new Error(`Invalid event context "${context}": use lowercase letters and digits only`);
  }
  return toEventId(`${context}_event_${uuidv7()}`);
}
