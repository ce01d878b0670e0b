export type { CommandId, CorrelationId, EventId } from "./branded.js";
export { toCommandId, toCorrelationId, toEventId, isValidIdString } from "./branded.js";
export { generateCommandId, generateCorrelationId, generateEventId } from "./generator.js";
