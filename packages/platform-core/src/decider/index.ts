/**
 * Pure decider outputs and helpers.
 *
 * @module @serial-ledger/platform-core/decider
 */

export type {
  DeciderEvent,
  DeciderSuccess,
  DeciderRejected,
  DeciderOutput,
  DeciderContext,
  DeciderFn,
} from "./types.js";

export { success, rejected, isSuccess, isRejected } from "./types.js";
