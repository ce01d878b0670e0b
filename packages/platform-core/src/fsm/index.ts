/**
 * Finite state machines for entity lifecycles.
 *
 * @module @serial-ledger/platform-core/fsm
 */

export type { FSMDefinition, FSM } from "./types.js";
export { defineFSM } from "./defineFSM.js";
