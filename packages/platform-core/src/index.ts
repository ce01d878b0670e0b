/**
 * @serial-ledger/platform-core
 *
 * Domain-agnostic building blocks for the ledger: lifecycle state machines,
 * pure decider outputs, declarative invariants, scoped logging and ids.
 *
 * Subpath entry points (`/fsm`, `/decider`, `/invariants`, `/logging`, `/handlers`,
 * `/ids`) export the same symbols for narrower imports.
 *
 * @module @serial-ledger/platform-core
 */

export type { UnknownRecord } from "./types.js";
export { assertNever } from "./types.js";

export * from "./fsm/index.js";
export * from "./decider/index.js";
export * from "./invariants/index.js";
export * from "./logging/index.js";
export * from "./ids/index.js";
export * from "./handlers/index.js";
