/**
 * Invariant utilities: a context-scoped error class plus declarative rules
 * and rule sets.
 *
 * @module @serial-ledger/platform-core/invariants
 */

export { InvariantError } from "./InvariantError.js";

export type {
  Invariant,
  InvariantErrorConstructor,
  InvariantResult,
  InvariantSet,
  InvariantSetResult,
  InvariantViolation,
} from "./types.js";

export { createInvariant, createInvariantSet, type InvariantConfig } from "./createInvariant.js";
