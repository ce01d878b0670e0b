import type { UnknownRecord } from "../types.js";
import type { InvariantError } from "./InvariantError.js";

export type InvariantErrorConstructor<TCode extends string> = new (
  code: TCode,
  message: string,
  context?: UnknownRecord
) => InvariantError<TCode>;

export interface InvariantViolation<TCode extends string = string> {
  code: TCode;
  name: string;
  message: string;
  context?: UnknownRecord;
}

export type InvariantResult<TCode extends string = string> =
  | { valid: true }
  | ({ valid: false } & InvariantViolation<TCode>);

/**
 * One named rule over a piece of state.
 *
 * `check` answers yes/no, `assert` throws the context's error class and
 * `validate` returns the violation as data.
 */
export interface Invariant<TState, TCode extends string = string, TParams extends unknown[] = []> {
  readonly name: string;
  readonly code: TCode;
  check(state: TState, ...params: TParams): boolean;
  assert(state: TState, ...params: TParams): void;
  validate(state: TState, ...params: TParams): InvariantResult<TCode>;
}

export type InvariantSetResult<TCode extends string = string> =
  | { valid: true }
  | { valid: false; violations: Array<InvariantViolation<TCode>> };

/**
 * Several invariants evaluated against the same state.
 *
 * `assertAll` stops at the first failure; `validateAll` collects every
 * violation, which is what an audit report wants.
 */
export interface InvariantSet<TState, TCode extends string = string> {
  readonly invariants: ReadonlyArray<Invariant<TState, TCode>>;
  checkAll(state: TState): boolean;
  assertAll(state: TState): void;
  validateAll(state: TState): InvariantSetResult<TCode>;
}
