/**
 * ## Invariant Framework - Declarative Domain Rules
 *
 * A rule is written once as configuration (predicate, code, message,
 * optional context) and gets its throwing and non-throwing forms for free.
 *
 * @example
 * ```typescript
 * const bucketsNonNegative = createInvariant<ProductCMS, LedgerErrorCode>(
 *   {
 *     name: "bucketsNonNegative",
 *     code: LedgerErrorCodes.MAX_QUANTITY_REACHED,
 *     check: (product) => Object.values(product.inventory).every((n) => n >= 0),
 *     message: (product) => `Product ${product.productId} has a negative bucket`,
 *   },
 *   LedgerInvariantError
 * );
 *
 * const audit = createInvariantSet([bucketsNonNegative, quantitiesNonNegative]);
 * const report = audit.validateAll(product);
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type {
  Invariant,
  InvariantErrorConstructor,
  InvariantResult,
  InvariantSet,
  InvariantSetResult,
  InvariantViolation,
} from "./types.js";

export interface InvariantConfig<TState, TCode extends string, TParams extends unknown[] = []> {
  name: string;
  code: TCode;
  check: (state: TState, ...params: TParams) => boolean;
  message: (state: TState, ...params: TParams) => string;
  context?: (state: TState, ...params: TParams) => UnknownRecord;
}

export function createInvariant<TState, TCode extends string, TParams extends unknown[] = []>(
  config: InvariantConfig<TState, TCode, TParams>,
  ErrorClass: InvariantErrorConstructor<TCode>
): Invariant<TState, TCode, TParams> {
  const { name, code, check, message, context } = config;

  const describe = (state: TState, params: TParams): InvariantViolation<TCode> => {
    const violation: InvariantViolation<TCode> = { code, name, message: message(state, ...params) };
    const details = context?.(state, ...params);
    if (details !== undefined) {
      violation.context = details;
    }
    return violation;
  };

  return {
    name,
    code,

    check(state, ...params) {
      return check(state, ...params);
    },

    assert(state, ...params) {
      if (!check(state, ...params)) {
        const violation = describe(state, params);
        throw new ErrorClass(code, violation.message, violation.context);
      }
    },

    validate(state, ...params): InvariantResult<TCode> {
      if (check(state, ...params)) {
        return { valid: true };
      }
      return { valid: false, ...describe(state, params) };
    },
  };
}

export function createInvariantSet<TState, TCode extends string>(
  invariants: Array<Invariant<TState, TCode>>
): InvariantSet<TState, TCode> {
  const members = Object.freeze([...invariants]);

  return {
    invariants: members,

    checkAll(state) {
      return members.every((invariant) => invariant.check(state));
    },

    assertAll(state) {
      for (const invariant of members) {
        invariant.assert(state);
      }
    },

    validateAll(state): InvariantSetResult<TCode> {
      const violations: Array<InvariantViolation<TCode>> = [];
      for (const invariant of members) {
        const result = invariant.validate(state);
        if (!result.valid) {
          const { valid: _valid, ...violation } = result;
          violations.push(violation);
        }
      }
      return violations.length === 0 ? { valid: true } : { valid: false, violations };
    },
  };
}
