import type { UnknownRecord } from "../types.js";

/**
 * Base class for broken domain rules.
 *
 * Each bounded context derives its own named subclass through
 * `forContext()` and a string-literal union of codes, so callers can
 * branch on `error.code` without string matching on messages.
 *
 * @example
 * ```typescript
 * const LedgerInvariantError = InvariantError.forContext<LedgerErrorCode>("Ledger");
 *
 * throw new LedgerInvariantError("PRODUCT_NOT_FOUND", "Product 7 does not exist", {
 *   productId: 7,
 * });
 * ```
 */
export class InvariantError<TCode extends string = string> extends Error {
  public readonly code: TCode;
  public readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "InvariantError";
  }

  /**
   * Build a subclass named `${contextName}InvariantError`.
   */
  static forContext<TCode extends string>(
    contextName: string
  ): new (code: TCode, message: string, context?: UnknownRecord) => InvariantError<TCode> {
    const name = `${contextName}InvariantError`;

    const ContextInvariantError = class extends InvariantError<TCode> {
      constructor(code: TCode, message: string, context?: UnknownRecord) {
        super(code, message, context);
        this.name = name;
      }
    };

    Object.defineProperty(ContextInvariantError, "name", { value: name, configurable: true });
    return ContextInvariantError;
  }

  static isInvariantError(error: unknown): error is InvariantError {
    return error instanceof InvariantError;
  }

  static hasCode<T extends string>(error: unknown, code: T): error is InvariantError<T> {
    return InvariantError.isInvariantError(error) && error.code === code;
  }
}
