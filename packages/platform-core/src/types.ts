/**
 * Core type aliases shared by every layer of the ledger.
 */

/**
 * Loosely typed object: command args, error context, log data.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness guard for `switch` statements over discriminated unions.
 *
 * @example
 * ```typescript
 * switch (status) {
 *   case "minted": ...
 *   case "shipped": ...
 *   default:
 *     return assertNever(status);
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unhandled variant: ${JSON.stringify(x)}`);
}
