import { InvariantError, rejected, type DeciderRejected } from "@serial-ledger/platform-core";

/**
 * Run rule assertions and turn a broken rule into a rejection.
 *
 * Only invariant errors become rejections; anything else is a bug and
 * propagates to the handler.
 */
export function checkRules<T>(rules: () => T): { status: "ok"; value: T } | DeciderRejected {
  try {
    return { status: "ok", value: rules() };
  } catch (error) {
    if (InvariantError.isInvariantError(error)) {
      return rejected(error.code, error.message, error.context);
    }
    throw error;
  }
}

export function productStreamId(productId: number): string {
  return `product-${productId}`;
}

export function itemStreamId(itemId: number): string {
  return `item-${itemId}`;
}
