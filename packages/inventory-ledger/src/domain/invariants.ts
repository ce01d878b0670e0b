/**
 * Ledger business invariants (domain rules) and the error taxonomy.
 */
import { InvariantError } from "@serial-ledger/platform-core";
import type { ItemCMS, ItemId } from "./item.js";
import type { ProductCMS, ProductId } from "./product.js";

/**
 * Error codes for ledger rule violations.
 */
export const LedgerErrorCodes = {
  // Authorization
  UNAUTHORIZED_OPERATOR: "UNAUTHORIZED_OPERATOR",
  LAST_AUTHORIZED_OPERATOR: "LAST_AUTHORIZED_OPERATOR",

  // Parallel inputs
  PARITY_MISMATCH: "PARITY_MISMATCH",
  EMPTY_BATCH: "EMPTY_BATCH",

  // Lookups
  PRODUCT_NOT_FOUND: "PRODUCT_NOT_FOUND",
  ITEM_NOT_FOUND: "ITEM_NOT_FOUND",

  // Catalog consistency
  INVALID_INVENTORY_COUNT: "INVALID_INVENTORY_COUNT",
  INVALID_QUANTITY: "INVALID_QUANTITY",
  EMPTY_VARIANTS: "EMPTY_VARIANTS",
  DUPLICATE_VARIANT_LABEL: "DUPLICATE_VARIANT_LABEL",

  // Variant matching
  VARIANT_NOT_FOUND: "VARIANT_NOT_FOUND",
  VARIANT_DIMENSION_MISMATCH: "VARIANT_DIMENSION_MISMATCH",

  // Counters
  MAX_QUANTITY_REACHED: "MAX_QUANTITY_REACHED",

  // Lifecycle
  NOT_READY_FOR_AUCTION: "NOT_READY_FOR_AUCTION",
  ITEM_NOT_AVAILABLE_FOR_AUCTION: "ITEM_NOT_AVAILABLE_FOR_AUCTION",
  ITEM_NOT_BIDDED: "ITEM_NOT_BIDDED",
  ITEM_NOT_SOLD: "ITEM_NOT_SOLD",
  ITEM_NOT_SHIPPED: "ITEM_NOT_SHIPPED",
  INELIGIBLE_TRANSITION: "INELIGIBLE_TRANSITION",
  DUPLICATE_ITEM_IDS: "DUPLICATE_ITEM_IDS",

  // Input and collaborators
  INVALID_COMMAND: "INVALID_COMMAND",
  ASSET_REGISTRY_REJECTED: "ASSET_REGISTRY_REJECTED",

  // Audit
  NEGATIVE_COUNTER: "NEGATIVE_COUNTER",
  VARIANT_PARITY_BROKEN: "VARIANT_PARITY_BROKEN",
  BUCKET_TOTAL_MISMATCH: "BUCKET_TOTAL_MISMATCH",
  BUCKET_ASSIGNMENT_MISMATCH: "BUCKET_ASSIGNMENT_MISMATCH",
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCodes)[keyof typeof LedgerErrorCodes];

export type LedgerErrorCategory =
  | "AuthorizationError"
  | "ParityError"
  | "NotFoundError"
  | "InvalidInventoryCountError"
  | "VariantMismatchError"
  | "CapacityExceededError"
  | "IneligibleTransitionError"
  | "ValidationError"
  | "IntegrityError";

const CATEGORY_BY_CODE: Record<LedgerErrorCode, LedgerErrorCategory> = {
  UNAUTHORIZED_OPERATOR: "AuthorizationError",
  LAST_AUTHORIZED_OPERATOR: "AuthorizationError",
  PARITY_MISMATCH: "ParityError",
  EMPTY_BATCH: "ParityError",
  PRODUCT_NOT_FOUND: "NotFoundError",
  ITEM_NOT_FOUND: "NotFoundError",
  INVALID_INVENTORY_COUNT: "InvalidInventoryCountError",
  INVALID_QUANTITY: "InvalidInventoryCountError",
  EMPTY_VARIANTS: "InvalidInventoryCountError",
  DUPLICATE_VARIANT_LABEL: "VariantMismatchError",
  VARIANT_NOT_FOUND: "VariantMismatchError",
  VARIANT_DIMENSION_MISMATCH: "VariantMismatchError",
  MAX_QUANTITY_REACHED: "CapacityExceededError",
  NOT_READY_FOR_AUCTION: "IneligibleTransitionError",
  ITEM_NOT_AVAILABLE_FOR_AUCTION: "IneligibleTransitionError",
  ITEM_NOT_BIDDED: "IneligibleTransitionError",
  ITEM_NOT_SOLD: "IneligibleTransitionError",
  ITEM_NOT_SHIPPED: "IneligibleTransitionError",
  INELIGIBLE_TRANSITION: "IneligibleTransitionError",
  DUPLICATE_ITEM_IDS: "IneligibleTransitionError",
  INVALID_COMMAND: "ValidationError",
  ASSET_REGISTRY_REJECTED: "ValidationError",
  NEGATIVE_COUNTER: "IntegrityError",
  VARIANT_PARITY_BROKEN: "IntegrityError",
  BUCKET_TOTAL_MISMATCH: "IntegrityError",
  BUCKET_ASSIGNMENT_MISMATCH: "IntegrityError",
};

export function isLedgerErrorCode(code: string): code is LedgerErrorCode {
  return Object.hasOwn(CATEGORY_BY_CODE, code);
}

/**
 * Taxonomy category of a rejection code. Codes from outside the ledger are
 * reported as validation errors.
 */
export function ledgerErrorCategory(code: string): LedgerErrorCategory {
  return isLedgerErrorCode(code) ? CATEGORY_BY_CODE[code] : "ValidationError";
}

export const LedgerInvariantError = InvariantError.forContext<LedgerErrorCode>("Ledger");

// =============================================================================
// Procedural assertions
// =============================================================================

export function assertProductExists(
  product: ProductCMS | null | undefined,
  productId: ProductId
): asserts product is ProductCMS {
  if (!product) {
    throw new LedgerInvariantError(
      LedgerErrorCodes.PRODUCT_NOT_FOUND,
      `Product ${productId} does not exist`,
      { productId }
    );
  }
}

export function assertItemExists(
  item: ItemCMS | null | undefined,
  itemId: ItemId
): asserts item is ItemCMS {
  if (!item) {
    throw new LedgerInvariantError(LedgerErrorCodes.ITEM_NOT_FOUND, `Item ${itemId} does not exist`, {
      itemId,
    });
  }
}

export function assertParity(left: readonly unknown[], right: readonly unknown[], what: string): void {
  if (left.length !== right.length) {
    throw new LedgerInvariantError(
      LedgerErrorCodes.PARITY_MISMATCH,
      `${what}: expected equal lengths, got ${left.length} and ${right.length}`,
      { leftLength: left.length, rightLength: right.length }
    );
  }
}

export function assertNonEmptyBatch(itemIds: readonly ItemId[]): void {
  if (itemIds.length === 0) {
    throw new LedgerInvariantError(LedgerErrorCodes.EMPTY_BATCH, "Batch must name at least one item");
  }
}

/**
 * A repeated id would let one item be validated once and moved twice.
 */
export function assertNoDuplicateItemIds(itemIds: readonly ItemId[]): void {
  const seen = new Set<ItemId>();
  const duplicates = new Set<ItemId>();
  for (const itemId of itemIds) {
    if (seen.has(itemId)) duplicates.add(itemId);
    seen.add(itemId);
  }
  if (duplicates.size > 0) {
    const repeated = [...duplicates];
    throw new LedgerInvariantError(
      LedgerErrorCodes.DUPLICATE_ITEM_IDS,
      `Duplicate item ids in batch: ${repeated.join(", ")}`,
      { duplicateItemIds: repeated }
    );
  }
}

/**
 * Stock counts stay within `Number.MAX_SAFE_INTEGER`; above it `n - 1 === n`
 * and a mint would consume nothing.
 */
export function assertValidQuantities(quantities: readonly number[]): void {
  const index = quantities.findIndex((quantity) => !Number.isSafeInteger(quantity) || quantity < 0);
  if (index !== -1) {
    throw new LedgerInvariantError(
      LedgerErrorCodes.INVALID_QUANTITY,
      `Quantity at position ${index} must be a non-negative safe integer`,
      { index, quantity: quantities[index] }
    );
  }
}
