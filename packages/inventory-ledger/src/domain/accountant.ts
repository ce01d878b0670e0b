/**
 * Inventory accountant.
 *
 * Pure conservation arithmetic over per-variant stock and the four product
 * buckets. Every function returns new arrays or records; nothing here
 * mutates its input, so a caller can plan a whole batch and throw it away
 * on the first failure.
 */
import { assertNever } from "@serial-ledger/platform-core";
import type { ItemStatus } from "./item.js";
import {
  BUCKET_NAMES,
  emptyBuckets,
  type BucketName,
  type InventoryBuckets,
  type ProductCMS,
} from "./product.js";
import { findVariantSlot, labelDigest, splitDimensions, type VariantSlot } from "./variants.js";
import {
  assertParity,
  assertValidQuantities,
  LedgerErrorCodes,
  LedgerInvariantError,
} from "./invariants.js";

// =============================================================================
// Per-variant stock
// =============================================================================

/**
 * Resolve an item's labels to slots of the product's variant list.
 *
 * Each label must match a non-separator slot, and the matched slots must
 * cover every dimension exactly once.
 */
export function locateVariantSlots(
  product: Pick<ProductCMS, "productId" | "variants">,
  labels: readonly string[],
  separator: string
): VariantSlot[] {
  const slots: VariantSlot[] = [];
  for (const label of labels) {
    const slot = findVariantSlot(product.variants, label, separator);
    if (!slot) {
      throw new LedgerInvariantError(
        LedgerErrorCodes.VARIANT_NOT_FOUND,
        `Variant "${label}" does not exist on product ${product.productId}`,
        { productId: product.productId, label }
      );
    }
    slots.push(slot);
  }

  const dimensionCount = splitDimensions(product.variants, separator).length;
  const covered = new Set(slots.map((slot) => slot.dimension));
  if (slots.length !== dimensionCount || covered.size !== dimensionCount) {
    throw new LedgerInvariantError(
      LedgerErrorCodes.VARIANT_DIMENSION_MISMATCH,
      `Expected one label for each of ${dimensionCount} dimensions`,
      {
        productId: product.productId,
        dimensionCount,
        labels: [...labels],
        dimensions: slots.map((slot) => slot.dimension),
      }
    );
  }

  return slots;
}

export function assertStockAvailable(
  quantities: readonly number[],
  slots: readonly VariantSlot[]
): void {
  for (const slot of slots) {
    const remaining = quantities[slot.index] ?? 0;
    if (remaining <= 0) {
      throw new LedgerInvariantError(
        LedgerErrorCodes.MAX_QUANTITY_REACHED,
        `Variant "${slot.label}" has no stock left`,
        { label: slot.label, index: slot.index, remaining }
      );
    }
  }
}

export function consumeVariantStock(
  quantities: readonly number[],
  slots: readonly VariantSlot[]
): number[] {
  assertStockAvailable(quantities, slots);
  const next = [...quantities];
  for (const slot of slots) {
    next[slot.index] = (next[slot.index] ?? 0) - 1;
  }
  return next;
}

export function restoreVariantStock(
  quantities: readonly number[],
  slots: readonly VariantSlot[]
): number[] {
  const next = [...quantities];
  for (const slot of slots) {
    next[slot.index] = (next[slot.index] ?? 0) + 1;
  }
  return next;
}

// =============================================================================
// Catalog consistency
// =============================================================================

/**
 * Every dimension must carry labels, and every dimension's quantities must
 * add up to the same total. Separator slots are not counted.
 */
export function assertConsistentDimensions(
  variants: readonly string[],
  quantities: readonly number[],
  separator: string
): void {
  if (variants.length === 0) {
    throw new LedgerInvariantError(
      LedgerErrorCodes.EMPTY_VARIANTS,
      "A product needs at least one variant"
    );
  }

  const dimensions = splitDimensions(variants, separator);
  const empty = dimensions.find((dimension) => dimension.slots.length === 0);
  if (empty) {
    throw new LedgerInvariantError(
      LedgerErrorCodes.INVALID_INVENTORY_COUNT,
      `Dimension ${empty.dimension} has no labels`,
      { dimension: empty.dimension }
    );
  }

  const sums = dimensions.map((dimension) =>
    dimension.slots.reduce((sum, slot) => sum + (quantities[slot.index] ?? 0), 0)
  );
  if (sums.some((sum) => sum !== sums[0])) {
    throw new LedgerInvariantError(
      LedgerErrorCodes.INVALID_INVENTORY_COUNT,
      `Dimension totals differ: ${sums.join(", ")}`,
      { dimensionTotals: sums }
    );
  }
}

/**
 * A label names one slot of the product, whichever dimension it sits in.
 */
export function assertDistinctLabels(variants: readonly string[], separator: string): void {
  const firstIndex = new Map<string, number>();
  for (const dimension of splitDimensions(variants, separator)) {
    for (const slot of dimension.slots) {
      const digest = labelDigest(slot.label);
      const first = firstIndex.get(digest);
      if (first !== undefined) {
        throw new LedgerInvariantError(
          LedgerErrorCodes.DUPLICATE_VARIANT_LABEL,
          `Variant "${slot.label}" appears at positions ${first} and ${slot.index}`,
          { label: slot.label, positions: [first, slot.index] }
        );
      }
      firstIndex.set(digest, slot.index);
    }
  }
}

/**
 * Full validation of a product's variant list and stock, in reporting order:
 * parity, quantity values, empty list, dimension totals, repeated labels.
 */
export function assertCatalogEntry(
  variants: readonly string[],
  quantities: readonly number[],
  separator: string
): void {
  assertParity(variants, quantities, "variants and quantityPerVariant");
  assertValidQuantities(quantities);
  assertConsistentDimensions(variants, quantities, separator);
  assertDistinctLabels(variants, separator);
}

// =============================================================================
// Buckets
// =============================================================================

export function bucketForStatus(status: ItemStatus): BucketName {
  switch (status) {
    case "minted":
    case "ready":
      return "available";
    case "bidded":
      return "reserved";
    case "sold":
      return "sold";
    case "shipped":
      return "shipped";
    default:
      return assertNever(status);
  }
}

/**
 * One unit entering, leaving or moving between buckets.
 */
export interface BucketMove {
  from?: BucketName;
  to?: BucketName;
}

/**
 * Apply a batch of unit moves to a product's buckets.
 *
 * Deltas are summed first, so two items leaving a bucket holding one unit
 * fail together instead of the second one overdrawing it.
 */
export function planBucketMoves(
  inventory: InventoryBuckets,
  moves: readonly BucketMove[]
): InventoryBuckets {
  const next: InventoryBuckets = { ...inventory };
  for (const move of moves) {
    if (move.from) next[move.from] -= 1;
    if (move.to) next[move.to] += 1;
  }

  const overdrawn = BUCKET_NAMES.find((bucket) => next[bucket] < 0);
  if (overdrawn) {
    const requested = moves.filter((move) => move.from === overdrawn).length;
    throw new LedgerInvariantError(
      LedgerErrorCodes.MAX_QUANTITY_REACHED,
      `Bucket "${overdrawn}" holds ${inventory[overdrawn]} units, ${requested} requested`,
      { bucket: overdrawn, current: inventory[overdrawn], requested }
    );
  }

  return next;
}

export function totalUnits(inventory: InventoryBuckets): number {
  return BUCKET_NAMES.reduce((sum, bucket) => sum + inventory[bucket], 0);
}

export function countUnitsByBucket(buckets: readonly BucketName[]): InventoryBuckets {
  const counts = emptyBuckets();
  for (const bucket of buckets) {
    counts[bucket] += 1;
  }
  return counts;
}
