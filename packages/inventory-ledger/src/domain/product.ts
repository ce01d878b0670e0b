/**
 * Product CMS (Command Model State).
 *
 * One sellable design: its variant labels, the remaining stock per label,
 * and four aggregate buckets counting the units that exist as items.
 */

export type ProductId = number;

export const BUCKET_NAMES = ["available", "reserved", "sold", "shipped"] as const;

export type BucketName = (typeof BUCKET_NAMES)[number];

/**
 * Aggregate unit counts across every variant of a product.
 *
 * Independent of `quantityPerVariant`: minting takes one unit of stock from
 * each matched label but adds a single unit to `available`.
 */
export type InventoryBuckets = Record<BucketName, number>;

export interface ProductCMS {
  productId: ProductId;
  name: string;
  variants: string[];
  quantityPerVariant: number[];
  inventory: InventoryBuckets;
  version: number;
  createdAt: number;
  updatedAt: number;
}

export function emptyBuckets(): InventoryBuckets {
  return { available: 0, reserved: 0, sold: 0, shipped: 0 };
}

/**
 * `[available, reserved, sold, shipped]`
 */
export function toInventoryTuple(buckets: InventoryBuckets): [number, number, number, number] {
  return [buckets.available, buckets.reserved, buckets.sold, buckets.shipped];
}

export function createInitialProductCMS(
  productId: ProductId,
  name: string,
  variants: readonly string[],
  quantityPerVariant: readonly number[],
  now: number
): ProductCMS {
  return {
    productId,
    name,
    variants: [...variants],
    quantityPerVariant: [...quantityPerVariant],
    inventory: emptyBuckets(),
    version: 1,
    createdAt: now,
    updatedAt: now,
  };
}
