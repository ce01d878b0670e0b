/**
 * Ledger audit rules.
 *
 * Evaluated per product against its live items. Commands keep these true on
 * every write; the audit exists to prove it and to surface corruption in
 * state that was loaded from elsewhere.
 */
import { createInvariant, createInvariantSet } from "@serial-ledger/platform-core";
import type { ItemCMS } from "./item.js";
import { BUCKET_NAMES, type InventoryBuckets, type ProductCMS } from "./product.js";
import { bucketForStatus, countUnitsByBucket, totalUnits } from "./accountant.js";
import { LedgerErrorCodes, LedgerInvariantError, type LedgerErrorCode } from "./invariants.js";

/**
 * What the audit looks at for one product: the product and its live items.
 */
export interface ProductLedgerView {
  product: ProductCMS;
  items: readonly ItemCMS[];
}

function negativeBuckets(inventory: InventoryBuckets): string[] {
  return BUCKET_NAMES.filter((bucket) => inventory[bucket] < 0);
}

export const countersNonNegative = createInvariant<ProductLedgerView, LedgerErrorCode>(
  {
    name: "countersNonNegative",
    code: LedgerErrorCodes.NEGATIVE_COUNTER,
    check: ({ product }) =>
      negativeBuckets(product.inventory).length === 0 &&
      product.quantityPerVariant.every((quantity) => quantity >= 0),
    message: ({ product }) => `Product ${product.productId} has a negative counter`,
    context: ({ product }) => ({
      productId: product.productId,
      negativeBuckets: negativeBuckets(product.inventory),
      quantityPerVariant: product.quantityPerVariant,
    }),
  },
  LedgerInvariantError
);

export const variantParityHolds = createInvariant<ProductLedgerView, LedgerErrorCode>(
  {
    name: "variantParityHolds",
    code: LedgerErrorCodes.VARIANT_PARITY_BROKEN,
    check: ({ product }) => product.variants.length === product.quantityPerVariant.length,
    message: ({ product }) =>
      `Product ${product.productId} has ${product.variants.length} variants but ${product.quantityPerVariant.length} quantities`,
    context: ({ product }) => ({ productId: product.productId }),
  },
  LedgerInvariantError
);

export const bucketTotalMatchesItems = createInvariant<ProductLedgerView, LedgerErrorCode>(
  {
    name: "bucketTotalMatchesItems",
    code: LedgerErrorCodes.BUCKET_TOTAL_MISMATCH,
    check: ({ product, items }) => totalUnits(product.inventory) === items.length,
    message: ({ product, items }) =>
      `Product ${product.productId} counts ${totalUnits(product.inventory)} units but has ${items.length} items`,
    context: ({ product, items }) => ({
      productId: product.productId,
      bucketTotal: totalUnits(product.inventory),
      itemCount: items.length,
    }),
  },
  LedgerInvariantError
);

export const bucketsMatchItemStatuses = createInvariant<ProductLedgerView, LedgerErrorCode>(
  {
    name: "bucketsMatchItemStatuses",
    code: LedgerErrorCodes.BUCKET_ASSIGNMENT_MISMATCH,
    check: ({ product, items }) => {
      const expected = countUnitsByBucket(items.map((item) => bucketForStatus(item.status)));
      return BUCKET_NAMES.every((bucket) => expected[bucket] === product.inventory[bucket]);
    },
    message: ({ product }) =>
      `Product ${product.productId} buckets disagree with the statuses of its items`,
    context: ({ product, items }) => ({
      productId: product.productId,
      inventory: product.inventory,
      expected: countUnitsByBucket(items.map((item) => bucketForStatus(item.status))),
    }),
  },
  LedgerInvariantError
);

/**
 * Everything `verifyLedger()` checks per product.
 */
export const ledgerAuditInvariants = createInvariantSet([
  countersNonNegative,
  variantParityHolds,
  bucketTotalMatchesItems,
  bucketsMatchItemStatuses,
]);
