/**
 * CreateProduct decider - pure decision logic.
 *
 * Entity creation: the product id is allocated by the handler, the decider
 * only checks that the variant list and stock describe a consistent product.
 */

import { success, type DeciderOutput } from "@serial-ledger/platform-core";
import { assertCatalogEntry } from "../accountant.js";
import { createInitialProductCMS } from "../product.js";
import { checkRules, productStreamId } from "./_helpers.js";
import type {
  CreateProductData,
  CreateProductInput,
  DeciderContext,
  LedgerReadModel,
  LedgerStateUpdate,
  ProductCreatedEvent,
} from "./types.js";

/**
 * Invariants, in reporting order:
 * - variants and quantities have equal length (PARITY_MISMATCH)
 * - every quantity is a non-negative safe integer (INVALID_QUANTITY)
 * - at least one variant (EMPTY_VARIANTS)
 * - every dimension non-empty with equal totals (INVALID_INVENTORY_COUNT)
 * - no label repeated anywhere in the product (DUPLICATE_VARIANT_LABEL)
 */
export function decideCreateProduct(
  _state: LedgerReadModel,
  command: CreateProductInput,
  context: DeciderContext
): DeciderOutput<ProductCreatedEvent, CreateProductData, LedgerStateUpdate> {
  const checked = checkRules(() =>
    assertCatalogEntry(command.variants, command.quantityPerVariant, command.separator)
  );
  if (checked.status === "rejected") {
    return checked;
  }

  const product = createInitialProductCMS(
    command.productId,
    command.name,
    command.variants,
    command.quantityPerVariant,
    context.now
  );

  return success({
    data: { productId: product.productId },
    events: [
      {
        eventType: "ProductCreated" as const,
        streamType: "Product",
        streamId: productStreamId(product.productId),
        payload: {
          productId: product.productId,
          name: product.name,
          variants: [...product.variants],
          quantityPerVariant: [...product.quantityPerVariant],
        },
      },
    ],
    stateUpdate: { productInserts: [product] },
  });
}
