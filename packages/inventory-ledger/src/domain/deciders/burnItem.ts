/**
 * BurnItem decider - pure decision logic.
 *
 * The unit leaves whichever bucket its status occupies and its labels give
 * one unit of stock back, so a mint followed by a burn leaves the product
 * exactly as it was.
 */

import { success, type DeciderOutput } from "@serial-ledger/platform-core";
import {
  bucketForStatus,
  locateVariantSlots,
  planBucketMoves,
  restoreVariantStock,
} from "../accountant.js";
import { assertItemExists, assertProductExists } from "../invariants.js";
import { checkRules, itemStreamId } from "./_helpers.js";
import type {
  BurnItemData,
  BurnItemInput,
  DeciderContext,
  ItemBurnedEvent,
  LedgerReadModel,
  LedgerStateUpdate,
} from "./types.js";

/**
 * Invariants, in reporting order:
 * - item exists (ITEM_NOT_FOUND)
 * - its product exists (PRODUCT_NOT_FOUND)
 * - the occupied bucket is not empty (MAX_QUANTITY_REACHED)
 * - the item's labels still match the product (VARIANT_NOT_FOUND)
 */
export function decideBurnItem(
  state: LedgerReadModel,
  command: BurnItemInput,
  _context: DeciderContext
): DeciderOutput<ItemBurnedEvent, BurnItemData, LedgerStateUpdate> {
  const checked = checkRules(() => {
    const item = state.findItem(command.itemId);
    assertItemExists(item, command.itemId);
    const product = state.findProduct(item.productId);
    assertProductExists(product, item.productId);

    const inventory = planBucketMoves(product.inventory, [{ from: bucketForStatus(item.status) }]);
    const slots = locateVariantSlots(product, item.variants, command.separator);
    return {
      item,
      inventory,
      quantityPerVariant: restoreVariantStock(product.quantityPerVariant, slots),
    };
  });
  if (checked.status === "rejected") {
    return checked;
  }
  const { item, inventory, quantityPerVariant } = checked.value;

  return success({
    data: { itemId: item.itemId, productId: item.productId },
    events: [
      {
        eventType: "ItemBurned" as const,
        streamType: "Item",
        streamId: itemStreamId(item.itemId),
        payload: {
          itemId: item.itemId,
          productId: item.productId,
          status: item.status,
          inventory,
          quantityPerVariant,
        },
      },
    ],
    stateUpdate: {
      itemRemovals: [item.itemId],
      productPatches: [{ productId: item.productId, changes: { inventory, quantityPerVariant } }],
    },
  });
}
