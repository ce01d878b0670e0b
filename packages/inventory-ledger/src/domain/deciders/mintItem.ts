/**
 * MintItem decider - pure decision logic.
 *
 * Every label is resolved and every counter checked before the update is
 * built. The asset registry is called by the handler afterwards; a refusal
 * there discards this update unapplied.
 */

import { success, type DeciderOutput } from "@serial-ledger/platform-core";
import { consumeVariantStock, locateVariantSlots, planBucketMoves } from "../accountant.js";
import { assertProductExists } from "../invariants.js";
import { createInitialItemCMS } from "../item.js";
import { checkRules, itemStreamId } from "./_helpers.js";
import type {
  DeciderContext,
  ItemMintedEvent,
  LedgerReadModel,
  LedgerStateUpdate,
  MintItemData,
  MintItemInput,
} from "./types.js";

/**
 * Invariants:
 * - product exists (PRODUCT_NOT_FOUND)
 * - each label matches a slot (VARIANT_NOT_FOUND)
 * - labels cover every dimension once (VARIANT_DIMENSION_MISMATCH)
 * - each matched slot has stock left (MAX_QUANTITY_REACHED)
 */
export function decideMintItem(
  state: LedgerReadModel,
  command: MintItemInput,
  context: DeciderContext
): DeciderOutput<ItemMintedEvent, MintItemData, LedgerStateUpdate> {
  const checked = checkRules(() => {
    const product = state.findProduct(command.productId);
    assertProductExists(product, command.productId);
    const slots = locateVariantSlots(product, command.variants, command.separator);
    return {
      quantityPerVariant: consumeVariantStock(product.quantityPerVariant, slots),
      inventory: planBucketMoves(product.inventory, [{ to: "available" }]),
    };
  });
  if (checked.status === "rejected") {
    return checked;
  }
  const { quantityPerVariant, inventory } = checked.value;

  const item = createInitialItemCMS(
    {
      itemId: command.itemId,
      productId: command.productId,
      owner: command.custodian,
      variants: command.variants,
      price: command.price,
      location: command.location,
      isChipped: command.isChipped,
      isDigitized: command.isDigitized,
      metadataRef: command.metadataRef,
    },
    context.now
  );

  return success({
    data: { itemId: item.itemId, productId: item.productId, owner: item.owner },
    events: [
      {
        eventType: "ItemMinted" as const,
        streamType: "Item",
        streamId: itemStreamId(item.itemId),
        payload: {
          itemId: item.itemId,
          productId: item.productId,
          owner: item.owner,
          variants: [...item.variants],
          price: item.price,
          location: item.location,
          metadataRef: item.metadataRef,
          inventory,
        },
      },
    ],
    stateUpdate: {
      itemInserts: [item],
      productPatches: [{ productId: command.productId, changes: { quantityPerVariant, inventory } }],
    },
  });
}
