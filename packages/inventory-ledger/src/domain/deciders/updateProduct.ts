/**
 * UpdateProduct decider - pure decision logic.
 *
 * Replaces name, variants and stock wholesale. Buckets are left alone and
 * outstanding items are not reconciled against the new labels.
 */

import { success, type DeciderOutput } from "@serial-ledger/platform-core";
import { assertCatalogEntry } from "../accountant.js";
import { assertProductExists } from "../invariants.js";
import { checkRules, productStreamId } from "./_helpers.js";
import type {
  DeciderContext,
  LedgerReadModel,
  LedgerStateUpdate,
  ProductUpdatedEvent,
  UpdateProductData,
  UpdateProductInput,
} from "./types.js";

export function decideUpdateProduct(
  state: LedgerReadModel,
  command: UpdateProductInput,
  _context: DeciderContext
): DeciderOutput<ProductUpdatedEvent, UpdateProductData, LedgerStateUpdate> {
  const checked = checkRules(() => {
    assertProductExists(state.findProduct(command.productId), command.productId);
    assertCatalogEntry(command.variants, command.quantityPerVariant, command.separator);
  });
  if (checked.status === "rejected") {
    return checked;
  }

  return success({
    data: { productId: command.productId },
    events: [
      {
        eventType: "ProductUpdated" as const,
        streamType: "Product",
        streamId: productStreamId(command.productId),
        payload: {
          productId: command.productId,
          name: command.name,
          variants: [...command.variants],
          quantityPerVariant: [...command.quantityPerVariant],
        },
      },
    ],
    stateUpdate: {
      productPatches: [
        {
          productId: command.productId,
          changes: {
            name: command.name,
            variants: [...command.variants],
            quantityPerVariant: [...command.quantityPerVariant],
          },
        },
      ],
    },
  });
}
