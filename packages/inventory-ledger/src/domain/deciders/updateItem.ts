/**
 * UpdateItem decider - administrative edit of non-lifecycle attributes.
 */

import { success, type DeciderOutput } from "@serial-ledger/platform-core";
import { assertItemExists } from "../invariants.js";
import { checkRules, itemStreamId } from "./_helpers.js";
import type {
  DeciderContext,
  ItemChanges,
  ItemUpdatedEvent,
  LedgerReadModel,
  LedgerStateUpdate,
  UpdateItemData,
  UpdateItemInput,
} from "./types.js";

export function decideUpdateItem(
  state: LedgerReadModel,
  command: UpdateItemInput,
  _context: DeciderContext
): DeciderOutput<ItemUpdatedEvent, UpdateItemData, LedgerStateUpdate> {
  const checked = checkRules(() => assertItemExists(state.findItem(command.itemId), command.itemId));
  if (checked.status === "rejected") {
    return checked;
  }

  // Keys passed as undefined are not changes.
  const changes: ItemChanges = {};
  const { price, location, isChipped, isDigitized, metadataRef } = command.changes;
  if (price !== undefined) changes.price = price;
  if (location !== undefined) changes.location = location;
  if (isChipped !== undefined) changes.isChipped = isChipped;
  if (isDigitized !== undefined) changes.isDigitized = isDigitized;
  if (metadataRef !== undefined) changes.metadataRef = metadataRef;

  return success({
    data: { itemId: command.itemId },
    events: [
      {
        eventType: "ItemUpdated" as const,
        streamType: "Item",
        streamId: itemStreamId(command.itemId),
        payload: { itemId: command.itemId, changes: { ...changes } },
      },
    ],
    stateUpdate: { itemPatches: [{ itemId: command.itemId, changes }] },
  });
}
