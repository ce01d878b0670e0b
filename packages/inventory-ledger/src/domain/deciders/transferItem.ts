/**
 * TransferItem decider.
 *
 * The handler reads the current holder from the asset registry and passes
 * it in as `from`; the cached owner is overwritten with what the registry
 * says, and the history records the new holder.
 */

import { success, type DeciderOutput } from "@serial-ledger/platform-core";
import { assertItemExists } from "../invariants.js";
import { checkRules, itemStreamId } from "./_helpers.js";
import type {
  DeciderContext,
  ItemTransferredEvent,
  LedgerReadModel,
  LedgerStateUpdate,
  TransferItemData,
  TransferItemInput,
} from "./types.js";

export function decideTransferItem(
  state: LedgerReadModel,
  command: TransferItemInput,
  _context: DeciderContext
): DeciderOutput<ItemTransferredEvent, TransferItemData, LedgerStateUpdate> {
  const checked = checkRules(() => {
    const item = state.findItem(command.itemId);
    assertItemExists(item, command.itemId);
    return item;
  });
  if (checked.status === "rejected") {
    return checked;
  }
  const item = checked.value;

  return success({
    data: { itemId: item.itemId, from: command.from, to: command.to },
    events: [
      {
        eventType: "ItemTransferred" as const,
        streamType: "Item",
        streamId: itemStreamId(item.itemId),
        payload: { itemId: item.itemId, from: command.from, to: command.to },
      },
    ],
    stateUpdate: {
      itemPatches: [
        { itemId: item.itemId, changes: { owner: command.to, owners: [...item.owners, command.to] } },
      ],
    },
  });
}
