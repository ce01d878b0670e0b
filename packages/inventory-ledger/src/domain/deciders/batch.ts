/**
 * Batch lifecycle deciders.
 *
 * All five share one shape: check every element, sum the bucket moves per
 * product, and only then describe the writes. The first broken rule rejects
 * the whole batch, so either every item moves or none does.
 */

import { success, type DeciderOutput } from "@serial-ledger/platform-core";
import { bucketForStatus, planBucketMoves, type BucketMove } from "../accountant.js";
import {
  assertItemExists,
  assertNoDuplicateItemIds,
  assertNonEmptyBatch,
  assertParity,
  assertProductExists,
  LedgerErrorCodes,
  LedgerInvariantError,
  type LedgerErrorCode,
} from "../invariants.js";
import type { ItemCMS, ItemLocation, ItemStatus } from "../item.js";
import { itemFSM } from "../itemFSM.js";
import type { InventoryBuckets, ProductId } from "../product.js";
import { checkRules, itemStreamId } from "./_helpers.js";
import type {
  DeciderContext,
  FlaggedItemBatchInput,
  ItemBatchData,
  ItemBatchInput,
  ItemLifecycleEvent,
  ItemLifecycleEventType,
  LedgerReadModel,
  LedgerStateUpdate,
} from "./types.js";

export interface TransitionOutcome {
  eventType: ItemLifecycleEventType;
  status: ItemStatus;
  location: ItemLocation;
}

/**
 * Decides one element of a batch; throws a ledger invariant error when the
 * item may not take this step.
 */
export type TransitionRule = (item: ItemCMS, flag: boolean) => TransitionOutcome;

type BatchOutput = DeciderOutput<ItemLifecycleEvent, ItemBatchData, LedgerStateUpdate>;

interface PlannedTransition {
  item: ItemCMS;
  outcome: TransitionOutcome;
}

/**
 * Check order: flag parity, empty batch, duplicate ids, then each element
 * in order, then the aggregated bucket moves.
 */
export function decideBatchTransition(
  state: LedgerReadModel,
  command: { itemIds: number[]; flags?: boolean[] },
  rule: TransitionRule
): BatchOutput {
  const { itemIds, flags } = command;

  const checked = checkRules(() => {
    if (flags) assertParity(itemIds, flags, "itemIds and flags");
    assertNonEmptyBatch(itemIds);
    assertNoDuplicateItemIds(itemIds);

    const planned: PlannedTransition[] = itemIds.map((itemId, index) => {
      const item = state.findItem(itemId);
      assertItemExists(item, itemId);
      return { item, outcome: rule(item, flags?.[index] ?? true) };
    });

    const movesByProduct = new Map<ProductId, BucketMove[]>();
    for (const { item, outcome } of planned) {
      const moves = movesByProduct.get(item.productId) ?? [];
      const from = bucketForStatus(item.status);
      const to = bucketForStatus(outcome.status);
      if (from !== to) moves.push({ from, to });
      movesByProduct.set(item.productId, moves);
    }

    const inventories: Array<{ productId: ProductId; inventory: InventoryBuckets; moved: boolean }> =
      [];
    for (const [productId, moves] of movesByProduct) {
      const product = state.findProduct(productId);
      assertProductExists(product, productId);
      inventories.push({
        productId,
        inventory: planBucketMoves(product.inventory, moves),
        moved: moves.length > 0,
      });
    }

    return { planned, inventories };
  });
  if (checked.status === "rejected") {
    return checked;
  }
  const { planned, inventories } = checked.value;

  return success({
    data: {
      itemIds: [...itemIds],
      inventories: inventories.map(({ productId, inventory }) => ({ productId, inventory })),
    },
    events: planned.map(({ item, outcome }) => ({
      eventType: outcome.eventType,
      streamType: "Item",
      streamId: itemStreamId(item.itemId),
      payload: {
        itemId: item.itemId,
        productId: item.productId,
        from: item.status,
        to: outcome.status,
        location: outcome.location,
      },
    })),
    stateUpdate: {
      itemPatches: planned.map(({ item, outcome }) => ({
        itemId: item.itemId,
        changes: { status: outcome.status, location: outcome.location },
      })),
      productPatches: inventories
        .filter(({ moved }) => moved)
        .map(({ productId, inventory }) => ({ productId, changes: { inventory } })),
    },
  });
}

function ineligible(code: LedgerErrorCode, item: ItemCMS, message: string): never {
  throw new LedgerInvariantError(code, `Item ${item.itemId} ${message}`, {
    itemId: item.itemId,
    status: item.status,
  });
}

// =============================================================================
// Rules
// =============================================================================

/**
 * Only a minted item can be readied. Readying an item that is already
 * `ready`, or further along, is rejected with INELIGIBLE_TRANSITION rather
 * than skipped.
 */
export const readyForAuctionRule: TransitionRule = (item) => {
  if (!itemFSM.canTransition(item.status, "ready")) {
    ineligible(LedgerErrorCodes.INELIGIBLE_TRANSITION, item, `cannot be readied from "${item.status}"`);
  }
  if (!(item.isChipped && item.isDigitized)) {
    ineligible(LedgerErrorCodes.NOT_READY_FOR_AUCTION, item, "must be chipped and digitized");
  }
  return { eventType: "ItemReadied", status: "ready", location: item.location };
};

export const bidRule: TransitionRule = (item, flag) => {
  if (!flag || !itemFSM.canTransition(item.status, "bidded")) {
    ineligible(LedgerErrorCodes.ITEM_NOT_AVAILABLE_FOR_AUCTION, item, "is not available for auction");
  }
  return { eventType: "BidPlaced", status: "bidded", location: item.location };
};

export const saleRule: TransitionRule = (item, flag) => {
  if (!flag || !itemFSM.canTransition(item.status, "sold")) {
    ineligible(LedgerErrorCodes.ITEM_NOT_BIDDED, item, "has no bid to settle");
  }
  return { eventType: "ItemSold", status: "sold", location: item.location };
};

export const shippingRule: TransitionRule = (item, flag) => {
  if (!flag || !itemFSM.canTransition(item.status, "shipped")) {
    ineligible(LedgerErrorCodes.ITEM_NOT_SOLD, item, "is not sold");
  }
  return { eventType: "ItemShipped", status: "shipped", location: "TRANSIT" };
};

/**
 * Delivery leaves the status alone; the flag only picks the location.
 */
export const deliveryRule: TransitionRule = (item, flag) => {
  if (item.status !== "shipped") {
    ineligible(LedgerErrorCodes.ITEM_NOT_SHIPPED, item, "has not been shipped");
  }
  return flag
    ? { eventType: "ItemDelivered", status: "shipped", location: "BUYER" }
    : { eventType: "ItemReturned", status: "shipped", location: "TRANSIT" };
};

// =============================================================================
// Deciders
// =============================================================================

export function decideReadyForAuction(
  state: LedgerReadModel,
  command: ItemBatchInput,
  _context: DeciderContext
): BatchOutput {
  return decideBatchTransition(state, { itemIds: command.itemIds }, readyForAuctionRule);
}

export function decideSetBidStatus(
  state: LedgerReadModel,
  command: FlaggedItemBatchInput,
  _context: DeciderContext
): BatchOutput {
  return decideBatchTransition(state, command, bidRule);
}

export function decideSetSaleStatus(
  state: LedgerReadModel,
  command: FlaggedItemBatchInput,
  _context: DeciderContext
): BatchOutput {
  return decideBatchTransition(state, command, saleRule);
}

export function decideSetShippingStatus(
  state: LedgerReadModel,
  command: FlaggedItemBatchInput,
  _context: DeciderContext
): BatchOutput {
  return decideBatchTransition(state, command, shippingRule);
}

export function decideSetDeliveryStatus(
  state: LedgerReadModel,
  command: FlaggedItemBatchInput,
  _context: DeciderContext
): BatchOutput {
  return decideBatchTransition(state, command, deliveryRule);
}
