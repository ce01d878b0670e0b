/**
 * Item lifecycle state machine.
 *
 * - minted → ready   (ReadyForAuction, requires chipped + digitized)
 * - ready → bidded   (SetBidStatus, available → reserved)
 * - bidded → sold    (SetSaleStatus, reserved → sold)
 * - sold → shipped   (SetShippingStatus, sold → shipped)
 * - shipped          terminal; delivery and returns only move `location`
 */
import { defineFSM } from "@serial-ledger/platform-core";
import type { ItemStatus } from "./item.js";

export const itemFSM = defineFSM<ItemStatus>({
  initial: "minted",
  transitions: {
    minted: ["ready"],
    ready: ["bidded"],
    bidded: ["sold"],
    sold: ["shipped"],
    shipped: [],
  },
});
