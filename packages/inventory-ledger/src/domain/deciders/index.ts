/**
 * Ledger deciders - pure decision functions.
 */

export { decideCreateProduct } from "./createProduct.js";
export { decideUpdateProduct } from "./updateProduct.js";
export { decideMintItem } from "./mintItem.js";
export { decideUpdateItem } from "./updateItem.js";
export { decideTransferItem } from "./transferItem.js";
export { decideBurnItem } from "./burnItem.js";
export {
  decideBatchTransition,
  decideReadyForAuction,
  decideSetBidStatus,
  decideSetSaleStatus,
  decideSetShippingStatus,
  decideSetDeliveryStatus,
  readyForAuctionRule,
  bidRule,
  saleRule,
  shippingRule,
  deliveryRule,
  type TransitionOutcome,
  type TransitionRule,
} from "./batch.js";
export { decideGrantRole, decideRevokeRole } from "./roles.js";
export * from "./types.js";
