/**
 * Types for ledger decider functions.
 *
 * Deciders see the ledger through `LedgerReadModel` and answer with a
 * `LedgerStateUpdate` that the repository applies in one step after every
 * check has passed.
 */

import type { DeciderContext, DeciderEvent } from "@serial-ledger/platform-core";
import type { ItemCMS, ItemId, ItemLocation, ItemStatus } from "../item.js";
import type { InventoryBuckets, ProductCMS, ProductId } from "../product.js";
import type { LedgerRole } from "../roles.js";
import type { ItemAttributes } from "../commands.js";

export type { DeciderContext };

// =============================================================================
// State
// =============================================================================

export interface LedgerReadModel {
  findProduct(productId: ProductId): ProductCMS | null;
  findItem(itemId: ItemId): ItemCMS | null;
}

export interface RoleReadModel {
  hasRole(principal: string, role: LedgerRole): boolean;
  authorizedOperators(): string[];
}

export type ProductChanges = Partial<
  Pick<ProductCMS, "name" | "variants" | "quantityPerVariant" | "inventory">
>;

export type ItemChanges = Partial<
  Pick<
    ItemCMS,
    | "owner"
    | "owners"
    | "price"
    | "location"
    | "isChipped"
    | "isDigitized"
    | "status"
    | "metadataRef"
  >
>;

export interface LedgerStateUpdate {
  productInserts?: ProductCMS[];
  productPatches?: Array<{ productId: ProductId; changes: ProductChanges }>;
  itemInserts?: ItemCMS[];
  itemPatches?: Array<{ itemId: ItemId; changes: ItemChanges }>;
  itemRemovals?: ItemId[];
}

export interface RoleStateUpdate {
  grant?: { principal: string; role: LedgerRole };
  revoke?: { principal: string; role: LedgerRole };
}

// =============================================================================
// Event payloads
// =============================================================================

export interface ProductCreatedPayload {
  productId: ProductId;
  name: string;
  variants: string[];
  quantityPerVariant: number[];
}

export interface ProductUpdatedPayload {
  productId: ProductId;
  name: string;
  variants: string[];
  quantityPerVariant: number[];
}

export interface ItemMintedPayload {
  itemId: ItemId;
  productId: ProductId;
  owner: string;
  variants: string[];
  price: number;
  location: ItemLocation;
  metadataRef: string;
  inventory: InventoryBuckets;
}

export interface ItemUpdatedPayload {
  itemId: ItemId;
  changes: ItemAttributes;
}

export interface ItemTransferredPayload {
  itemId: ItemId;
  from: string;
  to: string;
}

/**
 * Shared by every batch lifecycle event; one event per item.
 */
export interface ItemLifecyclePayload {
  itemId: ItemId;
  productId: ProductId;
  from: ItemStatus;
  to: ItemStatus;
  location: ItemLocation;
}

export interface ItemBurnedPayload {
  itemId: ItemId;
  productId: ProductId;
  status: ItemStatus;
  inventory: InventoryBuckets;
  quantityPerVariant: number[];
}

export interface RoleChangedPayload {
  principal: string;
  role: LedgerRole;
}

// =============================================================================
// Events
// =============================================================================

export type ProductCreatedEvent = DeciderEvent<ProductCreatedPayload> & {
  eventType: "ProductCreated";
};

export type ProductUpdatedEvent = DeciderEvent<ProductUpdatedPayload> & {
  eventType: "ProductUpdated";
};

export type ItemMintedEvent = DeciderEvent<ItemMintedPayload> & { eventType: "ItemMinted" };

export type ItemUpdatedEvent = DeciderEvent<ItemUpdatedPayload> & { eventType: "ItemUpdated" };

export type ItemTransferredEvent = DeciderEvent<ItemTransferredPayload> & {
  eventType: "ItemTransferred";
};

export type ItemLifecycleEventType =
  | "ItemReadied"
  | "BidPlaced"
  | "ItemSold"
  | "ItemShipped"
  | "ItemDelivered"
  | "ItemReturned";

export type ItemLifecycleEvent = DeciderEvent<ItemLifecyclePayload> & {
  eventType: ItemLifecycleEventType;
};

export type ItemBurnedEvent = DeciderEvent<ItemBurnedPayload> & { eventType: "ItemBurned" };

export type RoleChangedEvent = DeciderEvent<RoleChangedPayload> & {
  eventType: "RoleGranted" | "RoleRevoked";
};

export type LedgerEvent =
  | ProductCreatedEvent
  | ProductUpdatedEvent
  | ItemMintedEvent
  | ItemUpdatedEvent
  | ItemTransferredEvent
  | ItemLifecycleEvent
  | ItemBurnedEvent
  | RoleChangedEvent;

// =============================================================================
// Decider inputs (ids the decider must not generate are pre-allocated)
// =============================================================================

export interface CreateProductInput {
  productId: ProductId;
  name: string;
  variants: string[];
  quantityPerVariant: number[];
  separator: string;
}

export interface UpdateProductInput {
  productId: ProductId;
  name: string;
  variants: string[];
  quantityPerVariant: number[];
  separator: string;
}

export interface MintItemInput {
  itemId: ItemId;
  productId: ProductId;
  custodian: string;
  variants: string[];
  price: number;
  location: ItemLocation;
  isChipped: boolean;
  isDigitized: boolean;
  metadataRef: string;
  separator: string;
}

export interface UpdateItemInput {
  itemId: ItemId;
  changes: ItemAttributes;
}

export interface TransferItemInput {
  itemId: ItemId;
  /** Holder according to the asset registry, read by the handler. */
  from: string;
  to: string;
}

export interface BurnItemInput {
  itemId: ItemId;
  separator: string;
}

export interface ItemBatchInput {
  itemIds: ItemId[];
}

export interface FlaggedItemBatchInput {
  itemIds: ItemId[];
  flags: boolean[];
}

export interface RoleChangeInput {
  principal: string;
  role: LedgerRole;
}

// =============================================================================
// Success data
// =============================================================================

export interface CreateProductData {
  productId: ProductId;
}

export interface UpdateProductData {
  productId: ProductId;
}

export interface MintItemData {
  itemId: ItemId;
  productId: ProductId;
  owner: string;
}

export interface UpdateItemData {
  itemId: ItemId;
}

export interface TransferItemData {
  itemId: ItemId;
  from: string;
  to: string;
}

export interface ItemBatchData {
  itemIds: ItemId[];
  /** Buckets after the batch, per touched product. */
  inventories: Array<{ productId: ProductId; inventory: InventoryBuckets }>;
}

export interface BurnItemData {
  itemId: ItemId;
  productId: ProductId;
}

export interface RoleChangeData {
  principal: string;
  role: LedgerRole;
  changed: boolean;
}
