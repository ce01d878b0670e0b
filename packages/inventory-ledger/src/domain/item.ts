/**
 * Item CMS (Command Model State).
 *
 * One serialized physical unit of a product. Its position in the lifecycle
 * is a single `status` field; the boolean lifecycle flags callers may still
 * expect are derived from it and cannot disagree with each other.
 */
import { z } from "zod";
import type { ProductId } from "./product.js";
import { itemFSM } from "./itemFSM.js";

export type ItemId = number;

export const ITEM_LOCATIONS = ["SELLER", "HQ", "PARTNER", "TRANSIT", "BUYER"] as const;

export const ItemLocationSchema = z.enum(ITEM_LOCATIONS);

export type ItemLocation = z.infer<typeof ItemLocationSchema>;

export const ITEM_STATUSES = ["minted", "ready", "bidded", "sold", "shipped"] as const;

export type ItemStatus = (typeof ITEM_STATUSES)[number];

export interface ItemCMS {
  itemId: ItemId;
  productId: ProductId;
  /** Cached holder; the asset registry is authoritative. */
  owner: string;
  /** Every holder in order, current holder last. */
  owners: string[];
  /** One label per product dimension. */
  variants: string[];
  price: number;
  location: ItemLocation;
  isChipped: boolean;
  isDigitized: boolean;
  status: ItemStatus;
  metadataRef: string;
  version: number;
  createdAt: number;
  updatedAt: number;
}

export interface LifecycleFlags {
  canAuction: boolean;
  hasBid: boolean;
  isSold: boolean;
  isShipped: boolean;
}

export function lifecycleFlags(status: ItemStatus): LifecycleFlags {
  const rank = itemFSM.rank(status);
  return {
    canAuction: rank >= itemFSM.rank("ready"),
    hasBid: rank >= itemFSM.rank("bidded"),
    isSold: rank >= itemFSM.rank("sold"),
    isShipped: rank >= itemFSM.rank("shipped"),
  };
}

export interface NewItemFields {
  itemId: ItemId;
  productId: ProductId;
  owner: string;
  variants: readonly string[];
  price: number;
  location: ItemLocation;
  isChipped: boolean;
  isDigitized: boolean;
  metadataRef: string;
}

export function createInitialItemCMS(fields: NewItemFields, now: number): ItemCMS {
  return {
    ...fields,
    variants: [...fields.variants],
    owners: [fields.owner],
    status: itemFSM.initial,
    version: 1,
    createdAt: now,
    updatedAt: now,
  };
}
