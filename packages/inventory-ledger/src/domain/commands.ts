/**
 * Ledger command arguments.
 *
 * These schemas only check shape. Counting rules (parity, quantities,
 * dimension totals) belong to the deciders so they report their own codes.
 */
import { z } from "zod";
import { ItemLocationSchema } from "./item.js";
import { LedgerRoleSchema } from "./roles.js";

const EntityIdSchema = z.number().int().nonnegative();

const LabelListSchema = z.array(z.string());

const QuantityListSchema = z.array(z.number().finite());

// =============================================================================
// Catalog
// =============================================================================

export const CreateProductArgsSchema = z.object({
  name: z.string().min(1),
  variants: LabelListSchema,
  quantityPerVariant: QuantityListSchema,
});

export type CreateProductArgs = z.infer<typeof CreateProductArgsSchema>;

export const UpdateProductArgsSchema = CreateProductArgsSchema.extend({
  productId: EntityIdSchema,
});

export type UpdateProductArgs = z.infer<typeof UpdateProductArgsSchema>;

// =============================================================================
// Items
// =============================================================================

export const MintItemArgsSchema = z.object({
  productId: EntityIdSchema,
  variants: LabelListSchema,
  price: z.number().finite().nonnegative(),
  location: ItemLocationSchema,
  isChipped: z.boolean(),
  isDigitized: z.boolean(),
  metadataRef: z.string(),
});

export type MintItemArgs = z.infer<typeof MintItemArgsSchema>;

export const ItemAttributesSchema = z
  .object({
    price: z.number().finite().nonnegative(),
    location: ItemLocationSchema,
    isChipped: z.boolean(),
    isDigitized: z.boolean(),
    metadataRef: z.string(),
  })
  .partial()
  .strict();

export type ItemAttributes = z.infer<typeof ItemAttributesSchema>;

export const UpdateItemArgsSchema = z.object({
  itemId: EntityIdSchema,
  changes: ItemAttributesSchema,
});

export type UpdateItemArgs = z.infer<typeof UpdateItemArgsSchema>;

export const TransferItemArgsSchema = z.object({
  itemId: EntityIdSchema,
  to: z.string().min(1),
});

export type TransferItemArgs = z.infer<typeof TransferItemArgsSchema>;

export const BurnItemArgsSchema = z.object({
  itemId: EntityIdSchema,
});

export type BurnItemArgs = z.infer<typeof BurnItemArgsSchema>;

// =============================================================================
// Lifecycle batches
// =============================================================================

export const ItemBatchArgsSchema = z.object({
  itemIds: z.array(EntityIdSchema),
});

export type ItemBatchArgs = z.infer<typeof ItemBatchArgsSchema>;

/**
 * `flags[i]` answers for `itemIds[i]`; lengths are compared by the decider.
 */
export const FlaggedItemBatchArgsSchema = ItemBatchArgsSchema.extend({
  flags: z.array(z.boolean()),
});

export type FlaggedItemBatchArgs = z.infer<typeof FlaggedItemBatchArgsSchema>;

// =============================================================================
// Roles
// =============================================================================

export const RoleChangeArgsSchema = z.object({
  principal: z.string().min(1),
  role: LedgerRoleSchema,
});

export type RoleChangeArgs = z.infer<typeof RoleChangeArgsSchema>;
