/**
 * Ledger repository.
 *
 * Product and item tables kept in process memory, plus the two id
 * counters. Deciders read through `LedgerReadModel`; writes arrive only as
 * whole `LedgerStateUpdate`s from a command that has already passed every
 * check.
 *
 * ```typescript
 * const product = repository.findProduct(0); // null when missing
 * repository.apply(output.stateUpdate, context.now);
 * ```
 */
import type { ItemCMS, ItemId } from "./domain/item.js";
import type { ProductCMS, ProductId } from "./domain/product.js";
import type { LedgerReadModel, LedgerStateUpdate } from "./domain/deciders/types.js";

export class LedgerRepository implements LedgerReadModel {
  private readonly products = new Map<ProductId, ProductCMS>();
  private readonly items = new Map<ItemId, ItemCMS>();
  private productCounter = 0;
  private itemCounter = 0;

  findProduct(productId: ProductId): ProductCMS | null {
    return this.products.get(productId) ?? null;
  }

  findItem(itemId: ItemId): ItemCMS | null {
    return this.items.get(itemId) ?? null;
  }

  /** Id the next created product will receive. */
  nextProductId(): ProductId {
    return this.productCounter;
  }

  /** Id the next minted item will receive. Burned ids are never reused. */
  nextItemId(): ItemId {
    return this.itemCounter;
  }

  allProducts(): ProductCMS[] {
    return [...this.products.values()];
  }

  itemsOfProduct(productId: ProductId): ItemCMS[] {
    return [...this.items.values()].filter((item) => item.productId === productId);
  }

  /**
   * Write every section of an update. Patched records get a new version and
   * `updatedAt`; inserts advance the id counters past their ids.
   */
  apply(update: LedgerStateUpdate, now: number): void {
    this.assertTargetsExist(update);

    for (const product of update.productInserts ?? []) {
      this.products.set(product.productId, product);
      this.productCounter = Math.max(this.productCounter, product.productId + 1);
    }
    for (const { productId, changes } of update.productPatches ?? []) {
      const current = this.products.get(productId);
      if (!current) continue;
      this.products.set(productId, {
        ...current,
        ...changes,
        version: current.version + 1,
        updatedAt: now,
      });
    }
    for (const item of update.itemInserts ?? []) {
      this.items.set(item.itemId, item);
      this.itemCounter = Math.max(this.itemCounter, item.itemId + 1);
    }
    for (const { itemId, changes } of update.itemPatches ?? []) {
      const current = this.items.get(itemId);
      if (!current) continue;
      this.items.set(itemId, { ...current, ...changes, version: current.version + 1, updatedAt: now });
    }
    for (const itemId of update.itemRemovals ?? []) {
      this.items.delete(itemId);
    }
  }

  /**
   * Patches must name records that exist (or are inserted by the same
   * update); checked up front so a bad update writes nothing.
   */
  private assertTargetsExist(update: LedgerStateUpdate): void {
    const insertedProducts = new Set((update.productInserts ?? []).map((p) => p.productId));
    const insertedItems = new Set((update.itemInserts ?? []).map((i) => i.itemId));
    for (const { productId } of update.productPatches ?? []) {
      if (!this.products.has(productId) && !insertedProducts.has(productId)) {
        throw new Error(`Cannot patch missing product ${productId}`);
      }
    }
    for (const { itemId } of update.itemPatches ?? []) {
      if (!this.items.has(itemId) && !insertedItems.has(itemId)) {
        throw new Error(`Cannot patch missing item ${itemId}`);
      }
    }
  }

  /**
   * Overwrite the cached holder after a registry read. Not a command: no
   * version bump and no event.
   */
  refreshOwner(itemId: ItemId, owner: string): void {
    const current = this.items.get(itemId);
    if (current && current.owner !== owner) {
      this.items.set(itemId, { ...current, owner });
    }
  }
}
