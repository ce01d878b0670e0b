/**
 * Unique-asset registry port.
 *
 * The registry owns the token for every item and is the authority on who
 * holds it. The ledger only caches the holder.
 */
import type { ItemId } from "../domain/item.js";

export type RegistryResult = { ok: true } | { ok: false; reason: string };

export interface AssetRegistry {
  mint(owner: string, tokenId: ItemId): RegistryResult;
  burn(tokenId: ItemId): RegistryResult;
  /** Current holder, or null for a token that does not exist. */
  ownerOf(tokenId: ItemId): string | null;
  transfer(from: string, to: string, tokenId: ItemId): RegistryResult;
}

/**
 * Registry kept in process memory.
 */
export class InMemoryAssetRegistry implements AssetRegistry {
  private readonly holders = new Map<ItemId, string>();

  mint(owner: string, tokenId: ItemId): RegistryResult {
    if (this.holders.has(tokenId)) {
      return { ok: false, reason: `Token ${tokenId} already exists` };
    }
    this.holders.set(tokenId, owner);
    return { ok: true };
  }

  burn(tokenId: ItemId): RegistryResult {
    if (!this.holders.delete(tokenId)) {
      return { ok: false, reason: `Token ${tokenId} does not exist` };
    }
    return { ok: true };
  }

  ownerOf(tokenId: ItemId): string | null {
    return this.holders.get(tokenId) ?? null;
  }

  transfer(from: string, to: string, tokenId: ItemId): RegistryResult {
    const holder = this.holders.get(tokenId);
    if (holder === undefined) {
      return { ok: false, reason: `Token ${tokenId} does not exist` };
    }
    if (holder !== from) {
      return { ok: false, reason: `Token ${tokenId} is held by ${holder}, not ${from}` };
    }
    this.holders.set(tokenId, to);
    return { ok: true };
  }

  /** Number of live tokens. */
  get size(): number {
    return this.holders.size;
  }
}
