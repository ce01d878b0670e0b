/**
 * SupplyLedger: the public face of the inventory ledger.
 *
 * Mutating methods take the calling principal first, run the matching
 * command handler and throw `LedgerInvariantError` on rejection. Callers
 * that prefer result objects use `ledger.commands` directly.
 *
 * @example
 * ```typescript
 * const ledger = new SupplyLedger({ bootstrapOperators: ["catalog-owner"] });
 * const productId = ledger.createProduct("catalog-owner", "Field Jacket", ["S", "M"], [2, 2]);
 * const itemId = ledger.mintItem("catalog-owner", {
 *   productId,
 *   variants: ["S"],
 *   price: 120,
 *   location: "HQ",
 *   isChipped: true,
 *   isDigitized: true,
 *   metadataRef: "meta/0",
 * });
 * ledger.readyForAuction("catalog-owner", [itemId]);
 * ```
 */
import type { InvariantSetResult, InvariantViolation, Logger } from "@serial-ledger/platform-core";
import { loadLedgerConfig, type LedgerConfig } from "./config.js";
import { ledgerAuditInvariants } from "./domain/audit.js";
import type { ItemAttributes, MintItemArgs } from "./domain/commands.js";
import {
  assertItemExists,
  assertProductExists,
  isLedgerErrorCode,
  LedgerErrorCodes,
  LedgerInvariantError,
  type LedgerErrorCode,
} from "./domain/invariants.js";
import {
  lifecycleFlags,
  type ItemCMS,
  type ItemId,
  type ItemStatus,
  type LifecycleFlags,
} from "./domain/item.js";
import { toInventoryTuple, type ProductCMS, type ProductId } from "./domain/product.js";
import type { LedgerRole } from "./domain/roles.js";
import { LedgerEventLog, type RecordedEvent } from "./eventLog.js";
import {
  createLedgerCommandHandlers,
  type CommandEnvelope,
  type LedgerCommandHandlers,
  type LedgerCommandResult,
} from "./handlers/commands.js";
import { createLedgerCommandLogger } from "./handlers/_helpers.js";
import { InMemoryAssetRegistry, type AssetRegistry } from "./ports/assetRegistry.js";
import { RoleRegistry } from "./ports/authorization.js";
import { LedgerRepository } from "./repository.js";

export interface SupplyLedgerOptions {
  /** Defaults to `loadLedgerConfig()` over `process.env`. */
  config?: LedgerConfig;
  assetRegistry?: AssetRegistry;
  /** Role registry to use; built from `bootstrapOperators` when omitted. */
  roles?: RoleRegistry;
  /** Principals granted every role at construction. Defaults to `[config.custodian]`. */
  bootstrapOperators?: readonly string[];
  /** Tables to run against, e.g. state restored from elsewhere. */
  repository?: LedgerRepository;
  logger?: Logger;
  clock?: () => number;
}

export interface ItemStatusView extends LifecycleFlags {
  status: ItemStatus;
}

export interface LedgerAuditViolation extends InvariantViolation<LedgerErrorCode> {
  productId: ProductId;
}

export type LedgerAuditReport =
  | { valid: true; productsChecked: number }
  | { valid: false; productsChecked: number; violations: LedgerAuditViolation[] };

function unwrap<TData>(result: LedgerCommandResult<TData>): TData {
  if (result.status === "rejected") {
    const code = isLedgerErrorCode(result.code) ? result.code : LedgerErrorCodes.INVALID_COMMAND;
    throw new LedgerInvariantError(code, result.message, result.context);
  }
  return result.data;
}

export class SupplyLedger {
  readonly commands: LedgerCommandHandlers;
  readonly config: LedgerConfig;

  private readonly repository: LedgerRepository;
  private readonly eventLog = new LedgerEventLog();
  private readonly assetRegistry: AssetRegistry;
  private readonly roles: RoleRegistry;
  private readonly logger: Logger;

  constructor(options: SupplyLedgerOptions = {}) {
    this.config = options.config ?? loadLedgerConfig();
    this.repository = options.repository ?? new LedgerRepository();
    this.assetRegistry = options.assetRegistry ?? new InMemoryAssetRegistry();
    this.roles = options.roles ?? new RoleRegistry(options.bootstrapOperators ?? [this.config.custodian]);
    this.logger = options.logger ?? createLedgerCommandLogger(this.config.logLevel);

    this.commands = createLedgerCommandHandlers({
      repository: this.repository,
      eventLog: this.eventLog,
      assetRegistry: this.assetRegistry,
      roles: this.roles,
      config: this.config,
      logger: this.logger,
      clock: options.clock ?? Date.now,
    });
  }

  private envelope(caller: string): CommandEnvelope {
    return { caller };
  }

  // ===========================================================================
  // Catalog
  // ===========================================================================

  createProduct(
    caller: string,
    name: string,
    variants: string[],
    quantityPerVariant: number[]
  ): ProductId {
    return unwrap(
      this.commands.createProduct(this.envelope(caller), { name, variants, quantityPerVariant })
    ).productId;
  }

  updateProduct(
    caller: string,
    productId: ProductId,
    name: string,
    variants: string[],
    quantityPerVariant: number[]
  ): void {
    unwrap(
      this.commands.updateProduct(this.envelope(caller), {
        productId,
        name,
        variants,
        quantityPerVariant,
      })
    );
  }

  // ===========================================================================
  // Items
  // ===========================================================================

  mintItem(caller: string, args: MintItemArgs): ItemId {
    return unwrap(this.commands.mintItem(this.envelope(caller), args)).itemId;
  }

  updateItem(caller: string, itemId: ItemId, changes: ItemAttributes): void {
    unwrap(this.commands.updateItem(this.envelope(caller), { itemId, changes }));
  }

  transferItem(caller: string, itemId: ItemId, to: string): void {
    unwrap(this.commands.transferItem(this.envelope(caller), { itemId, to }));
  }

  burn(caller: string, itemId: ItemId): void {
    unwrap(this.commands.burnItem(this.envelope(caller), { itemId }));
  }

  // ===========================================================================
  // Lifecycle batches
  // ===========================================================================

  readyForAuction(caller: string, itemIds: ItemId[]): void {
    unwrap(this.commands.readyForAuction(this.envelope(caller), { itemIds }));
  }

  setBidStatus(caller: string, itemIds: ItemId[], flags: boolean[]): void {
    unwrap(this.commands.setBidStatus(this.envelope(caller), { itemIds, flags }));
  }

  setSaleStatus(caller: string, itemIds: ItemId[], flags: boolean[]): void {
    unwrap(this.commands.setSaleStatus(this.envelope(caller), { itemIds, flags }));
  }

  setShippingStatus(caller: string, itemIds: ItemId[], flags: boolean[]): void {
    unwrap(this.commands.setShippingStatus(this.envelope(caller), { itemIds, flags }));
  }

  setDeliveryStatus(caller: string, itemIds: ItemId[], flags: boolean[]): void {
    unwrap(this.commands.setDeliveryStatus(this.envelope(caller), { itemIds, flags }));
  }

  // ===========================================================================
  // Roles
  // ===========================================================================

  grantRole(caller: string, principal: string, role: LedgerRole): void {
    unwrap(this.commands.grantRole(this.envelope(caller), { principal, role }));
  }

  revokeRole(caller: string, principal: string, role: LedgerRole): void {
    unwrap(this.commands.revokeRole(this.envelope(caller), { principal, role }));
  }

  hasRole(principal: string, role: LedgerRole): boolean {
    return this.roles.hasRole(principal, role);
  }

  isAuthorizedOperator(principal: string): boolean {
    return this.roles.isAuthorizedOperator(principal);
  }

  // ===========================================================================
  // Reads (copies; mutating them does not touch the ledger)
  // ===========================================================================

  getProduct(productId: ProductId): ProductCMS {
    const product = this.repository.findProduct(productId);
    assertProductExists(product, productId);
    return structuredClone(product);
  }

  /** Buckets as `[available, reserved, sold, shipped]`. */
  getProductInventory(productId: ProductId): [number, number, number, number] {
    const product = this.repository.findProduct(productId);
    assertProductExists(product, productId);
    return toInventoryTuple(product.inventory);
  }

  getItem(itemId: ItemId): ItemCMS {
    return structuredClone(this.requireItem(itemId));
  }

  getItemVariants(itemId: ItemId): string[] {
    return [...this.requireItem(itemId).variants];
  }

  getItemStatus(itemId: ItemId): ItemStatusView {
    const { status } = this.requireItem(itemId);
    return { status, ...lifecycleFlags(status) };
  }

  /**
   * Holder according to the asset registry; the cached owner is refreshed
   * from it. Falls back to the cache when the registry has no such token.
   */
  getItemOwner(itemId: ItemId): string {
    const item = this.requireItem(itemId);
    const holder = this.assetRegistry.ownerOf(itemId);
    if (holder === null) {
      return item.owner;
    }
    this.repository.refreshOwner(itemId, holder);
    return holder;
  }

  getItemMetadataRef(itemId: ItemId): string {
    return this.requireItem(itemId).metadataRef;
  }

  /** Id the next created product will receive. */
  getProductId(): ProductId {
    return this.repository.nextProductId();
  }

  /** Id the next minted item will receive. */
  getItemId(): ItemId {
    return this.repository.nextItemId();
  }

  getEvents(): RecordedEvent[] {
    return this.eventLog.all();
  }

  // ===========================================================================
  // Audit
  // ===========================================================================

  /**
   * Check every product against its live items. Never throws; the report
   * lists every violation found.
   */
  verifyLedger(): LedgerAuditReport {
    const products = this.repository.allProducts();
    const violations: LedgerAuditViolation[] = [];

    for (const product of products) {
      const result: InvariantSetResult<LedgerErrorCode> = ledgerAuditInvariants.validateAll({
        product,
        items: this.repository.itemsOfProduct(product.productId),
      });
      if (!result.valid) {
        violations.push(
          ...result.violations.map((violation) => ({ ...violation, productId: product.productId }))
        );
      }
    }

    this.logger.report("Ledger verified", {
      productsChecked: products.length,
      violationCount: violations.length,
    });

    return violations.length === 0
      ? { valid: true, productsChecked: products.length }
      : { valid: false, productsChecked: products.length, violations };
  }

  private requireItem(itemId: ItemId): ItemCMS {
    const item = this.repository.findItem(itemId);
    assertItemExists(item, itemId);
    return item;
  }
}
