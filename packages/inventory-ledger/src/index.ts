/**
 * @serial-ledger/inventory-ledger
 *
 * Product catalog, serialized item registry and four-bucket inventory
 * accounting behind a permissioned, all-or-nothing command surface.
 *
 * @module @serial-ledger/inventory-ledger
 */

export {
  SupplyLedger,
  type SupplyLedgerOptions,
  type ItemStatusView,
  type LedgerAuditReport,
  type LedgerAuditViolation,
} from "./ledger.js";

export {
  createLedgerCommandHandlers,
  type CommandEnvelope,
  type LedgerCommandHandlers,
  type LedgerCommandRejected,
  type LedgerCommandResult,
  type LedgerHandlerDeps,
} from "./handlers/commands.js";
export { createLedgerCommandLogger } from "./handlers/_helpers.js";

export { loadLedgerConfig, defaultLedgerConfig, DEFAULT_CUSTODIAN, type LedgerConfig } from "./config.js";
export { LedgerEventLog, type RecordedEvent } from "./eventLog.js";
export { LedgerRepository } from "./repository.js";
export * from "./ports/index.js";

// Domain
export * from "./domain/variants.js";
export * from "./domain/product.js";
export * from "./domain/item.js";
export { itemFSM } from "./domain/itemFSM.js";
export * from "./domain/roles.js";
export * from "./domain/invariants.js";
export * from "./domain/accountant.js";
export * from "./domain/audit.js";
export * from "./domain/commands.js";
export * from "./domain/deciders/index.js";
