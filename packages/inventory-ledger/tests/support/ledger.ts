/**
 * Shared fixtures for ledger tests.
 */
import { createNoOpLogger } from "@serial-ledger/platform-core";
import {
  SupplyLedger,
  defaultLedgerConfig,
  type MintItemArgs,
  type ProductId,
  type SupplyLedgerOptions,
} from "../../src/index.js";

export const OPERATOR = "catalog-owner";
export const OUTSIDER = "outsider";
export const FIXED_NOW = 1_700_000_000_000;

export const JACKET_VARIANTS = ["S", "M", "BUFFER", "red", "blue"];
export const JACKET_QUANTITIES = [2, 1, 0, 2, 1];

export function createTestLedger(options: SupplyLedgerOptions = {}): SupplyLedger {
  return new SupplyLedger({
    config: defaultLedgerConfig(),
    logger: createNoOpLogger(),
    clock: () => FIXED_NOW,
    ...options,
  });
}

/**
 * Product 0 of a fresh ledger: sizes S(2) M(1), colours red(2) blue(1).
 */
export function createJacket(ledger: SupplyLedger): ProductId {
  return ledger.createProduct(OPERATOR, "Field Jacket", [...JACKET_VARIANTS], [...JACKET_QUANTITIES]);
}

export function mintArgs(productId: ProductId, overrides: Partial<MintItemArgs> = {}): MintItemArgs {
  return {
    productId,
    variants: ["S", "red"],
    price: 120,
    location: "HQ",
    isChipped: true,
    isDigitized: true,
    metadataRef: "meta/jacket",
    ...overrides,
  };
}

/**
 * Run `fn` and return what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}
