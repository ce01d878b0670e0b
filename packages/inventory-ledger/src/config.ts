/**
 * Ledger configuration from environment variables.
 *
 * | Variable | Default |
 * |----------|---------|
 * | `LEDGER_LOG_LEVEL` | `INFO` |
 * | `LEDGER_VARIANT_SEPARATOR` | `BUFFER` |
 * | `LEDGER_CUSTODIAN` | `catalog-owner` |
 */
import { z } from "zod";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel } from "@serial-ledger/platform-core";
import { DEFAULT_VARIANT_SEPARATOR } from "./domain/variants.js";

export const DEFAULT_CUSTODIAN = "catalog-owner";

const LedgerEnvSchema = z.object({
  LEDGER_LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
  LEDGER_VARIANT_SEPARATOR: z.string().min(1).default(DEFAULT_VARIANT_SEPARATOR),
  LEDGER_CUSTODIAN: z.string().min(1).default(DEFAULT_CUSTODIAN),
});

export interface LedgerConfig {
  logLevel: LogLevel;
  /** Sentinel label that splits a product's variants into dimensions. */
  variantSeparator: string;
  /** Principal that receives every newly minted token. */
  custodian: string;
}

export function defaultLedgerConfig(): LedgerConfig {
  return {
    logLevel: DEFAULT_LOG_LEVEL,
    variantSeparator: DEFAULT_VARIANT_SEPARATOR,
    custodian: DEFAULT_CUSTODIAN,
  };
}

/**
 * @throws Error naming every invalid variable
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = LedgerEnvSchema.safeParse({
    LEDGER_LOG_LEVEL: env["LEDGER_LOG_LEVEL"],
    LEDGER_VARIANT_SEPARATOR: env["LEDGER_VARIANT_SEPARATOR"],
    LEDGER_CUSTODIAN: env["LEDGER_CUSTODIAN"],
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid ledger configuration: ${problems.join("; ")}`);
  }
  return {
    logLevel: parsed.data.LEDGER_LOG_LEVEL,
    variantSeparator: parsed.data.LEDGER_VARIANT_SEPARATOR,
    custodian: parsed.data.LEDGER_CUSTODIAN,
  };
}
