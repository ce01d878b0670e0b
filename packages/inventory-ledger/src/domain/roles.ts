/**
 * Operator roles.
 *
 * A principal is an authorized operator only while it holds every role.
 */
import { z } from "zod";

export const LEDGER_ROLES = ["catalog-owner", "trusted-verifier"] as const;

export const LedgerRoleSchema = z.enum(LEDGER_ROLES);

export type LedgerRole = z.infer<typeof LedgerRoleSchema>;
