/**
 * Authorization gate.
 *
 * One composite capability: a principal may run mutating commands only
 * while it holds every ledger role.
 */
import { LEDGER_ROLES, type LedgerRole } from "../domain/roles.js";
import type { RoleReadModel } from "../domain/deciders/types.js";

export interface AuthorizationGate {
  isAuthorizedOperator(principal: string): boolean;
}

export class RoleRegistry implements AuthorizationGate, RoleReadModel {
  private readonly members = new Map<LedgerRole, Set<string>>(
    LEDGER_ROLES.map((role): [LedgerRole, Set<string>] => [role, new Set<string>()])
  );

  /**
   * @param operators - principals granted every role up front
   */
  constructor(operators: readonly string[] = []) {
    for (const principal of operators) {
      for (const role of LEDGER_ROLES) {
        this.grantRole(principal, role);
      }
    }
  }

  hasRole(principal: string, role: LedgerRole): boolean {
    return this.members.get(role)?.has(principal) ?? false;
  }

  grantRole(principal: string, role: LedgerRole): void {
    const holders = this.members.get(role) ?? new Set<string>();
    holders.add(principal);
    this.members.set(role, holders);
  }

  revokeRole(principal: string, role: LedgerRole): void {
    this.members.get(role)?.delete(principal);
  }

  isAuthorizedOperator(principal: string): boolean {
    return LEDGER_ROLES.every((role) => this.hasRole(principal, role));
  }

  authorizedOperators(): string[] {
    const candidates = this.members.get(LEDGER_ROLES[0]) ?? new Set<string>();
    return [...candidates].filter((principal) => this.isAuthorizedOperator(principal));
  }
}
