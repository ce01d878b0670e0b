/**
 * Role deciders.
 *
 * Granting a role a principal already holds, or revoking one it lacks,
 * succeeds without events.
 */

import { rejected, success, type DeciderOutput } from "@serial-ledger/platform-core";
import { LedgerErrorCodes } from "../invariants.js";
import { LEDGER_ROLES } from "../roles.js";
import type {
  DeciderContext,
  RoleChangeData,
  RoleChangedEvent,
  RoleChangeInput,
  RoleReadModel,
  RoleStateUpdate,
} from "./types.js";

type RoleOutput = DeciderOutput<RoleChangedEvent, RoleChangeData, RoleStateUpdate>;

function roleEvent(eventType: RoleChangedEvent["eventType"], command: RoleChangeInput): RoleChangedEvent {
  return {
    eventType,
    streamType: "Role",
    streamId: `role-${command.role}`,
    payload: { principal: command.principal, role: command.role },
  };
}

export function decideGrantRole(
  state: RoleReadModel,
  command: RoleChangeInput,
  _context: DeciderContext
): RoleOutput {
  const data = { principal: command.principal, role: command.role };
  if (state.hasRole(command.principal, command.role)) {
    return success({ data: { ...data, changed: false }, events: [], stateUpdate: {} });
  }
  return success({
    data: { ...data, changed: true },
    events: [roleEvent("RoleGranted", command)],
    stateUpdate: { grant: data },
  });
}

/**
 * Rejects (LAST_AUTHORIZED_OPERATOR) when the revocation would leave no
 * principal holding every role.
 */
export function decideRevokeRole(
  state: RoleReadModel,
  command: RoleChangeInput,
  _context: DeciderContext
): RoleOutput {
  const data = { principal: command.principal, role: command.role };
  if (!state.hasRole(command.principal, command.role)) {
    return success({ data: { ...data, changed: false }, events: [], stateUpdate: {} });
  }

  const remaining = state
    .authorizedOperators()
    .filter((principal) => principal !== command.principal);
  if (remaining.length === 0) {
    return rejected(
      LedgerErrorCodes.LAST_AUTHORIZED_OPERATOR,
      `Revoking "${command.role}" from ${command.principal} would leave no authorized operator`,
      { principal: command.principal, role: command.role, roles: [...LEDGER_ROLES] }
    );
  }

  return success({
    data: { ...data, changed: true },
    events: [roleEvent("RoleRevoked", command)],
    stateUpdate: { revoke: data },
  });
}
