/**
 * Ledger command handlers.
 *
 * Every handler follows the same pipeline:
 * 1. Build the decider context (clock, command and correlation ids)
 * 2. Check the caller is an authorized operator
 * 3. Parse the arguments
 * 4. Decide (pure; rejections stop here)
 * 5. Call the external port, if the command has one
 * 6. Apply the state update in one step
 * 7. Append the events
 *
 * A rejection at any step leaves the tables, the registry and the event
 * log untouched. Unexpected errors are logged and rethrown.
 */
import type { z } from "zod";
import {
  generateCommandId,
  generateCorrelationId,
  rejectedResult,
  successResult,
  TRACE_TIMING,
  type CommandRejected,
  type CommandSuccess,
  type DeciderContext,
  type DeciderEvent,
  type DeciderOutput,
  type Logger,
  type UnknownRecord,
} from "@serial-ledger/platform-core";
import {
  BurnItemArgsSchema,
  CreateProductArgsSchema,
  FlaggedItemBatchArgsSchema,
  ItemBatchArgsSchema,
  MintItemArgsSchema,
  RoleChangeArgsSchema,
  TransferItemArgsSchema,
  UpdateItemArgsSchema,
  UpdateProductArgsSchema,
  type BurnItemArgs,
  type CreateProductArgs,
  type FlaggedItemBatchArgs,
  type ItemBatchArgs,
  type MintItemArgs,
  type RoleChangeArgs,
  type TransferItemArgs,
  type UpdateItemArgs,
  type UpdateProductArgs,
} from "../domain/commands.js";
import {
  decideBurnItem,
  decideCreateProduct,
  decideGrantRole,
  decideMintItem,
  decideReadyForAuction,
  decideRevokeRole,
  decideSetBidStatus,
  decideSetDeliveryStatus,
  decideSetSaleStatus,
  decideSetShippingStatus,
  decideTransferItem,
  decideUpdateItem,
  decideUpdateProduct,
  type LedgerStateUpdate,
  type RoleStateUpdate,
} from "../domain/deciders/index.js";
import {
  LedgerErrorCodes,
  ledgerErrorCategory,
  type LedgerErrorCategory,
} from "../domain/invariants.js";
import type { LedgerConfig } from "../config.js";
import type { LedgerEventLog, RecordedEvent } from "../eventLog.js";
import type { LedgerRepository } from "../repository.js";
import type { AssetRegistry, RegistryResult } from "../ports/assetRegistry.js";
import type { RoleRegistry } from "../ports/authorization.js";
import {
  logCommandError,
  logCommandRejected,
  logCommandStart,
  logCommandSuccess,
  type LedgerCommandLogContext,
} from "./_helpers.js";

export type {
  CreateProductData,
  UpdateProductData,
  MintItemData,
  UpdateItemData,
  TransferItemData,
  ItemBatchData,
  BurnItemData,
  RoleChangeData,
} from "../domain/deciders/types.js";

/**
 * Who is asking, plus optional ids to thread through from an upstream
 * request. Missing ids are generated.
 */
export interface CommandEnvelope {
  caller: string;
  commandId?: string;
  correlationId?: string;
}

export type LedgerCommandRejected = CommandRejected & { category: LedgerErrorCategory };

export type LedgerCommandResult<TData> =
  | CommandSuccess<TData, RecordedEvent>
  | LedgerCommandRejected;

export interface LedgerHandlerDeps {
  repository: LedgerRepository;
  eventLog: LedgerEventLog;
  assetRegistry: AssetRegistry;
  roles: RoleRegistry;
  config: LedgerConfig;
  logger: Logger;
  clock: () => number;
}

interface HandlerSpec<TArgs, TCommand, TEvent extends DeciderEvent, TData, TUpdate> {
  commandType: string;
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  /** Adds what the decider must not generate: allocated ids, config. */
  toCommand: (args: TArgs) => TCommand;
  decide: (command: TCommand, context: DeciderContext) => DeciderOutput<TEvent, TData, TUpdate>;
  /** External side effect, run after a successful decision and before apply. */
  beforeApply?: (command: TCommand) => RegistryResult;
  apply: (update: TUpdate, now: number) => void;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function createLedgerCommandHandlers(deps: LedgerHandlerDeps) {
  const { repository, eventLog, assetRegistry, roles, config, logger, clock } = deps;
  const separator = config.variantSeparator;

  function execute<TArgs, TCommand, TEvent extends DeciderEvent, TData, TUpdate>(
    spec: HandlerSpec<TArgs, TCommand, TEvent, TData, TUpdate>,
    envelope: CommandEnvelope,
    args: TArgs
  ): LedgerCommandResult<TData> {
    const context: DeciderContext = {
      now: clock(),
      commandId: envelope.commandId ?? generateCommandId(),
      correlationId: envelope.correlationId ?? generateCorrelationId(),
    };
    const logContext: LedgerCommandLogContext = {
      commandType: spec.commandType,
      commandId: context.commandId,
      correlationId: context.correlationId,
      caller: envelope.caller,
    };

    const reject = (code: string, message: string, details?: UnknownRecord): LedgerCommandRejected => {
      logCommandRejected(logger, logContext, { code, message });
      return { ...rejectedResult(code, message, context, details), category: ledgerErrorCategory(code) };
    };

    logCommandStart(logger, logContext);

    try {
      if (!roles.isAuthorizedOperator(envelope.caller)) {
        return reject(
          LedgerErrorCodes.UNAUTHORIZED_OPERATOR,
          `${envelope.caller} is not an authorized operator`,
          { caller: envelope.caller }
        );
      }

      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        return reject(LedgerErrorCodes.INVALID_COMMAND, formatIssues(parsed.error), {
          issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
        });
      }

      const command = spec.toCommand(parsed.data);
      logger.debug("Deciding", { ...logContext, command });
      logger.trace("Decide", { timing: TRACE_TIMING.START });
      const output = spec.decide(command, context);
      logger.trace("Decide", { timing: TRACE_TIMING.END });
      if (output.status === "rejected") {
        return reject(output.code, output.message, output.context);
      }

      const external = spec.beforeApply?.(command);
      if (external && !external.ok) {
        return reject(LedgerErrorCodes.ASSET_REGISTRY_REJECTED, external.reason);
      }

      spec.apply(output.stateUpdate, context.now);
      const recorded = eventLog.append(output.events, context);

      logCommandSuccess(logger, logContext, {
        eventTypes: recorded.map((event) => event.eventType),
      });
      return successResult(output.data, recorded, context);
    } catch (error) {
      logCommandError(logger, logContext, error);
      throw error;
    }
  }

  const applyLedger = (update: LedgerStateUpdate, now: number): void => repository.apply(update, now);

  const applyRoles = (update: RoleStateUpdate): void => {
    if (update.grant) roles.grantRole(update.grant.principal, update.grant.role);
    if (update.revoke) roles.revokeRole(update.revoke.principal, update.revoke.role);
  };

  return {
    createProduct: (envelope: CommandEnvelope, args: CreateProductArgs) =>
      execute(
        {
          commandType: "CreateProduct",
          schema: CreateProductArgsSchema,
          toCommand: (a) => ({ ...a, productId: repository.nextProductId(), separator }),
          decide: (command, context) => decideCreateProduct(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    updateProduct: (envelope: CommandEnvelope, args: UpdateProductArgs) =>
      execute(
        {
          commandType: "UpdateProduct",
          schema: UpdateProductArgsSchema,
          toCommand: (a) => ({ ...a, separator }),
          decide: (command, context) => decideUpdateProduct(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    mintItem: (envelope: CommandEnvelope, args: MintItemArgs) =>
      execute(
        {
          commandType: "MintItem",
          schema: MintItemArgsSchema,
          toCommand: (a) => ({
            ...a,
            itemId: repository.nextItemId(),
            custodian: config.custodian,
            separator,
          }),
          decide: (command, context) => decideMintItem(repository, command, context),
          beforeApply: (command) => assetRegistry.mint(command.custodian, command.itemId),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    updateItem: (envelope: CommandEnvelope, args: UpdateItemArgs) =>
      execute(
        {
          commandType: "UpdateItem",
          schema: UpdateItemArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideUpdateItem(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    transferItem: (envelope: CommandEnvelope, args: TransferItemArgs) =>
      execute(
        {
          commandType: "TransferItem",
          schema: TransferItemArgsSchema,
          toCommand: (a) => ({
            ...a,
            from: assetRegistry.ownerOf(a.itemId) ?? repository.findItem(a.itemId)?.owner ?? "",
          }),
          decide: (command, context) => decideTransferItem(repository, command, context),
          beforeApply: (command) => assetRegistry.transfer(command.from, command.to, command.itemId),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    readyForAuction: (envelope: CommandEnvelope, args: ItemBatchArgs) =>
      execute(
        {
          commandType: "ReadyForAuction",
          schema: ItemBatchArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideReadyForAuction(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    setBidStatus: (envelope: CommandEnvelope, args: FlaggedItemBatchArgs) =>
      execute(
        {
          commandType: "SetBidStatus",
          schema: FlaggedItemBatchArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideSetBidStatus(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    setSaleStatus: (envelope: CommandEnvelope, args: FlaggedItemBatchArgs) =>
      execute(
        {
          commandType: "SetSaleStatus",
          schema: FlaggedItemBatchArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideSetSaleStatus(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    setShippingStatus: (envelope: CommandEnvelope, args: FlaggedItemBatchArgs) =>
      execute(
        {
          commandType: "SetShippingStatus",
          schema: FlaggedItemBatchArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideSetShippingStatus(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    setDeliveryStatus: (envelope: CommandEnvelope, args: FlaggedItemBatchArgs) =>
      execute(
        {
          commandType: "SetDeliveryStatus",
          schema: FlaggedItemBatchArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideSetDeliveryStatus(repository, command, context),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    burnItem: (envelope: CommandEnvelope, args: BurnItemArgs) =>
      execute(
        {
          commandType: "BurnItem",
          schema: BurnItemArgsSchema,
          toCommand: (a) => ({ ...a, separator }),
          decide: (command, context) => decideBurnItem(repository, command, context),
          beforeApply: (command) => assetRegistry.burn(command.itemId),
          apply: applyLedger,
        },
        envelope,
        args
      ),

    grantRole: (envelope: CommandEnvelope, args: RoleChangeArgs) =>
      execute(
        {
          commandType: "GrantRole",
          schema: RoleChangeArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideGrantRole(roles, command, context),
          apply: applyRoles,
        },
        envelope,
        args
      ),

    revokeRole: (envelope: CommandEnvelope, args: RoleChangeArgs) =>
      execute(
        {
          commandType: "RevokeRole",
          schema: RoleChangeArgsSchema,
          toCommand: (a) => a,
          decide: (command, context) => decideRevokeRole(roles, command, context),
          apply: applyRoles,
        },
        envelope,
        args
      ),
  };
}

export type LedgerCommandHandlers = ReturnType<typeof createLedgerCommandHandlers>;
