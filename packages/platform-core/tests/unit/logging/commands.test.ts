/**
 * Unit tests for command lifecycle logging helpers.
 */
import { describe, it, expect, beforeEach } from "vitest";
import {
  createRecordingLogger,
  logCommandStart,
  logCommandSuccess,
  logCommandRejected,
  logCommandError,
  type BaseCommandLogContext,
} from "../../../src/logging/index.js";

const context: BaseCommandLogContext = {
  commandType: "MintItem",
  commandId: "cmd_test",
  correlationId: "corr_test",
};

describe("command logging helpers", () => {
  const logger = createRecordingLogger();

  beforeEach(() => {
    logger.clear();
  });

  it("logs start at INFO", () => {
    logCommandStart(logger, context);

    expect(logger.calls).toEqual([{ level: "INFO", message: "Command started", data: context }]);
  });

  it("logs success at INFO with the event types", () => {
    logCommandSuccess(logger, context, { eventTypes: ["ItemMinted"] });

    expect(logger.lastCallAt("INFO")).toEqual({
      level: "INFO",
      message: "Command succeeded",
      data: { ...context, eventTypes: ["ItemMinted"] },
    });
  });

  it("logs rejections at WARN with code and message", () => {
    logCommandRejected(logger, context, { code: "PRODUCT_NOT_FOUND", message: "Product 4 does not exist" });

    expect(logger.callsAt("WARN")).toEqual([
      {
        level: "WARN",
        message: "Command rejected",
        data: {
          ...context,
          rejectionCode: "PRODUCT_NOT_FOUND",
          rejectionMessage: "Product 4 does not exist",
        },
      },
    ]);
  });

  it("logs unexpected errors at ERROR with message and stack", () => {
    const failure = new Error("disk on fire");
    logCommandError(logger, context, failure);

    const call = logger.lastCallAt("ERROR");
    expect(call?.message).toBe("Command failed");
    expect(call?.data).toEqual({
      ...context,
      error: { message: "disk on fire", stack: failure.stack },
    });
  });

  it("stringifies non-Error throwables", () => {
    logCommandError(logger, context, "plain string");

    expect(logger.lastCallAt("ERROR")?.data).toEqual({ ...context, error: "plain string" });
  });

  it("clears recorded calls", () => {
    logCommandStart(logger, context);
    logger.clear();

    expect(logger.calls).toHaveLength(0);
    expect(logger.lastCallAt("INFO")).toBeUndefined();
  });
});
