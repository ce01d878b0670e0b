/**
 * Unit tests for id generation and branding.
 */
import { describe, it, expect } from "vitest";
import {
  generateCommandId,
  generateCorrelationId,
  generateEventId,
  toCommandId,
  toCorrelationId,
  toEventId,
  isValidIdString,
} from "../../../src/ids/index.js";

const UUID_V7 = "[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}";

describe("generators", () => {
  it("prefix command ids with cmd_", () => {
    expect(generateCommandId()).toMatch(new RegExp(`^cmd_${UUID_V7}$`));
  });

  it("prefix correlation ids with corr_", () => {
    expect(generateCorrelationId()).toMatch(new RegExp(`^corr_${UUID_V7}$`));
  });

  it("prefix event ids with their context", () => {
    expect(generateEventId("ledger")).toMatch(new RegExp(`^ledger_event_${UUID_V7}$`));
  });

  it("produce distinct ids", () => {
    expect(generateCommandId()).not.toBe(generateCommandId());
  });

  it("reject event contexts that are not lowercase alphanumeric", () => {
    expect(() => generateEventId("Ledger")).toThrow(
      'Invalid event context "Ledger": use lowercase letters and digits only'
    );
    expect(() => generateEventId("ledger_x")).toThrow();
    expect(() => generateEventId("")).toThrow();
  });
});

describe("branding", () => {
  it("passes non-empty strings through unchanged", () => {
    expect(toCommandId("cmd_1")).toBe("cmd_1");
    expect(toCorrelationId("corr_1")).toBe("corr_1");
    expect(toEventId("ledger_event_1")).toBe("ledger_event_1");
  });

  it("refuses empty strings", () => {
    expect(() => toCommandId("")).toThrow("Invalid CommandId: must be a non-empty string");
    expect(() => toEventId("")).toThrow("Invalid EventId: must be a non-empty string");
  });

  it("isValidIdString accepts only non-empty strings", () => {
    expect(isValidIdString("x")).toBe(true);
    expect(isValidIdString("")).toBe(false);
    expect(isValidIdString(7)).toBe(false);
    expect(isValidIdString(undefined)).toBe(false);
  });
});
