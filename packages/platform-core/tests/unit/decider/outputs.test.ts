/**
 * Unit tests for decider output helpers.
 */
import { describe, it, expect } from "vitest";
import {
  success,
  rejected,
  isSuccess,
  isRejected,
  type DeciderEvent,
  type DeciderOutput,
} from "../../../src/decider/index.js";

type CountedEvent = DeciderEvent<{ count: number }> & { eventType: "Counted" };

function decideCount(
  current: number,
  add: number
): DeciderOutput<CountedEvent, { total: number }, { total: number }> {
  if (add <= 0) {
    return rejected("INVALID_QUANTITY", "Amount must be positive", { add });
  }
  const total = current + add;
  return success({
    data: { total },
    events: [
      { eventType: "Counted" as const, streamType: "Counter", streamId: "c-1", payload: { count: add } },
    ],
    stateUpdate: { total },
  });
}

describe("success", () => {
  it("tags the output and keeps every field", () => {
    const output = decideCount(2, 3);

    expect(output).toEqual({
      status: "success",
      data: { total: 5 },
      events: [{ eventType: "Counted", streamType: "Counter", streamId: "c-1", payload: { count: 3 } }],
      stateUpdate: { total: 5 },
    });
  });
});

describe("rejected", () => {
  it("carries code, message and context", () => {
    expect(decideCount(2, 0)).toEqual({
      status: "rejected",
      code: "INVALID_QUANTITY",
      message: "Amount must be positive",
      context: { add: 0 },
    });
  });

  it("omits context when none is given", () => {
    expect(Object.keys(rejected("X", "y"))).toEqual(["status", "code", "message"]);
  });
});

describe("type guards", () => {
  it("distinguish the two outcomes", () => {
    const ok = decideCount(0, 1);
    const no = decideCount(0, -1);

    expect(isSuccess(ok)).toBe(true);
    expect(isRejected(ok)).toBe(false);
    expect(isSuccess(no)).toBe(false);
    expect(isRejected(no)).toBe(true);
  });

  it("narrow to the success shape", () => {
    const output = decideCount(10, 5);
    if (!isSuccess(output)) {
      expect.unreachable("expected success");
      return;
    }
    expect(output.stateUpdate.total).toBe(15);
  });
});
