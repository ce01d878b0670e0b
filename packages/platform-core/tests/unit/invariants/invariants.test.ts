/**
 * Unit tests for the invariant framework.
 */
import { describe, it, expect } from "vitest";
import {
  InvariantError,
  createInvariant,
  createInvariantSet,
} from "../../../src/invariants/index.js";

type ShelfCode = "NEGATIVE_STOCK" | "OVER_CAPACITY";

const ShelfInvariantError = InvariantError.forContext<ShelfCode>("Shelf");

interface Shelf {
  id: string;
  stock: number;
  capacity: number;
}

const stockNonNegative = createInvariant<Shelf, ShelfCode>(
  {
    name: "stockNonNegative",
    code: "NEGATIVE_STOCK",
    check: (shelf) => shelf.stock >= 0,
    message: (shelf) => `Shelf ${shelf.id} has negative stock`,
    context: (shelf) => ({ shelfId: shelf.id, stock: shelf.stock }),
  },
  ShelfInvariantError
);

const withinCapacity = createInvariant<Shelf, ShelfCode>(
  {
    name: "withinCapacity",
    code: "OVER_CAPACITY",
    check: (shelf) => shelf.stock <= shelf.capacity,
    message: (shelf) => `Shelf ${shelf.id} holds ${shelf.stock} of ${shelf.capacity}`,
  },
  ShelfInvariantError
);

describe("InvariantError.forContext", () => {
  it("builds a named subclass carrying code and context", () => {
    const error = new ShelfInvariantError("NEGATIVE_STOCK", "bad", { shelfId: "s1" });

    expect(error).toBeInstanceOf(InvariantError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ShelfInvariantError");
    expect(ShelfInvariantError.name).toBe("ShelfInvariantError");
    expect(error.code).toBe("NEGATIVE_STOCK");
    expect(error.context).toEqual({ shelfId: "s1" });
  });

  it("leaves context undefined when none is given", () => {
    expect(new ShelfInvariantError("OVER_CAPACITY", "bad").context).toBeUndefined();
  });
});

describe("InvariantError guards", () => {
  it("recognises invariant errors and their codes", () => {
    const error = new ShelfInvariantError("OVER_CAPACITY", "bad");

    expect(InvariantError.isInvariantError(error)).toBe(true);
    expect(InvariantError.isInvariantError(new Error("plain"))).toBe(false);
    expect(InvariantError.hasCode(error, "OVER_CAPACITY")).toBe(true);
    expect(InvariantError.hasCode(error, "NEGATIVE_STOCK")).toBe(false);
  });
});

describe("createInvariant", () => {
  const good: Shelf = { id: "s1", stock: 3, capacity: 5 };
  const negative: Shelf = { id: "s2", stock: -1, capacity: 5 };

  it("checks without throwing", () => {
    expect(stockNonNegative.check(good)).toBe(true);
    expect(stockNonNegative.check(negative)).toBe(false);
  });

  it("asserts with the context's error class", () => {
    expect(() => stockNonNegative.assert(good)).not.toThrow();
    try {
      stockNonNegative.assert(negative);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ShelfInvariantError);
      expect(InvariantError.hasCode(error, "NEGATIVE_STOCK")).toBe(true);
      if (InvariantError.isInvariantError(error)) {
        expect(error.message).toBe("Shelf s2 has negative stock");
        expect(error.context).toEqual({ shelfId: "s2", stock: -1 });
      }
    }
  });

  it("validates into a violation record", () => {
    expect(stockNonNegative.validate(good)).toEqual({ valid: true });
    expect(stockNonNegative.validate(negative)).toEqual({
      valid: false,
      code: "NEGATIVE_STOCK",
      name: "stockNonNegative",
      message: "Shelf s2 has negative stock",
      context: { shelfId: "s2", stock: -1 },
    });
  });

  it("omits context from the violation when the rule defines none", () => {
    const result = withinCapacity.validate({ id: "s3", stock: 9, capacity: 5 });
    expect(result).toEqual({
      valid: false,
      code: "OVER_CAPACITY",
      name: "withinCapacity",
      message: "Shelf s3 holds 9 of 5",
    });
  });
});

describe("createInvariantSet", () => {
  const shelfRules = createInvariantSet([stockNonNegative, withinCapacity]);

  it("passes a healthy shelf", () => {
    const shelf: Shelf = { id: "s1", stock: 5, capacity: 5 };
    expect(shelfRules.checkAll(shelf)).toBe(true);
    expect(() => shelfRules.assertAll(shelf)).not.toThrow();
    expect(shelfRules.validateAll(shelf)).toEqual({ valid: true });
  });

  it("stops at the first failure when asserting", () => {
    const shelf: Shelf = { id: "s4", stock: -2, capacity: -3 };
    expect(() => shelfRules.assertAll(shelf)).toThrow("Shelf s4 has negative stock");
  });

  it("collects every violation when validating", () => {
    const result = shelfRules.validateAll({ id: "s4", stock: -2, capacity: -3 });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.violations.map((violation) => violation.code)).toEqual([
        "NEGATIVE_STOCK",
        "OVER_CAPACITY",
      ]);
    }
  });

  it("exposes its members", () => {
    expect(shelfRules.invariants.map((invariant) => invariant.name)).toEqual([
      "stockNonNegative",
      "withinCapacity",
    ]);
  });
});
