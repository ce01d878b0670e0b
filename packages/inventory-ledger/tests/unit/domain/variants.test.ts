/**
 * Unit tests for the variant matcher.
 */
import { describe, it, expect } from "vitest";
import {
  DEFAULT_VARIANT_SEPARATOR,
  countSeparators,
  findVariantSlot,
  isSeparator,
  labelDigest,
  splitDimensions,
  variantsEqual,
} from "../../../src/domain/variants.js";

describe("variantsEqual", () => {
  it("matches identical labels", () => {
    expect(variantsEqual("red", "red")).toBe(true);
    expect(variantsEqual("", "")).toBe(true);
  });

  it("does not match on case, whitespace, prefix or substring", () => {
    expect(variantsEqual("red", "Red")).toBe(false);
    expect(variantsEqual("red", "red ")).toBe(false);
    expect(variantsEqual("red", "re")).toBe(false);
    expect(variantsEqual("dark red", "red")).toBe(false);
  });

  it("compares code units, so composed and decomposed forms differ", () => {
    expect(variantsEqual("\u00e9", "e\u0301")).toBe(false);
  });

  it("keeps lone surrogates apart", () => {
    expect(variantsEqual("\uD800", "\uDC00")).toBe(false);
    expect(variantsEqual("\uD800", "\uFFFD")).toBe(false);
    expect(variantsEqual("\uD800", "\uD800")).toBe(true);
  });
});

describe("labelDigest", () => {
  it("is the hex SHA-256 of the label's UTF-16LE code units", () => {
    expect(labelDigest("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
    expect(labelDigest("abc")).toBe(
      "13e228567e8249fce53337f25d7970de3bd68ab2653424c7b8f9fd05e33caedf"
    );
  });
});

describe("separators", () => {
  it("defaults to BUFFER", () => {
    expect(DEFAULT_VARIANT_SEPARATOR).toBe("BUFFER");
    expect(isSeparator("BUFFER")).toBe(true);
    expect(isSeparator("buffer")).toBe(false);
  });

  it("honours a custom separator", () => {
    expect(isSeparator("|", "|")).toBe(true);
    expect(isSeparator("BUFFER", "|")).toBe(false);
  });

  it("counts separators", () => {
    expect(countSeparators(["S", "BUFFER", "red", "BUFFER", "cotton"])).toBe(2);
    expect(countSeparators(["S", "M"])).toBe(0);
  });
});

describe("splitDimensions", () => {
  it("splits at separators and keeps original indices", () => {
    expect(splitDimensions(["S", "M", "BUFFER", "red"])).toEqual([
      {
        dimension: 0,
        slots: [
          { index: 0, label: "S", dimension: 0 },
          { index: 1, label: "M", dimension: 0 },
        ],
      },
      { dimension: 1, slots: [{ index: 3, label: "red", dimension: 1 }] },
    ]);
  });

  it("yields one dimension without separators", () => {
    expect(splitDimensions(["S", "M"])).toHaveLength(1);
  });

  it("yields empty dimensions around adjacent or trailing separators", () => {
    const dimensions = splitDimensions(["S", "BUFFER", "BUFFER", "red", "BUFFER"]);

    expect(dimensions.map((d) => d.slots.length)).toEqual([1, 0, 1, 0]);
  });
});

describe("findVariantSlot", () => {
  const variants = ["S", "M", "BUFFER", "red", "blue"];

  it("finds the slot for a label", () => {
    expect(findVariantSlot(variants, "blue")).toEqual({ index: 4, label: "blue", dimension: 1 });
  });

  it("returns null for unknown labels", () => {
    expect(findVariantSlot(variants, "green")).toBeNull();
    expect(findVariantSlot(variants, "Blue")).toBeNull();
  });

  it("resolves each lone surrogate to its own slot", () => {
    expect(findVariantSlot(["\uD800", "\uDC00"], "\uDC00")).toEqual({
      index: 1,
      label: "\uDC00",
      dimension: 0,
    });
  });

  it("never matches the separator itself", () => {
    expect(findVariantSlot(variants, "BUFFER")).toBeNull();
  });

  it("returns the first slot when a label repeats", () => {
    expect(findVariantSlot(["one", "BUFFER", "one"], "one")).toEqual({
      index: 0,
      label: "one",
      dimension: 0,
    });
  });
});
