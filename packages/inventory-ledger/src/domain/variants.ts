/**
 * Variant matcher.
 *
 * A product's labels form one flat list in which separator sentinels split
 * the dimensions apart, e.g. `["S", "M", "BUFFER", "red", "blue"]` is the
 * size dimension `S, M` followed by the colour dimension `red, blue`.
 *
 * Labels are compared by the SHA-256 digest of their UTF-16 code units: two
 * labels match only when every code unit is identical. "red" does not match
 * "Red", "red " or "re". Lone surrogates stay distinct.
 */
import { createHash } from "node:crypto";

export const DEFAULT_VARIANT_SEPARATOR = "BUFFER";

export interface VariantSlot {
  /** Position in the product's flat `variants` list. */
  index: number;
  label: string;
  /** Zero-based dimension the slot belongs to. */
  dimension: number;
}

export interface VariantDimension {
  dimension: number;
  slots: VariantSlot[];
}

export function labelDigest(label: string): string {
  return createHash("sha256").update(Buffer.from(label, "utf16le")).digest("hex");
}

export function variantsEqual(a: string, b: string): boolean {
  return labelDigest(a) === labelDigest(b);
}

export function isSeparator(label: string, separator: string = DEFAULT_VARIANT_SEPARATOR): boolean {
  return variantsEqual(label, separator);
}

export function countSeparators(
  variants: readonly string[],
  separator: string = DEFAULT_VARIANT_SEPARATOR
): number {
  return variants.filter((label) => isSeparator(label, separator)).length;
}

/**
 * Split a flat label list into dimensions.
 *
 * Always yields `separators + 1` dimensions; a dimension may come back
 * empty when separators are adjacent or sit at either end.
 */
export function splitDimensions(
  variants: readonly string[],
  separator: string = DEFAULT_VARIANT_SEPARATOR
): VariantDimension[] {
  const dimensions: VariantDimension[] = [{ dimension: 0, slots: [] }];

  variants.forEach((label, index) => {
    if (isSeparator(label, separator)) {
      dimensions.push({ dimension: dimensions.length, slots: [] });
      return;
    }
    const current = dimensions[dimensions.length - 1];
    current?.slots.push({ index, label, dimension: current.dimension });
  });

  return dimensions;
}

/**
 * First non-separator slot whose label matches, or null.
 */
export function findVariantSlot(
  variants: readonly string[],
  label: string,
  separator: string = DEFAULT_VARIANT_SEPARATOR
): VariantSlot | null {
  if (isSeparator(label, separator)) {
    return null;
  }
  for (const dimension of splitDimensions(variants, separator)) {
    const slot = dimension.slots.find((candidate) => variantsEqual(candidate.label, label));
    if (slot) {
      return slot;
    }
  }
  return null;
}
