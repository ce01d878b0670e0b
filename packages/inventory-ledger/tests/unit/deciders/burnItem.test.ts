import { describe, it, expect } from "vitest";
import { decideBurnItem } from "../../../src/domain/deciders/index.js";
import { TEST_CONTEXT, jacketItem, jacketProduct, seedRepository } from "../../support/state.js";

describe("decideBurnItem", () => {
  it("gives the stock back and empties the occupied bucket", () => {
    const state = seedRepository(
      [
        jacketProduct({
          quantityPerVariant: [1, 1, 0, 1, 1],
          inventory: { available: 0, reserved: 0, sold: 1, shipped: 0 },
        }),
      ],
      [jacketItem(4, "sold")]
    );

    const result = decideBurnItem(state, { itemId: 4, separator: "BUFFER" }, TEST_CONTEXT);

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.stateUpdate).toEqual({
      itemRemovals: [4],
      productPatches: [
        {
          productId: 0,
          changes: {
            inventory: { available: 0, reserved: 0, sold: 0, shipped: 0 },
            quantityPerVariant: [2, 1, 0, 2, 1],
          },
        },
      ],
    });
    expect(result.events[0]).toMatchObject({ eventType: "ItemBurned", streamId: "item-4" });
  });

  it("rejects an unknown item", () => {
    expect(decideBurnItem(seedRepository([]), { itemId: 2, separator: "BUFFER" }, TEST_CONTEXT)).toMatchObject({
      code: "ITEM_NOT_FOUND",
    });
  });

  it("rejects when the occupied bucket is already empty", () => {
    const state = seedRepository([jacketProduct()], [jacketItem(0, "sold")]);

    expect(decideBurnItem(state, { itemId: 0, separator: "BUFFER" }, TEST_CONTEXT)).toEqual({
      status: "rejected",
      code: "MAX_QUANTITY_REACHED",
      message: 'Bucket "sold" holds 0 units, 1 requested',
      context: { bucket: "sold", current: 0, requested: 1 },
    });
  });

  it("rejects an item whose labels no longer match the product", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 1, reserved: 0, sold: 0, shipped: 0 } })],
      [jacketItem(0, "minted", { variants: ["XS", "red"] })]
    );

    expect(decideBurnItem(state, { itemId: 0, separator: "BUFFER" }, TEST_CONTEXT)).toMatchObject({
      code: "VARIANT_NOT_FOUND",
      context: { label: "XS" },
    });
  });
});
