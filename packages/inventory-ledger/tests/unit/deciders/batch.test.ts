/**
 * Unit tests for the batch lifecycle deciders.
 */
import { describe, it, expect } from "vitest";
import {
  decideReadyForAuction,
  decideSetBidStatus,
  decideSetDeliveryStatus,
  decideSetSaleStatus,
  decideSetShippingStatus,
} from "../../../src/domain/deciders/index.js";
import { TEST_CONTEXT, jacketItem, jacketProduct, seedRepository } from "../../support/state.js";

describe("decideReadyForAuction", () => {
  it("readies every item without moving buckets", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 2, reserved: 0, sold: 0, shipped: 0 } })],
      [jacketItem(0, "minted"), jacketItem(1, "minted")]
    );

    const result = decideReadyForAuction(state, { itemIds: [0, 1] }, TEST_CONTEXT);

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.stateUpdate).toEqual({
      itemPatches: [
        { itemId: 0, changes: { status: "ready", location: "HQ" } },
        { itemId: 1, changes: { status: "ready", location: "HQ" } },
      ],
      productPatches: [],
    });
    expect(result.events.map((event) => event.eventType)).toEqual(["ItemReadied", "ItemReadied"]);
    expect(result.data.inventories).toEqual([
      { productId: 0, inventory: { available: 2, reserved: 0, sold: 0, shipped: 0 } },
    ]);
  });

  it("rejects the whole batch when one item is not digitized", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 2, reserved: 0, sold: 0, shipped: 0 } })],
      [jacketItem(0, "minted"), jacketItem(1, "minted", { isDigitized: false })]
    );

    expect(decideReadyForAuction(state, { itemIds: [0, 1] }, TEST_CONTEXT)).toEqual({
      status: "rejected",
      code: "NOT_READY_FOR_AUCTION",
      message: "Item 1 must be chipped and digitized",
      context: { itemId: 1, status: "minted" },
    });
  });

  it("rejects an item that is already past minted", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 1, reserved: 0, sold: 0, shipped: 0 } })],
      [jacketItem(0, "ready")]
    );

    expect(decideReadyForAuction(state, { itemIds: [0] }, TEST_CONTEXT)).toMatchObject({
      code: "INELIGIBLE_TRANSITION",
      message: 'Item 0 cannot be readied from "ready"',
    });
  });
});

describe("decideSetBidStatus", () => {
  const readyState = () =>
    seedRepository(
      [jacketProduct({ inventory: { available: 2, reserved: 0, sold: 0, shipped: 0 } })],
      [jacketItem(0, "ready"), jacketItem(1, "ready")]
    );

  it("moves every unit from available to reserved", () => {
    const result = decideSetBidStatus(readyState(), { itemIds: [0, 1], flags: [true, true] }, TEST_CONTEXT);

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.stateUpdate.productPatches).toEqual([
      { productId: 0, changes: { inventory: { available: 0, reserved: 2, sold: 0, shipped: 0 } } },
    ]);
    expect(result.events[1]).toEqual({
      eventType: "BidPlaced",
      streamType: "Item",
      streamId: "item-1",
      payload: { itemId: 1, productId: 0, from: "ready", to: "bidded", location: "HQ" },
    });
  });

  it("rejects mismatched flags before looking at items", () => {
    expect(decideSetBidStatus(readyState(), { itemIds: [0, 7], flags: [true] }, TEST_CONTEXT)).toEqual({
      status: "rejected",
      code: "PARITY_MISMATCH",
      message: "itemIds and flags: expected equal lengths, got 2 and 1",
      context: { leftLength: 2, rightLength: 1 },
    });
  });

  it("rejects an empty batch", () => {
    expect(decideSetBidStatus(readyState(), { itemIds: [], flags: [] }, TEST_CONTEXT)).toMatchObject({
      code: "EMPTY_BATCH",
    });
  });

  it("rejects a repeated id", () => {
    expect(
      decideSetBidStatus(readyState(), { itemIds: [0, 0], flags: [true, true] }, TEST_CONTEXT)
    ).toMatchObject({ code: "DUPLICATE_ITEM_IDS", context: { duplicateItemIds: [0] } });
  });

  it("rejects a false flag", () => {
    expect(
      decideSetBidStatus(readyState(), { itemIds: [0, 1], flags: [true, false] }, TEST_CONTEXT)
    ).toMatchObject({
      code: "ITEM_NOT_AVAILABLE_FOR_AUCTION",
      message: "Item 1 is not available for auction",
    });
  });

  it("rejects an unknown item", () => {
    expect(
      decideSetBidStatus(readyState(), { itemIds: [0, 5], flags: [true, true] }, TEST_CONTEXT)
    ).toMatchObject({ code: "ITEM_NOT_FOUND", message: "Item 5 does not exist" });
  });

  it("rejects moves that would overdraw a bucket", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 1, reserved: 0, sold: 0, shipped: 0 } })],
      [jacketItem(0, "ready"), jacketItem(1, "ready")]
    );

    expect(decideSetBidStatus(state, { itemIds: [0, 1], flags: [true, true] }, TEST_CONTEXT)).toEqual({
      status: "rejected",
      code: "MAX_QUANTITY_REACHED",
      message: 'Bucket "available" holds 1 units, 2 requested',
      context: { bucket: "available", current: 1, requested: 2 },
    });
  });
});

describe("decideSetSaleStatus", () => {
  it("settles a bidded item", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 0, reserved: 1, sold: 0, shipped: 0 } })],
      [jacketItem(0, "bidded")]
    );

    const result = decideSetSaleStatus(state, { itemIds: [0], flags: [true] }, TEST_CONTEXT);

    expect(result).toMatchObject({
      status: "success",
      data: { inventories: [{ productId: 0, inventory: { available: 0, reserved: 0, sold: 1, shipped: 0 } }] },
    });
  });

  it("rejects an item without a bid", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 1, reserved: 0, sold: 0, shipped: 0 } })],
      [jacketItem(0, "ready")]
    );

    expect(decideSetSaleStatus(state, { itemIds: [0], flags: [true] }, TEST_CONTEXT)).toMatchObject({
      code: "ITEM_NOT_BIDDED",
    });
  });
});

describe("decideSetShippingStatus", () => {
  it("ships a sold item into transit", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 0, reserved: 0, sold: 1, shipped: 0 } })],
      [jacketItem(0, "sold")]
    );

    const result = decideSetShippingStatus(state, { itemIds: [0], flags: [true] }, TEST_CONTEXT);

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.stateUpdate.itemPatches).toEqual([
      { itemId: 0, changes: { status: "shipped", location: "TRANSIT" } },
    ]);
    expect(result.events[0]?.eventType).toBe("ItemShipped");
  });

  it("rejects an unsold item", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 0, reserved: 1, sold: 0, shipped: 0 } })],
      [jacketItem(0, "bidded")]
    );

    expect(decideSetShippingStatus(state, { itemIds: [0], flags: [true] }, TEST_CONTEXT)).toMatchObject({
      code: "ITEM_NOT_SOLD",
      message: "Item 0 is not sold",
    });
  });
});

describe("decideSetDeliveryStatus", () => {
  const shippedState = () =>
    seedRepository(
      [jacketProduct({ inventory: { available: 0, reserved: 0, sold: 0, shipped: 2 } })],
      [jacketItem(0, "shipped", { location: "TRANSIT" }), jacketItem(1, "shipped", { location: "TRANSIT" })]
    );

  it("delivers or returns by flag without touching buckets", () => {
    const result = decideSetDeliveryStatus(
      shippedState(),
      { itemIds: [0, 1], flags: [true, false] },
      TEST_CONTEXT
    );

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.events.map((event) => [event.eventType, event.payload.location])).toEqual([
      ["ItemDelivered", "BUYER"],
      ["ItemReturned", "TRANSIT"],
    ]);
    expect(result.stateUpdate.productPatches).toEqual([]);
  });

  it("rejects an item that has not shipped", () => {
    const state = seedRepository(
      [jacketProduct({ inventory: { available: 0, reserved: 0, sold: 1, shipped: 0 } })],
      [jacketItem(0, "sold")]
    );

    expect(decideSetDeliveryStatus(state, { itemIds: [0], flags: [true] }, TEST_CONTEXT)).toMatchObject({
      code: "ITEM_NOT_SHIPPED",
      message: "Item 0 has not been shipped",
    });
  });
});
