import { describe, it, expect } from "vitest";
import { jacketItem, jacketProduct, seedRepository } from "../support/state.js";

describe("LedgerRepository", () => {
  it("advances counters past inserted ids", () => {
    const repository = seedRepository([jacketProduct()], [jacketItem(4, "minted")]);

    expect(repository.nextProductId()).toBe(1);
    expect(repository.nextItemId()).toBe(5);
  });

  it("bumps version and updatedAt on patches", () => {
    const repository = seedRepository([jacketProduct()]);

    repository.apply({ productPatches: [{ productId: 0, changes: { name: "Parka" } }] }, 77);

    expect(repository.findProduct(0)).toMatchObject({ name: "Parka", version: 2, updatedAt: 77 });
  });

  it("writes nothing when a patch names a missing record", () => {
    const repository = seedRepository([jacketProduct()]);

    expect(() =>
      repository.apply(
        {
          productPatches: [{ productId: 0, changes: { name: "Parka" } }],
          itemPatches: [{ itemId: 3, changes: { price: 1 } }],
        },
        77
      )
    ).toThrow("Cannot patch missing item 3");
    expect(repository.findProduct(0)?.name).toBe("Field Jacket");
  });

  it("removes items and keeps the counter", () => {
    const repository = seedRepository([jacketProduct()], [jacketItem(0, "minted"), jacketItem(1, "sold")]);

    repository.apply({ itemRemovals: [1] }, 0);

    expect(repository.findItem(1)).toBeNull();
    expect(repository.itemsOfProduct(0).map((item) => item.itemId)).toEqual([0]);
    expect(repository.nextItemId()).toBe(2);
  });

  it("refreshes the owner without a new version", () => {
    const repository = seedRepository([jacketProduct()], [jacketItem(0, "minted")]);

    repository.refreshOwner(0, "collector");

    expect(repository.findItem(0)).toMatchObject({ owner: "collector", version: 1 });
  });
});
