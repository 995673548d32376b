import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteCatalogStore } from "./sqliteStore.js";
import { findOrCreateRef, resolveRef } from "./store.js";

let store: SqliteCatalogStore;

beforeEach(() => {
  store = new SqliteCatalogStore(":memory:");
});

afterEach(() => {
  store.close();
});

describe("findOrCreateRef", () => {
  it("returns the same row for the same trimmed name", () => {
    const first = findOrCreateRef(store, "category", " Tools ");
    const second = findOrCreateRef(store, "category", "Tools");
    expect(second).toEqual(first);
    expect(first.name).toBe("Tools");
    expect(store.listRefs("category")).toHaveLength(1);
  });

  it("is case-sensitive", () => {
    findOrCreateRef(store, "supplier", "acme");
    findOrCreateRef(store, "supplier", "Acme");
    expect(store.listRefs("supplier").map((r) => r.name)).toEqual(["Acme", "acme"]);
  });

  it("hands back a transient reference for an empty name", () => {
    expect(findOrCreateRef(store, "supplier", "   ")).toEqual({ id: null, name: "" });
    expect(store.listRefs("supplier")).toEqual([]);
  });

  it("resolves blank draft names to no reference", () => {
    expect(resolveRef(store, "category", undefined)).toBeNull();
    expect(resolveRef(store, "category", " ")).toBeNull();
  });
});

describe("SqliteCatalogStore", () => {
  it("enforces barcode uniqueness", () => {
    const base = {
      itemNumber: null,
      productName: null,
      secondProductName: null,
      purchasePrice: null,
      retailPrice: null,
      stockQuantity: null,
      supplier: null,
      category: null,
    };
    store.insertProduct({ ...base, barcode: "B1" });
    expect(() => store.insertProduct({ ...base, barcode: "B1" })).toThrow();
  });

  it("rolls back a failed transaction", () => {
    expect(() =>
      store.transaction(() => {
        findOrCreateRef(store, "supplier", "Temp");
        throw new Error("abort");
      })
    ).toThrow("abort");
    expect(store.findRef("supplier", "Temp")).toBeUndefined();
  });

  it("round-trips an inventory session", () => {
    store.saveSession({
      id: "s1",
      title: "Shelf",
      supplierName: "Acme",
      categoryName: "",
      createdAt: "2026-01-01T00:00:00.000Z",
      grid: [["barcode"], ["B1"]],
      syncStatus: "notAttempted",
    });
    expect(store.getSession("s1")).toEqual({
      id: "s1",
      title: "Shelf",
      supplierName: "Acme",
      categoryName: "",
      createdAt: "2026-01-01T00:00:00.000Z",
      grid: [["barcode"], ["B1"]],
      syncStatus: "notAttempted",
    });
    expect(store.getSession("nope")).toBeUndefined();
  });
});
