import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CatalogProduct } from "./types.js";
import { SqliteCatalogStore } from "./sqliteStore.js";
import type { InventorySession } from "./types.js";
import {
  countedPriceColumn,
  createInventorySession,
  ensureSyncErrorColumn,
  formatSyncSummary,
  syncInventorySession,
  syncInventorySessionById,
} from "./inventorySync.js";
import { PersistenceError, SessionNotFoundError } from "./errors.js";
import { setLogLevel } from "./logger.js";

const now = () => new Date("2026-04-02T08:30:00.000Z");

let store: SqliteCatalogStore;

const seed = (barcode: string, stockQuantity: number | null, retailPrice: number | null): CatalogProduct =>
  store.insertProduct({
    barcode,
    itemNumber: null,
    productName: null,
    secondProductName: null,
    purchasePrice: null,
    retailPrice,
    stockQuantity,
    supplier: null,
    category: null,
  });

beforeEach(() => {
  setLogLevel("silent");
  store = new SqliteCatalogStore(":memory:");
});

afterEach(() => {
  store.close();
});

describe("ensureSyncErrorColumn", () => {
  it("appends the column once", () => {
    expect(ensureSyncErrorColumn(["barcode"])).toEqual({ header: ["barcode", "SyncError"], errorIndex: 1 });
    expect(ensureSyncErrorColumn(["SyncError", "barcode"])).toEqual({ header: ["SyncError", "barcode"], errorIndex: 0 });
  });
});

describe("countedPriceColumn", () => {
  it("prefers RetailPrice over the file's retailPrice", () => {
    expect(countedPriceColumn(["barcode", "retailPrice", "realQuantity", "RetailPrice"])).toBe(3);
  });

  it("falls back to any casing of retailPrice", () => {
    expect(countedPriceColumn(["barcode", "retailprice"])).toBe(1);
    expect(countedPriceColumn(["barcode", "retailPrice"])).toBe(1);
    expect(countedPriceColumn(["barcode", "quantity"])).toBe(-1);
  });
});

describe("syncInventorySession", () => {
  it("rejects a negative quantity and leaves the product alone", () => {
    seed("B3", 4, 2);
    const session = createInventorySession(store, {
      title: "Shelf 1",
      grid: [
        ["barcode", "quantity", "RetailPrice"],
        ["B3", "-1", "5"],
      ],
    });

    const result = syncInventorySession(store, session, { now });

    expect(result).toMatchObject({ processedRows: 1, attemptedUpdates: 1, succeeded: 0, failed: 1 });
    expect(session.grid).toEqual([
      ["barcode", "quantity", "RetailPrice", "SyncError"],
      ["B3", "-1", "5", "Invalid quantity"],
    ]);
    expect(session.syncStatus).toBe("attemptedWithErrors");
    const b3 = store.findProductByBarcode("B3");
    expect(b3?.stockQuantity).toBe(4);
    expect(b3?.retailPrice).toBe(2);
  });

  it("updates stock and retail price and logs the price", () => {
    const p = seed("B1", 1, 3);
    seed("B2", 7, null);
    const session = createInventorySession(store, {
      title: "Count",
      grid: [
        ["barcode", "quantity", "realQuantity", "RetailPrice"],
        ["B1", "1", "12,5", "3,75"],
        ["B2", "9", "0", ""],
      ],
    });

    const result = syncInventorySession(store, session, { now });

    expect(result).toEqual({
      processedRows: 2,
      attemptedUpdates: 2,
      succeeded: 2,
      failed: 0,
      summaryMessage: "Rows with quantity: 2\nUpdated successfully: 2\nWith errors: 0",
    });
    expect(store.findProductByBarcode("B1")).toMatchObject({ stockQuantity: 12.5, retailPrice: 3.75 });
    expect(store.findProductByBarcode("B2")).toMatchObject({ stockQuantity: 0, retailPrice: null });
    const history = store.listPriceHistory(p.id);
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({
      kind: "retail",
      price: 3.75,
      source: "INVENTORY_SYNC",
      effectiveAt: "2026-04-02T08:30:00.000Z",
    });
    expect(session.syncStatus).toBe("syncedSuccessfully");
  });

  it("annotates each failing row and keeps going", () => {
    seed("B1", 1, null);
    seed("B2", 1, null);
    const session = createInventorySession(store, {
      title: "Mixed",
      grid: [
        ["barcode", "quantity", "retailPrice", "SyncError"],
        ["B1", "abc", "", "stale error"],
        ["B2", "3", "-2"],
        ["NOPE", "1", ""],
        ["", "5", ""],
        ["B1", "", ""],
        ["B2", "6", ""],
      ],
    });

    const result = syncInventorySession(store, session, { now });

    expect(result).toMatchObject({ processedRows: 6, attemptedUpdates: 4, succeeded: 1, failed: 3 });
    expect(session.grid.slice(1).map((row) => row[3])).toEqual([
      "Invalid quantity",
      "Invalid retail price",
      "Barcode not found",
      "",
      "",
      "",
    ]);
    expect(session.grid[2]).toEqual(["B2", "3", "-2", "Invalid retail price"]);
    expect(store.findProductByBarcode("B2")?.stockQuantity).toBe(6);
    expect(session.syncStatus).toBe("attemptedWithErrors");
  });

  it("keeps the status when no row carries a quantity but still saves the grid", () => {
    seed("B1", 1, null);
    const session = createInventorySession(store, {
      title: "Untouched",
      grid: [
        ["barcode", "realQuantity"],
        ["B1", " "],
      ],
    });

    const result = syncInventorySession(store, session, { now });

    expect(result).toMatchObject({ processedRows: 1, attemptedUpdates: 0, succeeded: 0, failed: 0 });
    expect(session.syncStatus).toBe("notAttempted");
    expect(store.getSession(session.id)?.grid).toEqual([
      ["barcode", "realQuantity", "SyncError"],
      ["B1", " ", ""],
    ]);
  });

  it("reads realQuantity even when quantity is also filled", () => {
    seed("B1", 1, null);
    const session = createInventorySession(store, {
      title: "Real",
      grid: [
        ["barcode", "quantity", "realQuantity"],
        ["B1", "8", ""],
      ],
    });
    const result = syncInventorySession(store, session, { now });
    expect(result.attemptedUpdates).toBe(0);
    expect(store.findProductByBarcode("B1")?.stockQuantity).toBe(1);
  });

  it("saves the grid with the error column when there is no barcode column", () => {
    const session = createInventorySession(store, { title: "Odd", grid: [["code", "quantity"], ["X", "1"]] });
    const result = syncInventorySession(store, session, { now });
    expect(result).toMatchObject({ processedRows: 0, attemptedUpdates: 0, succeeded: 0, failed: 0 });
    expect(store.getSession(session.id)?.grid[0]).toEqual(["code", "quantity", "SyncError"]);
  });

  it("persists the synced grid and status", () => {
    seed("B1", 0, null);
    const session = createInventorySession(store, { title: "Persist", grid: [["barcode", "quantity"], ["B1", "2"]] });
    syncInventorySessionById(store, session.id, { now });
    const stored = store.getSession(session.id);
    expect(stored?.syncStatus).toBe("syncedSuccessfully");
    expect(stored?.grid).toEqual([
      ["barcode", "quantity", "SyncError"],
      ["B1", "2", ""],
    ]);
  });

  it("writes the counted RetailPrice when the grid also keeps the file's retailPrice", () => {
    const p = seed("B1", 1, 4);
    const session = createInventorySession(store, {
      title: "Both prices",
      grid: [
        ["barcode", "retailPrice", "realQuantity", "RetailPrice"],
        ["B1", "4", "3", "5,5"],
      ],
    });

    const result = syncInventorySession(store, session, { now });

    expect(result).toMatchObject({ attemptedUpdates: 1, succeeded: 1, failed: 0 });
    expect(store.findProductByBarcode("B1")).toMatchObject({ stockQuantity: 3, retailPrice: 5.5 });
    expect(store.listPriceHistory(p.id).map((h) => h.price)).toEqual([5.5]);
  });

  it("rolls back and restores the session when saving fails", () => {
    class FailingSaveStore extends SqliteCatalogStore {
      failSaves = false;

      saveSession(session: InventorySession): void {
        if (this.failSaves) throw new Error("disk full");
        super.saveSession(session);
      }
    }
    const failing = new FailingSaveStore(":memory:");
    try {
      const p = failing.insertProduct({
        barcode: "B1",
        itemNumber: null,
        productName: null,
        secondProductName: null,
        purchasePrice: null,
        retailPrice: 2,
        stockQuantity: 1,
        supplier: null,
        category: null,
      });
      const grid = [
        ["barcode", "quantity", "RetailPrice"],
        ["B1", "9", "3"],
      ];
      const session = createInventorySession(failing, { title: "Fails", grid });
      failing.failSaves = true;

      expect(() => syncInventorySession(failing, session, { now })).toThrow(PersistenceError);
      expect(failing.findProductByBarcode("B1")).toMatchObject({ stockQuantity: 1, retailPrice: 2 });
      expect(failing.listPriceHistory(p.id)).toEqual([]);
      expect(session.grid).toEqual(grid);
      expect(session.syncStatus).toBe("notAttempted");
      expect(failing.getSession(session.id)?.grid).toEqual(grid);
    } finally {
      failing.close();
    }
  });

  it("throws for an unknown session id", () => {
    expect(() => syncInventorySessionById(store, "missing")).toThrow(SessionNotFoundError);
  });
});

describe("formatSyncSummary", () => {
  it("renders three lines", () => {
    expect(formatSyncSummary(3, 2, 1)).toBe("Rows with quantity: 3\nUpdated successfully: 2\nWith errors: 1");
  });
});
