import { randomUUID } from "node:crypto";
import type { InventorySession, PriceSource, SyncResult } from "./types.js";
import type { CatalogStore } from "./store.js";
import { COLUMN, findColumn } from "./schema.js";
import { normalizeNumberString, parseNonNegativeDecimal } from "./sanitize.js";
import { recordPriceChanges } from "./applyChangeSet.js";
import { PersistenceError, SessionNotFoundError } from "./errors.js";
import { createLogger } from "./logger.js";

/**
 * Module: Inventory Count Sync
 * Purpose: Push the counted quantities (and optional shelf prices) of an inventory
 * session grid onto the catalog, row by row. A bad row is annotated in the
 * SyncError column and counted; it never stops the batch.
 */

export const SYNC_PRICE_SOURCE: PriceSource = "INVENTORY_SYNC";

export const SYNC_ERROR = {
  invalidQuantity: "Invalid quantity",
  invalidRetailPrice: "Invalid retail price",
  barcodeNotFound: "Barcode not found",
} as const;

const log = createLogger("inventory-sync");

export interface SyncOptions {
  now?: () => Date;
}

export interface NewSessionInput {
  title: string;
  grid: string[][];
  supplierName?: string;
  categoryName?: string;
}

/** Persist a fresh, never-synced session around a counted grid (row 0 = header). */
export function createInventorySession(
  store: CatalogStore,
  input: NewSessionInput,
  now: Date = new Date()
): InventorySession {
  const session: InventorySession = {
    id: randomUUID(),
    title: input.title.trim(),
    supplierName: (input.supplierName ?? "").trim(),
    categoryName: (input.categoryName ?? "").trim(),
    createdAt: now.toISOString(),
    grid: input.grid.map((row) => [...row]),
    syncStatus: "notAttempted",
  };
  store.saveSession(session);
  return session;
}

export function formatSyncSummary(attempted: number, succeeded: number, failed: number): string {
  return [`Rows with quantity: ${attempted}`, `Updated successfully: ${succeeded}`, `With errors: ${failed}`].join("\n");
}

const buildResult = (processedRows: number, attemptedUpdates: number, succeeded: number, failed: number): SyncResult => ({
  processedRows,
  attemptedUpdates,
  succeeded,
  failed,
  summaryMessage: formatSyncSummary(attemptedUpdates, succeeded, failed),
});

/** Header with a SyncError column guaranteed, plus that column's index. */
export function ensureSyncErrorColumn(header: readonly string[]): { header: string[]; errorIndex: number } {
  const existing = header.indexOf(COLUMN.syncError);
  if (existing >= 0) return { header: [...header], errorIndex: existing };
  return { header: [...header, COLUMN.syncError], errorIndex: header.length };
}

/**
 * The counted shelf price lives in `RetailPrice`; session grids often also keep
 * the file's own `retailPrice`, which must not win. Any other casing of
 * `retailPrice` is accepted only when `RetailPrice` is missing.
 */
export function countedPriceColumn(header: readonly string[]): number {
  const counted = header.indexOf(COLUMN.countedRetailPrice);
  return counted >= 0 ? counted : findColumn(header, COLUMN.retailPrice);
}

const padRow = (row: readonly string[], width: number): string[] =>
  row.length >= width ? [...row] : [...row, ...Array<string>(width - row.length).fill("")];

/**
 * Sync one session in a single transaction. Mutates `session.grid` (SyncError
 * column filled in) and `session.syncStatus`, and saves the session. The status
 * is left alone when no row carried a quantity.
 */
export function syncInventorySession(
  store: CatalogStore,
  session: InventorySession,
  options: SyncOptions = {}
): SyncResult {
  if (!session.grid.length) return buildResult(0, 0, 0, 0);
  const now = options.now ?? (() => new Date());

  const run = (): SyncResult => {
    const grid = session.grid.map((row) => [...row]);
    const { header, errorIndex } = ensureSyncErrorColumn(grid[0]);
    grid[0] = header;

    const barcodeIndex = header.indexOf(COLUMN.barcode);
    if (barcodeIndex < 0) {
      session.grid = grid;
      store.saveSession(session);
      return buildResult(0, 0, 0, 0);
    }
    const realQuantityIndex = header.indexOf(COLUMN.realQuantity);
    const quantityIndex = header.indexOf(COLUMN.quantity);
    const retailPriceIndex = countedPriceColumn(header);

    let processed = 0;
    let attempted = 0;
    let succeeded = 0;
    let failed = 0;

    for (let rowIndex = 1; rowIndex < grid.length; rowIndex++) {
      processed++;
      const row = padRow(grid[rowIndex], header.length);
      row[errorIndex] = "";
      grid[rowIndex] = row;

      const barcode = row[barcodeIndex].trim();
      if (!barcode) continue;

      const quantityText =
        realQuantityIndex >= 0 ? row[realQuantityIndex] : quantityIndex >= 0 ? row[quantityIndex] : "";
      if (!normalizeNumberString(quantityText)) continue;

      attempted++;
      const quantity = parseNonNegativeDecimal(quantityText);
      if (quantity === undefined) {
        row[errorIndex] = SYNC_ERROR.invalidQuantity;
        failed++;
        continue;
      }

      let retailPrice: number | undefined;
      if (retailPriceIndex >= 0 && normalizeNumberString(row[retailPriceIndex])) {
        retailPrice = parseNonNegativeDecimal(row[retailPriceIndex]);
        if (retailPrice === undefined) {
          row[errorIndex] = SYNC_ERROR.invalidRetailPrice;
          failed++;
          continue;
        }
      }

      const product = store.findProductByBarcode(barcode);
      if (!product) {
        row[errorIndex] = SYNC_ERROR.barcodeNotFound;
        failed++;
        continue;
      }

      product.stockQuantity = quantity;
      if (retailPrice !== undefined) product.retailPrice = retailPrice;
      store.updateProduct(product);
      if (retailPrice !== undefined) {
        // Always logged, even when the counted price equals the stored one
        recordPriceChanges(
          store,
          product,
          [{ kind: "retail", oldPrice: undefined, newPrice: retailPrice }],
          SYNC_PRICE_SOURCE,
          now()
        );
      }
      succeeded++;
    }

    session.grid = grid;
    if (attempted > 0) {
      session.syncStatus = failed === 0 ? "syncedSuccessfully" : "attemptedWithErrors";
    }
    store.saveSession(session);

    return attempted > 0
      ? buildResult(processed, attempted, succeeded, failed)
      : buildResult(processed, 0, 0, failed);
  };

  const snapshot = { grid: session.grid, syncStatus: session.syncStatus };
  let result: SyncResult;
  try {
    result = store.transaction(run);
  } catch (error) {
    session.grid = snapshot.grid;
    session.syncStatus = snapshot.syncStatus;
    log.error("inventory sync rolled back", error);
    throw new PersistenceError("syncing the inventory", error);
  }
  log.info("inventory synced", {
    session: session.id,
    attempted: result.attemptedUpdates,
    succeeded: result.succeeded,
    failed: result.failed,
  });
  return result;
}

export function syncInventorySessionById(store: CatalogStore, sessionId: string, options: SyncOptions = {}): SyncResult {
  const session = store.getSession(sessionId);
  if (!session) throw new SessionNotFoundError(sessionId);
  return syncInventorySession(store, session, options);
}
