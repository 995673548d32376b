import type { ReconciliationResult, RowMap, TabularSource } from "./types.js";
import { ENGINE_VERSION } from "./types.js";
import type { CatalogSnapshot } from "./diffCatalog.js";
import type { CatalogStore } from "./store.js";
import { diffCatalog, snapshotFromProducts } from "./diffCatalog.js";
import { groupRows } from "./groupRows.js";
import { COLUMN } from "./schema.js";
import { InvalidFormatError, NoImportableRowsError } from "./errors.js";
import { createLogger } from "./logger.js";

/**
 * Module: Reconciliation Pipeline
 * Purpose: header + rows → grouped rows → change-set for human review.
 * Notes:
 * - A header without `barcode` fails the whole run before any row is looked at.
 * - Running twice on the same snapshot and input yields equal results.
 */

const log = createLogger("reconcile");

export function reconcileGrid(source: TabularSource, snapshot: CatalogSnapshot): ReconciliationResult {
  if (!source.header.includes(COLUMN.barcode)) {
    throw new InvalidFormatError(COLUMN.barcode);
  }
  const { pending, errors } = groupRows(source);
  const { newProducts, updatedProducts, warnings } = diffCatalog(pending, snapshot);
  log.debug("reconciled", {
    rows: source.rows.length,
    barcodes: pending.size,
    newProducts: newProducts.length,
    updates: updatedProducts.length,
    errors: errors.length,
  });
  return {
    newProducts,
    updatedProducts,
    warnings,
    errors,
    hasChanges: newProducts.length > 0 || updatedProducts.length > 0,
    engineVersion: ENGINE_VERSION,
  };
}

/** Ordered union of keys across all rows, in first-seen order. */
export function inferHeader(rows: readonly RowMap[]): string[] {
  const ordered: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (seen.has(key)) continue;
      seen.add(key);
      ordered.push(key);
    }
  }
  return ordered;
}

export function mappedRowsToSource(rows: readonly RowMap[]): TabularSource {
  const header = inferHeader(rows);
  return { header, rows: rows.map((row) => header.map((key) => row[key] ?? "")) };
}

export function reconcileMappedRows(rows: readonly RowMap[], snapshot: CatalogSnapshot): ReconciliationResult {
  return reconcileGrid(mappedRowsToSource(rows), snapshot);
}

/**
 * Turn an inventory session grid (row 0 = header) into row maps for import:
 * blank cells are dropped and rows without a barcode are left out.
 */
export function sessionGridToMappedRows(grid: readonly string[][]): RowMap[] {
  if (!grid.length) return [];
  const [header, ...rows] = grid;
  const mapped: RowMap[] = [];
  for (const row of rows) {
    const map: RowMap = {};
    header.forEach((key, idx) => {
      if (idx >= row.length) return;
      const value = row[idx].trim();
      if (value) map[key] = value;
    });
    if ((map[COLUMN.barcode] ?? "").trim()) mapped.push(map);
  }
  return mapped;
}

export function reconcileSessionGrid(grid: readonly string[][], snapshot: CatalogSnapshot): ReconciliationResult {
  const mapped = sessionGridToMappedRows(grid);
  if (!mapped.length) throw new NoImportableRowsError();
  return reconcileMappedRows(mapped, snapshot);
}

/** Fetch the catalog once and reconcile `source` against it. Has no side effects. */
export function analyzeImport(store: CatalogStore, source: TabularSource): ReconciliationResult {
  const snapshot = snapshotFromProducts(store.listProducts());
  return reconcileGrid(source, snapshot);
}
