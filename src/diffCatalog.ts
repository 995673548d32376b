import type { CatalogProduct, DuplicateWarning, ProductDraft, UpdateDraft } from "./types.js";
import type { PendingRow } from "./groupRows.js";
import { quantityOf, resolveQuantity } from "./groupRows.js";
import { diffDrafts, draftFromCatalog, draftFromRow } from "./schema.js";

/**
 * Module: Catalog Diff Engine
 * Purpose: Classify each grouped row against a catalog snapshot as new, unchanged
 * or updated (with the exact list of changed fields). Read-only.
 */

/** Immutable view of the catalog taken once per run, keyed by barcode. */
export type CatalogSnapshot = ReadonlyMap<string, CatalogProduct>;

export interface CatalogDiff {
  newProducts: ProductDraft[];
  updatedProducts: UpdateDraft[];
  warnings: DuplicateWarning[];
}

export function snapshotFromProducts(products: readonly CatalogProduct[]): CatalogSnapshot {
  const byBarcode = new Map<string, CatalogProduct>();
  for (const p of products) byBarcode.set(p.barcode, p);
  return byBarcode;
}

// Code-unit order, independent of the host locale
const compareBarcodes = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function pendingRowToDraft(row: PendingRow): ProductDraft {
  return draftFromRow(row.barcode, row.lastRow, quantityOf(resolveQuantity(row)));
}

export function diffCatalog(pending: ReadonlyMap<string, PendingRow>, snapshot: CatalogSnapshot): CatalogDiff {
  const newProducts: ProductDraft[] = [];
  const updatedProducts: UpdateDraft[] = [];
  const warnings: DuplicateWarning[] = [];

  const barcodes = [...pending.keys()].sort(compareBarcodes);
  for (const barcode of barcodes) {
    const row = pending.get(barcode);
    if (!row) continue;
    const draft = pendingRowToDraft(row);

    const existing = snapshot.get(barcode);
    if (existing) {
      const oldDraft = draftFromCatalog(existing);
      const changedFields = diffDrafts(oldDraft, draft);
      if (changedFields.length) {
        updatedProducts.push({ barcode, old: oldDraft, new: draft, changedFields });
      }
    } else {
      newProducts.push(draft);
    }

    if (row.rowNumbers.length > 1) {
      warnings.push({ barcode, rowNumbers: [...row.rowNumbers] });
    }
  }

  return { newProducts, updatedProducts, warnings };
}
