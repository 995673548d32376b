import type { CatalogProduct, ChangedField, ProductDraft, RowMap } from "./types.js";
import { CHANGED_FIELDS } from "./types.js";
import { decimalsEqual, parseDecimal, textsEqual, trimmedOrAbsent } from "./sanitize.js";

/**
 * Module: Column Schema & Field Table
 * Purpose: The one place that knows raw column spellings. Everything past the
 * parse step works on `ProductDraft` fields through `FIELD_TABLE`.
 */

// Recognized column names (case-sensitive, exact)
export const COLUMN = {
  barcode: "barcode",
  itemNumber: "itemNumber",
  productName: "productName",
  secondProductName: "secondProductName",
  purchasePrice: "purchasePrice",
  retailPrice: "retailPrice",
  stockQuantity: "stockQuantity",
  quantity: "quantity",
  supplier: "supplier",
  category: "category",
  realQuantity: "realQuantity",
  countedRetailPrice: "RetailPrice",
  syncError: "SyncError",
} as const;

type TextField = "itemNumber" | "productName" | "secondProductName" | "supplierName" | "categoryName";
type NumberField = "purchasePrice" | "retailPrice" | "stockQuantity";

type FieldDef =
  | { kind: "text"; field: TextField; column: string }
  | { kind: "number"; field: NumberField; column: string };

/**
 * Field identifier → draft accessor + raw column. `stockQuantity` lists the
 * primary spelling only; the grouper resolves the `quantity` alias itself.
 */
export const FIELD_TABLE: Record<ChangedField, FieldDef> = {
  itemNumber: { kind: "text", field: "itemNumber", column: COLUMN.itemNumber },
  productName: { kind: "text", field: "productName", column: COLUMN.productName },
  secondProductName: { kind: "text", field: "secondProductName", column: COLUMN.secondProductName },
  purchasePrice: { kind: "number", field: "purchasePrice", column: COLUMN.purchasePrice },
  retailPrice: { kind: "number", field: "retailPrice", column: COLUMN.retailPrice },
  stockQuantity: { kind: "number", field: "stockQuantity", column: COLUMN.stockQuantity },
  supplierName: { kind: "text", field: "supplierName", column: COLUMN.supplier },
  categoryName: { kind: "text", field: "categoryName", column: COLUMN.category },
};

export function fieldDiffers(field: ChangedField, oldDraft: ProductDraft, newDraft: ProductDraft): boolean {
  const def = FIELD_TABLE[field];
  if (def.kind === "number") return !decimalsEqual(oldDraft[def.field], newDraft[def.field]);
  return !textsEqual(oldDraft[def.field], newDraft[def.field]);
}

/** Changed fields in declared order; empty when the drafts are equivalent. */
export const diffDrafts = (oldDraft: ProductDraft, newDraft: ProductDraft): ChangedField[] =>
  CHANGED_FIELDS.filter((field) => fieldDiffers(field, oldDraft, newDraft));

/**
 * Build a draft from a normalized row map. The stock quantity is resolved by the
 * grouper (summed across duplicates or taken from the last row) and passed in.
 */
export function draftFromRow(barcode: string, row: RowMap, stockQuantity: number | undefined): ProductDraft {
  const draft: ProductDraft = { barcode };
  for (const field of CHANGED_FIELDS) {
    const def = FIELD_TABLE[field];
    if (def.kind === "number") {
      const value = def.field === "stockQuantity" ? stockQuantity : parseDecimal(row[def.column]);
      if (value !== undefined) draft[def.field] = value;
    } else {
      const value = trimmedOrAbsent(row[def.column]);
      if (value !== undefined) draft[def.field] = value;
    }
  }
  return draft;
}

/** "Old" side of an update: names come through the stored references. */
export function draftFromCatalog(product: CatalogProduct): ProductDraft {
  const draft: ProductDraft = { barcode: product.barcode };
  if (product.itemNumber !== null) draft.itemNumber = product.itemNumber;
  if (product.productName !== null) draft.productName = product.productName;
  if (product.secondProductName !== null) draft.secondProductName = product.secondProductName;
  if (product.purchasePrice !== null) draft.purchasePrice = product.purchasePrice;
  if (product.retailPrice !== null) draft.retailPrice = product.retailPrice;
  if (product.stockQuantity !== null) draft.stockQuantity = product.stockQuantity;
  if (product.supplier) draft.supplierName = product.supplier.name;
  if (product.category) draft.categoryName = product.category.name;
  return draft;
}

/**
 * Locate a column: exact match first, then a case-insensitive match.
 * Returns -1 when neither exists.
 */
export function findColumn(header: readonly string[], name: string): number {
  const exact = header.indexOf(name);
  if (exact >= 0) return exact;
  const lower = name.toLowerCase();
  return header.findIndex((h) => h.toLowerCase() === lower);
}
