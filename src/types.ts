/**
 * Module: Public Types & Engine Version
 * Purpose: Define the draft, change-set and sync contracts shared by the grouper,
 * diff engine, applier and inventory count sync, plus the catalog entity shapes
 * a store hands back.
 */

/** Decoded tabular input: ordered header plus string rows (header excluded). */
export interface TabularSource {
  header: string[];
  rows: string[][];
}

/** Column name → trimmed cell value for one input row. */
export type RowMap = Record<string, string>;

// Catalog-independent snapshot of one logical input row
export interface ProductDraft {
  barcode: string;
  itemNumber?: string;
  productName?: string;
  secondProductName?: string;
  purchasePrice?: number;
  retailPrice?: number;
  stockQuantity?: number;
  supplierName?: string;
  categoryName?: string;
}

export const CHANGED_FIELDS = [
  "itemNumber",
  "productName",
  "secondProductName",
  "purchasePrice",
  "retailPrice",
  "stockQuantity",
  "supplierName",
  "categoryName",
] as const;

export type ChangedField = (typeof CHANGED_FIELDS)[number];

export interface UpdateDraft {
  barcode: string;
  old: ProductDraft;
  new: ProductDraft;
  changedFields: ChangedField[]; // declared order of CHANGED_FIELDS
}

export interface DuplicateWarning {
  barcode: string;
  rowNumbers: number[]; // 1-based, header excluded
}

export interface RowError {
  rowNumber: number;
  code: string; // e.g. "missing_barcode"
  reason: string;
  rowContent: RowMap;
}

export interface ReconciliationResult {
  newProducts: ProductDraft[];
  updatedProducts: UpdateDraft[];
  warnings: DuplicateWarning[];
  errors: RowError[];
  hasChanges: boolean;
  engineVersion: string;
}

// Named reference entity (supplier or category). `id` is null while unsaved.
export interface NamedRef {
  id: number | null;
  name: string;
}

export interface CatalogProduct {
  id: number;
  barcode: string;
  itemNumber: string | null;
  productName: string | null;
  secondProductName: string | null;
  purchasePrice: number | null;
  retailPrice: number | null;
  stockQuantity: number | null;
  supplier: NamedRef | null;
  category: NamedRef | null;
}

export type NewCatalogProduct = Omit<CatalogProduct, "id">;

export type PriceKind = "purchase" | "retail";

export type PriceSource = "IMPORT_EXCEL" | "INVENTORY_SYNC" | (string & {});

export interface PriceHistoryRecord {
  id: number;
  productId: number;
  kind: PriceKind;
  price: number;
  effectiveAt: string; // ISO timestamp
  source: PriceSource;
  note: string | null;
  createdAt: string;
}

export type NewPriceHistoryRecord = Omit<PriceHistoryRecord, "id" | "createdAt">;

export type SyncStatus = "notAttempted" | "syncedSuccessfully" | "attemptedWithErrors";

/** One inventory-count session: grid row 0 is the header. */
export interface InventorySession {
  id: string;
  title: string;
  supplierName: string;
  categoryName: string;
  createdAt: string;
  grid: string[][];
  syncStatus: SyncStatus;
}

export interface SyncResult {
  processedRows: number;
  attemptedUpdates: number;
  succeeded: number;
  failed: number;
  summaryMessage: string;
}

export interface ApplyResult {
  inserted: number;
  updated: number;
  skipped: number; // update drafts whose product vanished before apply
  priceHistoryRecords: number;
}

export const ENGINE_VERSION = "0.1.0";
