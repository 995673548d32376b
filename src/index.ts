import type { TabularSource } from "./types.js";
import { parseDelimitedText } from "./csv.js";
import { readWorkbookToSource } from "./xlsx.js";

export * from "./types.js";
export * from "./sanitize.js";
export * from "./errors.js";
export { COLUMN, FIELD_TABLE, diffDrafts, draftFromCatalog, draftFromRow, findColumn } from "./schema.js";
export { groupRows, buildRowMap, resolveQuantity, quantityOf } from "./groupRows.js";
export type { GroupedRows, PendingRow, QuantityValue } from "./groupRows.js";
export { diffCatalog, snapshotFromProducts, pendingRowToDraft } from "./diffCatalog.js";
export type { CatalogDiff, CatalogSnapshot } from "./diffCatalog.js";
export {
  reconcileGrid,
  reconcileMappedRows,
  reconcileSessionGrid,
  analyzeImport,
  inferHeader,
  mappedRowsToSource,
  sessionGridToMappedRows,
} from "./reconcile.js";
export { applyChangeSet, applyChangedFields, recordPriceChanges, IMPORT_PRICE_SOURCE } from "./applyChangeSet.js";
export type { ApplyOptions } from "./applyChangeSet.js";
export {
  syncInventorySession,
  syncInventorySessionById,
  createInventorySession,
  ensureSyncErrorColumn,
  countedPriceColumn,
  formatSyncSummary,
  SYNC_ERROR,
  SYNC_PRICE_SOURCE,
} from "./inventorySync.js";
export type { NewSessionInput, SyncOptions } from "./inventorySync.js";
export { findOrCreateRef, resolveRef } from "./store.js";
export type { CatalogStore, RefKind } from "./store.js";
export { SqliteCatalogStore } from "./sqliteStore.js";
export { parseDelimitedText, parseDsvRaw, detectDelimiterFromText, gridToDelimitedText } from "./csv.js";
export type { Delimiter } from "./csv.js";
export { readWorkbookToSource, exportGridToWorkbook, exportFileName } from "./xlsx.js";
export type { ExportedWorkbook } from "./xlsx.js";
export { describeUpdate, formatFieldValue, formatPrice, formatQuantity, renderResultReport, summarizeResult, FIELD_LABELS } from "./review.js";
export type { ResultSummary } from "./review.js";
export { createLogger, setLogLevel, getLogLevel } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { loadConfig } from "./config.js";
export type { EngineConfig } from "./config.js";

/**
 * Module: Entry Point
 * Purpose: Decode an uploaded file into header + string rows, ready for
 * `reconcileGrid` or an inventory session.
 * Notes:
 * - Accepts raw bytes so callers can pass a file read from disk or an upload body.
 * - `.xlsx/.xls/.xlsb/.ods/.html` go through the workbook reader; anything else is
 *   treated as delimited text with a sniffed delimiter.
 */
export function parseTabularFileFromBuffer(fileBytes: ArrayBuffer | Uint8Array, filename: string): TabularSource {
  const lower = filename.toLowerCase();
  const bytes = fileBytes instanceof Uint8Array ? fileBytes : new Uint8Array(fileBytes);
  if (/\.(xlsx|xls|xlsb|ods|html?)$/.test(lower)) {
    return readWorkbookToSource(bytes);
  }
  return parseDelimitedText(new TextDecoder("utf-8").decode(bytes));
}
