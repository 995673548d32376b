import type { ChangedField, ProductDraft, ReconciliationResult, UpdateDraft } from "./types.js";
import { FIELD_TABLE } from "./schema.js";

/**
 * Module: Review Formatting
 * Purpose: Labels and display values for the human review step that sits
 * between diff and apply.
 */

export const ABSENT_MARK = "—";

export const FIELD_LABELS: Record<ChangedField, string> = {
  itemNumber: "Item code",
  productName: "Name",
  secondProductName: "Second name",
  purchasePrice: "Purchase price",
  retailPrice: "Retail price",
  stockQuantity: "Stock",
  supplierName: "Supplier",
  categoryName: "Category",
};

/** 0–3 fraction digits, no grouping: 10 → "10", 10.5 → "10.5", 1.23456 → "1.235". */
export function formatPrice(value: number | undefined): string {
  if (value === undefined) return ABSENT_MARK;
  return new Intl.NumberFormat("en-US", {
    minimumFractionDigits: 0,
    maximumFractionDigits: 3,
    useGrouping: false,
  }).format(value);
}

export function formatQuantity(value: number | undefined): string {
  if (value === undefined) return ABSENT_MARK;
  return Number.isInteger(value) ? value.toFixed(0) : String(value);
}

export function formatFieldValue(field: ChangedField, draft: ProductDraft): string {
  const def = FIELD_TABLE[field];
  if (def.kind === "text") return draft[def.field] ?? ABSENT_MARK;
  const value = draft[def.field];
  return def.field === "stockQuantity" ? formatQuantity(value) : formatPrice(value);
}

/** One line per changed field: "Retail price: 9.99 → 10.99". */
export function describeUpdate(update: UpdateDraft): string[] {
  return update.changedFields.map(
    (field) => `${FIELD_LABELS[field]}: ${formatFieldValue(field, update.old)} → ${formatFieldValue(field, update.new)}`
  );
}

export interface ResultSummary {
  newProducts: number;
  updatedProducts: number;
  warnings: number;
  errors: number;
}

export const summarizeResult = (result: ReconciliationResult): ResultSummary => ({
  newProducts: result.newProducts.length,
  updatedProducts: result.updatedProducts.length,
  warnings: result.warnings.length,
  errors: result.errors.length,
});

/** Multi-line plain-text report of a reconciliation result. */
export function renderResultReport(result: ReconciliationResult): string {
  const counts = summarizeResult(result);
  const lines = [
    `New products: ${counts.newProducts}`,
    `Updated products: ${counts.updatedProducts}`,
    `Duplicate barcodes: ${counts.warnings}`,
    `Rows with errors: ${counts.errors}`,
  ];
  for (const update of result.updatedProducts) {
    lines.push(`~ ${update.barcode}`);
    for (const line of describeUpdate(update)) lines.push(`    ${line}`);
  }
  for (const draft of result.newProducts) {
    lines.push(`+ ${draft.barcode} ${draft.productName ?? ""}`.trimEnd());
  }
  for (const warning of result.warnings) {
    lines.push(`! ${warning.barcode} repeated on rows ${warning.rowNumbers.join(", ")}`);
  }
  for (const error of result.errors) {
    lines.push(`x row ${error.rowNumber}: ${error.reason}`);
  }
  return lines.join("\n");
}
