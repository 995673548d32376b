import type { RowError, RowMap, TabularSource } from "./types.js";
import { COLUMN } from "./schema.js";
import { parseDecimal } from "./sanitize.js";

/**
 * Module: Row Grouper
 * Purpose: Collapse raw rows onto their barcode. Every field is last-write-wins
 * except the quantity, which is summed across the rows that share a barcode.
 */

/**
 * Stock quantity of a logical row.
 * - `absent`: no quantity column, or the column was blank/unparsable.
 * - `literal`: the last row's own value, kept when the running sum is not positive
 *   (an explicitly counted zero stays zero instead of becoming "no quantity").
 * - `summed`: positive total across all contributing rows.
 */
export type QuantityValue =
  | { kind: "absent" }
  | { kind: "literal"; value: number }
  | { kind: "summed"; value: number };

export interface PendingRow {
  barcode: string;
  lastRow: RowMap;
  rowNumbers: number[];
  quantitySum: number;
}

export interface GroupedRows {
  pending: Map<string, PendingRow>;
  errors: RowError[];
}

/** Map one raw row onto the header; short rows are padded with "" and every cell is trimmed. */
export function buildRowMap(header: readonly string[], cells: readonly string[]): RowMap {
  const map: RowMap = {};
  header.forEach((key, idx) => {
    map[key] = String(cells[idx] ?? "").trim();
  });
  return map;
}

// stockQuantity wins over quantity; an unparsable stockQuantity falls through
const quantityContribution = (row: RowMap): number =>
  parseDecimal(row[COLUMN.stockQuantity]) ?? parseDecimal(row[COLUMN.quantity]) ?? 0;

export function groupRows(source: TabularSource): GroupedRows {
  const pending = new Map<string, PendingRow>();
  const errors: RowError[] = [];

  source.rows.forEach((cells, index) => {
    const rowNumber = index + 1;
    const map = buildRowMap(source.header, cells);
    const barcode = map[COLUMN.barcode] ?? "";
    if (!barcode) {
      errors.push({ rowNumber, code: "missing_barcode", reason: "Missing barcode", rowContent: map });
      return;
    }

    const quantity = quantityContribution(map);
    const existing = pending.get(barcode);
    if (existing) {
      existing.lastRow = map;
      existing.rowNumbers.push(rowNumber);
      existing.quantitySum += quantity;
    } else {
      pending.set(barcode, { barcode, lastRow: map, rowNumbers: [rowNumber], quantitySum: quantity });
    }
  });

  return { pending, errors };
}

/**
 * Resolve the logical stock quantity of a grouped row. Note the literal branch
 * reads `stockQuantity` whenever that column exists, even if blank, and only
 * otherwise looks at `quantity`.
 */
export function resolveQuantity(row: PendingRow): QuantityValue {
  if (row.quantitySum > 0) return { kind: "summed", value: row.quantitySum };
  const text = COLUMN.stockQuantity in row.lastRow ? row.lastRow[COLUMN.stockQuantity] : row.lastRow[COLUMN.quantity];
  const value = parseDecimal(text);
  return value === undefined ? { kind: "absent" } : { kind: "literal", value };
}

export const quantityOf = (q: QuantityValue): number | undefined => (q.kind === "absent" ? undefined : q.value);
