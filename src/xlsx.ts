import * as XLSX from "xlsx";
import { format } from "date-fns";
import type { TabularSource } from "./types.js";

const PREFERRED_SHEETS = ["products", "inventory"];

/**
 * Select the sheet to read: `Products` or `Inventory` (any case) when present,
 * otherwise the first sheet.
 */
function chooseMainSheet(sheetNames: string[]): string | undefined {
  const preferred = sheetNames.find((name) => PREFERRED_SHEETS.includes(name.toLowerCase()));
  return preferred ?? sheetNames[0];
}

const cellToString = (value: unknown): string => {
  if (value === undefined || value === null) return "";
  return String(value);
};

/**
 * Read a workbook (XLSX, XLS, ODS, or an HTML table export) into header + string rows.
 * Numeric cells come through as their raw value (`10.5`, not a formatted "10,50").
 * Fully blank rows are dropped.
 */
export function readWorkbookToSource(fileBytes: ArrayBuffer | Uint8Array): TabularSource {
  const data = fileBytes instanceof Uint8Array ? fileBytes : new Uint8Array(fileBytes);
  const workbook = XLSX.read(data, { type: "array" });
  const sheetName = chooseMainSheet(workbook.SheetNames);
  if (!sheetName) return { header: [], rows: [] };
  const sheet = workbook.Sheets[sheetName];

  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: "", blankrows: false });
  const grid = raw.map((row) => row.map(cellToString));
  const nonBlank = grid.filter((row) => row.some((cell) => cell.trim() !== ""));
  if (!nonBlank.length) return { header: [], rows: [] };
  const [first, ...rest] = nonBlank;
  return { header: first.map((h) => h.trim()), rows: rest };
}

export interface ExportedWorkbook {
  fileName: string;
  bytes: Uint8Array;
}

const sanitizeFileBase = (name: string): string => name.replace(/[/:]/g, "-").trim();

export function exportFileName(preferredName: string, now: Date): string {
  const base = sanitizeFileBase(preferredName) || "Inventory";
  return `${base}_${format(now, "yyyy-MM-dd_HH-mm-ss")}.xlsx`;
}

/** Write a grid (header first) to a one-sheet `Inventory` workbook, every cell as text. */
export function exportGridToWorkbook(
  grid: readonly (readonly string[])[],
  preferredName: string,
  now: Date = new Date()
): ExportedWorkbook {
  const sheet = XLSX.utils.aoa_to_sheet(grid.map((row) => [...row]));
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, "Inventory");
  const out: unknown = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  if (!(out instanceof ArrayBuffer)) {
    throw new Error("Workbook writer did not return binary data");
  }
  return { fileName: exportFileName(preferredName, now), bytes: new Uint8Array(out) };
}
