import type { TabularSource } from "./types.js";

export type Delimiter = "," | ";" | "\t" | "|";

const DELIMITERS: Delimiter[] = [",", ";", "\t", "|"];

/**
 * Parse delimiter-separated text into rows with a small state machine:
 * quoted fields may contain the delimiter and newlines, `""` is an escaped quote,
 * CR is ignored. A trailing all-empty row (final newline) is dropped.
 */
export function parseDsvRaw(text: string, delim: Delimiter): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else if (c === `"`) {
      inQuotes = true;
    } else if (c === delim) {
      pushField();
    } else if (c === "\n") {
      pushField();
      pushRow();
    } else if (c !== "\r") {
      field += c;
    }
  }
  pushField();
  pushRow();
  if (rows.length && rows[rows.length - 1].every((v) => v === "")) rows.pop();
  return rows;
}

/**
 * Pick the delimiter whose column count is most stable over the first lines.
 * Ties go to the earlier entry in `, ; \t |`; a delimiter that never splits scores 0.
 */
export function detectDelimiterFromText(text: string): Delimiter {
  const lines = text
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "")
    .slice(0, 20);
  let best: Delimiter = ",";
  let bestScore = 0;
  for (const delim of DELIMITERS) {
    const counts = lines.map((l) => parseDsvRaw(l, delim)[0]?.length ?? 0);
    if (!counts.length || counts[0] < 2) continue;
    const consistent = counts.filter((n) => n === counts[0]).length;
    const score = consistent * counts[0];
    if (score > bestScore) {
      best = delim;
      bestScore = score;
    }
  }
  return best;
}

/** Strip a UTF-8 BOM left by spreadsheet exports. */
const stripBom = (text: string): string => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

/** CSV/TSV text → header + data rows. Header cells are trimmed; data cells are kept raw. */
export function parseDelimitedText(text: string, delim?: Delimiter): TabularSource {
  const clean = stripBom(text);
  const rows = parseDsvRaw(clean, delim ?? detectDelimiterFromText(clean));
  if (!rows.length) return { header: [], rows: [] };
  const [first, ...rest] = rows;
  return { header: first.map((h) => h.trim()), rows: rest };
}

const escapeCell = (value: string, delim: Delimiter): string =>
  /["\r\n]/.test(value) || value.includes(delim) ? `"${value.replace(/"/g, '""')}"` : value;

/** Grid → delimited text (header first), quoting only where needed. */
export function gridToDelimitedText(grid: readonly (readonly string[])[], delim: Delimiter = ","): string {
  return grid.map((row) => row.map((cell) => escapeCell(cell, delim)).join(delim)).join("\n");
}
