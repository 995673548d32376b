/**
 * Module: Field Sanitizers
 * Purpose: Turn raw string cells into canonical decimals and optional text.
 * Notes:
 * - Only comma/period decimal separators; no thousands grouping is recognised.
 * - Blank text is reported as absent so callers can tell "omitted" from "set".
 */

export const DECIMAL_EPSILON = 0.0001;

const DECIMAL_LITERAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Replace the decimal comma with a period and trim surrounding whitespace. */
export const normalizeNumberString = (text: string): string => text.replace(/,/g, ".").trim();

/**
 * Parse a locale-flavoured numeric string ("12,5", " 3.40 ", "1e3").
 * Returns `undefined` for blank input or anything that is not a plain decimal literal,
 * so "1.234,5" (two separators) is rejected rather than guessed at.
 */
export function parseDecimal(text: string | null | undefined): number | undefined {
  const normalized = normalizeNumberString(text ?? "");
  if (!normalized || !DECIMAL_LITERAL_RE.test(normalized)) return undefined;
  const value = Number(normalized);
  return Number.isFinite(value) ? value : undefined;
}

export const trimmedOrAbsent = (text: string | null | undefined): string | undefined => {
  const value = (text ?? "").trim();
  return value ? value : undefined;
};

export function decimalsEqual(
  a: number | null | undefined,
  b: number | null | undefined,
  epsilon: number = DECIMAL_EPSILON
): boolean {
  if (a === undefined || a === null) return b === undefined || b === null;
  if (b === undefined || b === null) return false;
  return Math.abs(a - b) < epsilon;
}

// Empty string and absent are the same value when diffing text fields
export const textsEqual = (a: string | null | undefined, b: string | null | undefined): boolean =>
  (a ?? "") === (b ?? "");

/** Non-negative decimal or `undefined`; used for counted quantities and shelf prices. */
export function parseNonNegativeDecimal(text: string): number | undefined {
  const value = parseDecimal(text);
  return value !== undefined && value >= 0 ? value : undefined;
}
