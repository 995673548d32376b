import { describe, expect, it } from "vitest";
import { decimalsEqual, normalizeNumberString, parseDecimal, parseNonNegativeDecimal, trimmedOrAbsent } from "./sanitize.js";

describe("parseDecimal", () => {
  it("accepts comma and period separators", () => {
    expect(parseDecimal("12,5")).toBe(12.5);
    expect(parseDecimal(" 3.40 ")).toBe(3.4);
    expect(parseDecimal("-2")).toBe(-2);
    expect(parseDecimal(".5")).toBe(0.5);
  });

  it("returns undefined for blank or non-numeric text", () => {
    expect(parseDecimal("")).toBeUndefined();
    expect(parseDecimal("   ")).toBeUndefined();
    expect(parseDecimal("abc")).toBeUndefined();
    expect(parseDecimal("12abc")).toBeUndefined();
    expect(parseDecimal(undefined)).toBeUndefined();
  });

  it("does not understand thousands separators", () => {
    expect(parseDecimal("1.234,5")).toBeUndefined();
    expect(parseDecimal("1 000")).toBeUndefined();
  });
});

describe("trimmedOrAbsent", () => {
  it("trims and maps blank to undefined", () => {
    expect(trimmedOrAbsent("  Widget ")).toBe("Widget");
    expect(trimmedOrAbsent("   ")).toBeUndefined();
    expect(trimmedOrAbsent("")).toBeUndefined();
    expect(trimmedOrAbsent(null)).toBeUndefined();
  });
});

describe("decimalsEqual", () => {
  it("treats two absent values as equal", () => {
    expect(decimalsEqual(undefined, undefined)).toBe(true);
    expect(decimalsEqual(null, undefined)).toBe(true);
  });

  it("never equates a number with an absent value", () => {
    expect(decimalsEqual(0, undefined)).toBe(false);
    expect(decimalsEqual(undefined, 5)).toBe(false);
    expect(decimalsEqual(3, null)).toBe(false);
  });

  it("compares within 0.0001", () => {
    expect(decimalsEqual(1.00001, 1.00002)).toBe(true);
    expect(decimalsEqual(1.0, 1.001)).toBe(false);
    expect(decimalsEqual(2, 2)).toBe(true);
  });
});

describe("normalizeNumberString / parseNonNegativeDecimal", () => {
  it("normalizes separators", () => {
    expect(normalizeNumberString(" 4,25 ")).toBe("4.25");
  });

  it("rejects negatives", () => {
    expect(parseNonNegativeDecimal("-1")).toBeUndefined();
    expect(parseNonNegativeDecimal("0")).toBe(0);
    expect(parseNonNegativeDecimal("7,5")).toBe(7.5);
  });
});
