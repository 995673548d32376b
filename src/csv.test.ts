import { describe, expect, it } from "vitest";
import { detectDelimiterFromText, gridToDelimitedText, parseDelimitedText, parseDsvRaw } from "./csv.js";

describe("parseDsvRaw", () => {
  it("handles quotes, escaped quotes and embedded newlines", () => {
    const text = 'barcode,productName\r\nB1,"Widget, large"\nB2,"Say ""hi""\nthere"\n';
    expect(parseDsvRaw(text, ",")).toEqual([
      ["barcode", "productName"],
      ["B1", "Widget, large"],
      ["B2", 'Say "hi"\nthere'],
    ]);
  });
});

describe("detectDelimiterFromText", () => {
  it("prefers the delimiter with a stable column count", () => {
    expect(detectDelimiterFromText("barcode;retailPrice\nB1;1,5\nB2;2,25")).toBe(";");
    expect(detectDelimiterFromText("barcode\tquantity\nB1\t3")).toBe("\t");
    expect(detectDelimiterFromText("barcode,quantity\nB1,3")).toBe(",");
  });
});

describe("parseDelimitedText", () => {
  it("splits header from rows and trims header cells", () => {
    expect(parseDelimitedText("\uFEFF barcode ; quantity\nB1;2,5\n")).toEqual({
      header: ["barcode", "quantity"],
      rows: [["B1", "2,5"]],
    });
  });

  it("returns an empty source for empty text", () => {
    expect(parseDelimitedText("")).toEqual({ header: [], rows: [] });
  });
});

describe("gridToDelimitedText", () => {
  it("quotes only cells that need it", () => {
    expect(gridToDelimitedText([["barcode", "note"], ["B1", 'a "b", c']])).toBe('barcode,note\nB1,"a ""b"", c"');
  });
});
