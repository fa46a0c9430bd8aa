import { describe, it, expect } from "vitest";
import { cellValue, csvHeader, parseCsv, parseCsvRecords, toCsv } from "../../src/utils/csv.js";

describe("cellValue", () => {
  it("writes empty cells for missing values and JSON for objects", () => {
    expect(cellValue(null)).toBe("");
    expect(cellValue(undefined)).toBe("");
    expect(cellValue(42)).toBe("42");
    expect(cellValue(false)).toBe("false");
    expect(cellValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe("toCsv", () => {
  it("uses the sorted union of fields as the header", () => {
    expect(csvHeader([{ Name: "A" }, { Industry: "Tech", Name: "B" }])).toEqual(["Industry", "Name"]);
  });

  it("serializes records with LF line endings and quotes where needed", () => {
    const csv = toCsv([
      { Name: "Acme, Inc.", Description: 'Says "hi"' },
      { Name: "Plain", Description: "two\nlines", Phone: null },
    ]);

    expect(csv).toBe(
      'Description,Name,Phone\n' +
        '"Says ""hi""","Acme, Inc.",\n' +
        '"two\nlines",Plain,\n'
    );
  });
});

describe("parseCsv", () => {
  it("handles quoted commas, doubled quotes and embedded line breaks", () => {
    expect(parseCsv('a,b\n"x, y","say ""hi"""\n"multi\nline",z\n')).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
      ["multi\nline", "z"],
    ]);
  });

  it("accepts CRLF endings and a missing final newline", () => {
    expect(parseCsv("a,b\r\n1,2\r\n3,")).toEqual([
      ["a", "b"],
      ["1", "2"],
      ["3", ""],
    ]);
  });

  it("reads back what toCsv writes", () => {
    const records = [{ Name: "Acme, Inc.", Note: 'He said "ok"\nthen left' }];
    expect(parseCsvRecords(toCsv(records))).toEqual(records);
  });
});

describe("parseCsvRecords", () => {
  it("maps rows onto the header and skips blank lines", () => {
    expect(parseCsvRecords("sf__Id,Name\n001A,Acme\n\n001B\n")).toEqual([
      { sf__Id: "001A", Name: "Acme" },
      { sf__Id: "001B", Name: "" },
    ]);
  });

  it("returns nothing for empty input or a header alone", () => {
    expect(parseCsvRecords("")).toEqual([]);
    expect(parseCsvRecords("sf__Id,sf__Error\n")).toEqual([]);
  });
});
