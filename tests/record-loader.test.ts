/**
 * Record Loader Tests
 *
 * Verifies:
 * - CSV, Excel, JSON and JSON-lines sources produce text-only records
 * - every record carries the full header key set
 * - blank rows are skipped, missing cells become ""
 * - header normalisation, required fields, date fields
 * - UnsupportedFormatError / LoadError on bad input
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "fs";
import path from "path";
import * as XLSX from "xlsx";

import { detectFormat, loadRecords } from "../src/data/record_loader.js";
import {
  fieldKey,
  formatDateField,
  formatDateParts,
  normalizeHeader,
  stringifyCell,
} from "../src/data/cell_values.js";
import { LoadError, UnsupportedFormatError } from "../src/shared/errors.js";
import { makeTempDir, removeDir } from "./helpers/fixtures.js";

let dir: string;

beforeEach(() => {
  dir = makeTempDir("records-");
});

afterEach(() => {
  removeDir(dir);
});

function writeData(name: string, content: string | Buffer): string {
  const file = path.join(dir, name);
  writeFileSync(file, content);
  return file;
}

// ── Format detection ────────────────────────────────────────────────

describe("detectFormat", () => {
  it("maps known extensions case-insensitively", () => {
    expect(detectFormat("clients.XLSX")).toBe("xlsx");
    expect(detectFormat("clients.xls")).toBe("xlsx");
    expect(detectFormat("clients.csv")).toBe("csv");
    expect(detectFormat("clients.json")).toBe("json");
    expect(detectFormat("clients.jsonl")).toBe("jsonl");
  });

  it("rejects unknown extensions", () => {
    expect(() => detectFormat("clients.txt")).toThrow(UnsupportedFormatError);
    expect(() => detectFormat("clients")).toThrow(/Unsupported data format "\(none\)"/);
  });
});

// ── CSV ─────────────────────────────────────────────────────────────

describe("loadRecords — CSV", () => {
  it("reads one record per row with normalised headers", () => {
    const file = writeData("clients.csv", "Name,Surname,Company\nAna,Kovacs,Acme\n\nMehmet,Yilmaz\n,,\n");
    const result = loadRecords(file);

    expect(result.format).toBe("csv");
    expect(result.fields).toEqual(["name", "surname", "company"]);
    expect(result.records).toEqual([
      { name: "Ana", surname: "Kovacs", company: "Acme" },
      { name: "Mehmet", surname: "Yilmaz", company: "" },
    ]);
    expect(result.rejected).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("handles quoted fields, a BOM and surrounding spaces", () => {
    const file = writeData("clients.csv", '\uFEFFname,address\nAna," 1 Main St, Split "\n');
    expect(loadRecords(file).records).toEqual([{ name: "Ana", address: "1 Main St, Split" }]);
  });

  it("honours a custom delimiter", () => {
    const file = writeData("clients.csv", "name;fee\nAna;1200,50\n");
    expect(loadRecords(file, { csvDelimiter: ";" }).records).toEqual([{ name: "Ana", fee: "1200,50" }]);
  });

  it("keeps raw headers when normalisation is off", () => {
    const file = writeData("clients.csv", "First Name,Surname\nAna,Kovacs\n");
    expect(loadRecords(file, { normalizeHeaders: false }).fields).toEqual(["First Name", "Surname"]);
  });

  it("keeps the first of duplicate columns and warns", () => {
    const file = writeData("clients.csv", "name,Name\nAna,Other\n");
    const result = loadRecords(file);
    expect(result.fields).toEqual(["name"]);
    expect(result.records).toEqual([{ name: "Ana" }]);
    expect(result.warnings).toEqual(['Duplicate column "Name" (field "name"); first occurrence kept']);
  });

  it("returns no records for an empty file", () => {
    const file = writeData("clients.csv", "");
    const result = loadRecords(file);
    expect(result.fields).toEqual([]);
    expect(result.records).toEqual([]);
  });

  it("rejects rows missing a required field", () => {
    const file = writeData("clients.csv", "name,surname\nAna,Kovacs\n,Novak\n");
    const result = loadRecords(file, { requiredFields: ["Name"] });
    expect(result.records).toEqual([{ name: "Ana", surname: "Kovacs" }]);
    expect(result.rejected).toEqual([
      { row: 2, values: { name: "", surname: "Novak" }, reasons: ["missing: name"] },
    ]);
  });

  it("reformats ISO dates in date fields", () => {
    const file = writeData("clients.csv", "name,Start Date\nAna,2024-03-01\nLea,soon\n");
    const result = loadRecords(file, { dateFields: ["Start Date"] });
    expect(result.records).toEqual([
      { name: "Ana", start_date: "01/03/2024" },
      { name: "Lea", start_date: "soon" },
    ]);
  });
});

// ── Excel ───────────────────────────────────────────────────────────

describe("loadRecords — Excel", () => {
  function writeWorkbook(rows: unknown[][]): string {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), "Clients");
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([["ignored"], ["x"]]), "Other");
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    return writeData("clients.xlsx", buffer);
  }

  it("reads the first worksheet with stringified numbers", () => {
    const file = writeWorkbook([
      ["Name", "Surname", "Fee", "Active"],
      ["Ana", "Kovacs", 1200.5, true],
      [],
      ["Lea", "Novak", 700],
    ]);
    const result = loadRecords(file);

    expect(result.format).toBe("xlsx");
    expect(result.fields).toEqual(["name", "surname", "fee", "active"]);
    expect(result.records).toEqual([
      { name: "Ana", surname: "Kovacs", fee: "1200.5", active: "true" },
      { name: "Lea", surname: "Novak", fee: "700", active: "" },
    ]);
  });

  describe("date cells", () => {
    const savedTz = process.env.TZ;

    beforeAll(() => {
      // A zone whose 1899 local mean time differs from its current offset.
      process.env.TZ = "Europe/Istanbul";
    });

    afterAll(() => {
      if (savedTz === undefined) delete process.env.TZ;
      else process.env.TZ = savedTz;
    });

    function writeDateWorkbook(serials: number[]): string {
      const sheet = XLSX.utils.aoa_to_sheet([["Name", "Start"], ...serials.map((s) => ["Ana", s])]);
      serials.forEach((serial, i) => {
        const cell: XLSX.CellObject = { t: "n", v: serial, z: "yyyy-mm-dd" };
        sheet[`B${i + 2}`] = cell;
      });
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(workbook, sheet, "Clients");
      const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
      return writeData("dates.xlsx", buffer);
    }

    it("reads date-formatted serials as calendar dates", () => {
      const file = writeDateWorkbook([45296, 45296.5]);
      expect(loadRecords(file).records).toEqual([
        { name: "Ana", start: "2024-01-05" },
        { name: "Ana", start: "2024-01-05 12:00:00" },
      ]);
    });

    it("reformats Excel dates in date fields without shifting the day", () => {
      const file = writeDateWorkbook([45296]);
      expect(loadRecords(file, { dateFields: ["start"] }).records).toEqual([{ name: "Ana", start: "05/01/2024" }]);
    });
  });

  it("fails with LoadError on a corrupt workbook", () => {
    const file = writeData("clients.xlsx", Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x00, 0x01, 0x02]));
    expect(() => loadRecords(file)).toThrow(LoadError);
  });
});

// ── JSON ────────────────────────────────────────────────────────────

describe("loadRecords — JSON", () => {
  it("reads an array of objects with the union of their keys", () => {
    const file = writeData(
      "clients.json",
      JSON.stringify([
        { Name: "Ana", Age: 31, Vip: true, Tags: ["a", "b"] },
        { Name: "Lea", Company: null },
        5,
      ]),
    );
    const result = loadRecords(file);

    expect(result.fields).toEqual(["name", "age", "vip", "tags", "company"]);
    expect(result.records).toEqual([
      { name: "Ana", age: "31", vip: "true", tags: '["a","b"]', company: "" },
      { name: "Lea", age: "", vip: "", tags: "", company: "" },
    ]);
    expect(result.warnings).toEqual(["Entry 3 is not an object (number); skipped"]);
  });

  it("treats a single object as one record", () => {
    const file = writeData("client.json", JSON.stringify({ name: "Ana", surname: "Kovacs" }));
    expect(loadRecords(file).records).toEqual([{ name: "Ana", surname: "Kovacs" }]);
  });

  it("fails with LoadError on malformed JSON", () => {
    const file = writeData("clients.json", '[{"name": "Ana"');
    expect(() => loadRecords(file)).toThrow(/Invalid JSON/);
  });

  it("fails with LoadError when the top level is not an object or array", () => {
    const file = writeData("clients.json", "42");
    expect(() => loadRecords(file)).toThrow(LoadError);
  });
});

// ── JSON-lines ──────────────────────────────────────────────────────

describe("loadRecords — JSON-lines", () => {
  it("reads one record per non-blank line", () => {
    const file = writeData("clients.jsonl", '{"name":"Ana"}\n\n{"name":"Lea","city":"Split"}\n');
    const result = loadRecords(file);
    expect(result.fields).toEqual(["name", "city"]);
    expect(result.records).toEqual([
      { name: "Ana", city: "" },
      { name: "Lea", city: "Split" },
    ]);
  });

  it("aborts on an invalid line, naming its number", () => {
    const file = writeData("clients.jsonl", '{"name":"Ana"}\nnot json\n');
    expect(() => loadRecords(file)).toThrow(/line 2/);
  });

  it("aborts on a line that is not an object", () => {
    const file = writeData("clients.jsonl", "[1, 2]\n");
    expect(() => loadRecords(file)).toThrow(/Line 1 of .* is not a JSON object/);
  });
});

// ── Errors ──────────────────────────────────────────────────────────

describe("loadRecords — errors", () => {
  it("reports an unsupported extension before reading the file", () => {
    expect(() => loadRecords(path.join(dir, "missing.txt"))).toThrow(UnsupportedFormatError);
  });

  it("fails with LoadError when the file does not exist", () => {
    expect(() => loadRecords(path.join(dir, "missing.csv"))).toThrow(LoadError);
  });
});

// ── Cell helpers ────────────────────────────────────────────────────

describe("normalizeHeader", () => {
  it("folds accents, lower-cases and joins words with underscores", () => {
    expect(normalizeHeader("  Şirket Adresi ")).toBe("sirket_adresi");
    expect(normalizeHeader("Start Date")).toBe("start_date");
  });

  it("drops characters without an ASCII decomposition", () => {
    expect(normalizeHeader("Müşteri Adı")).toBe("musteri_ad");
  });

  it("returns an empty key for an empty header", () => {
    expect(normalizeHeader("")).toBe("");
  });
});

describe("fieldKey", () => {
  it("normalises names unless raw headers are kept", () => {
    expect(fieldKey("Company Name")).toBe("company_name");
    expect(fieldKey(" Company Name ", false)).toBe("Company Name");
  });
});

describe("formatDateParts", () => {
  it("pads fields and omits a midnight time", () => {
    expect(formatDateParts({ y: 2024, m: 1, d: 5, H: 0, M: 0, S: 0 })).toBe("2024-01-05");
    expect(formatDateParts({ y: 2024, m: 1, d: 5, H: 9, M: 5, S: 7 })).toBe("2024-01-05 09:05:07");
  });
});

describe("stringifyCell", () => {
  it("converts scalars deterministically", () => {
    expect(stringifyCell(null)).toBe("");
    expect(stringifyCell(undefined)).toBe("");
    expect(stringifyCell("  Ana ")).toBe("Ana");
    expect(stringifyCell(42)).toBe("42");
    expect(stringifyCell(0.1)).toBe("0.1");
    expect(stringifyCell(false)).toBe("false");
  });

  it("formats dates as YYYY-MM-DD, with a time only when set", () => {
    expect(stringifyCell(new Date(2024, 2, 1))).toBe("2024-03-01");
    expect(stringifyCell(new Date(2024, 2, 1, 9, 5, 0))).toBe("2024-03-01 09:05:00");
  });

  it("serialises nested values as JSON", () => {
    expect(stringifyCell({ a: 1 })).toBe('{"a":1}');
  });
});

describe("formatDateField", () => {
  it("reformats ISO dates as DD/MM/YYYY", () => {
    expect(formatDateField("2024-03-01")).toBe("01/03/2024");
    expect(formatDateField("2024-03-01 10:00:00")).toBe("01/03/2024");
  });

  it("returns other values unchanged", () => {
    expect(formatDateField("March 2024")).toBe("March 2024");
    expect(formatDateField("")).toBe("");
  });
});
