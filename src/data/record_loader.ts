/**
 * Record Loader — reads client records from Excel, CSV, JSON or JSON-lines.
 *
 * Every source is reduced to a header (field names, in source order) and a
 * list of rows; each row becomes one FieldRecord carrying exactly the
 * header's keys, with all values converted to text.
 */

import { readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";

import { LoadError, UnsupportedFormatError, errorMessage } from "../shared/errors.js";
import type { DataFormat, FieldRecord, RecordSet, RejectedRow } from "../shared/types.js";
import { fieldKey, formatDateField, formatDateParts, stringifyCell } from "./cell_values.js";

export interface LoadOptions {
  /** Fold headers to lower-case ASCII with underscores. Default true. */
  normalizeHeaders?: boolean;
  /** Rows with an empty value in any of these fields are rejected. */
  requiredFields?: string[];
  /** Fields whose ISO dates are reformatted DD/MM/YYYY. */
  dateFields?: string[];
  /** CSV delimiter. Default ",". */
  csvDelimiter?: string;
}

/** Header plus raw rows aligned with it, before text conversion. */
interface RawTable {
  headers: string[];
  rows: unknown[][];
  warnings: string[];
}

const EXTENSION_FORMATS: Record<string, DataFormat> = {
  ".xlsx": "xlsx",
  ".xls": "xlsx",
  ".csv": "csv",
  ".json": "json",
  ".jsonl": "jsonl",
};

/**
 * Infer the data format from a file extension.
 * Throws UnsupportedFormatError for unknown extensions.
 */
export function detectFormat(filePath: string): DataFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS[ext];
  if (!format) {
    throw new UnsupportedFormatError(ext, filePath);
  }
  return format;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlankRow(values: unknown[]): boolean {
  return values.every((v) => stringifyCell(v) === "");
}

// ── Format readers ──────────────────────────────────────────────────

function readTabular(headerRow: unknown[], dataRows: unknown[][]): RawTable {
  const headers = headerRow.map((h) => stringifyCell(h));
  const rows = dataRows.filter((values) => !isBlankRow(values));
  return { headers, rows, warnings: [] };
}

function readCsv(buffer: Buffer, delimiter: string): RawTable {
  const table: string[][] = parse(buffer, {
    delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const [headerRow, ...dataRows] = table;
  if (!headerRow) return { headers: [], rows: [], warnings: [] };
  return readTabular(headerRow, dataRows);
}

/**
 * Replace date-formatted serial cells with their YYYY-MM-DD text.
 * The serial is decoded arithmetically, so the result does not depend on
 * the process time zone.
 */
function stringifyDateCells(sheet: XLSX.WorkSheet, date1904: boolean): void {
  for (const address of Object.keys(sheet)) {
    if (address.startsWith("!")) continue;
    const cell: XLSX.CellObject = sheet[address];
    if (cell.t !== "n" || typeof cell.v !== "number" || cell.z === undefined) continue;
    if (!XLSX.SSF.is_date(cell.z)) continue;
    const parts = XLSX.SSF.parse_date_code(cell.v, { date1904 });
    sheet[address] = { t: "s", v: formatDateParts(parts) };
  }
}

function readXlsx(buffer: Buffer): RawTable {
  const workbook = XLSX.read(buffer, { type: "buffer", cellNF: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return { headers: [], rows: [], warnings: [] };
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) return { headers: [], rows: [], warnings: [] };
  stringifyDateCells(sheet, Boolean(workbook.Workbook?.WBProps?.date1904));

  const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  const [headerRow, ...dataRows] = table;
  if (!headerRow) return { headers: [], rows: [], warnings: [] };
  return readTabular(headerRow, dataRows);
}

function readObjects(items: unknown[]): RawTable {
  const warnings: string[] = [];
  const headers: string[] = [];
  const seen = new Set<string>();
  const objects: Array<Record<string, unknown>> = [];

  items.forEach((item, i) => {
    if (!isPlainObject(item)) {
      const kind = Array.isArray(item) ? "array" : item === null ? "null" : typeof item;
      warnings.push(`Entry ${i + 1} is not an object (${kind}); skipped`);
      return;
    }
    if (isBlankRow(Object.values(item))) return;
    for (const key of Object.keys(item)) {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    }
    objects.push(item);
  });

  const rows = objects.map((obj) => headers.map((h) => obj[h]));
  return { headers, rows, warnings };
}

function readJson(buffer: Buffer, filePath: string): RawTable {
  let data: unknown;
  try {
    data = JSON.parse(buffer.toString("utf-8"));
  } catch (err) {
    throw new LoadError(`Invalid JSON in ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
  if (!Array.isArray(data) && !isPlainObject(data)) {
    throw new LoadError(`JSON data must be an array of objects or an object: ${filePath}`, filePath);
  }
  const items: unknown[] = Array.isArray(data) ? data : [data];
  return readObjects(items);
}

function readJsonLines(buffer: Buffer, filePath: string): RawTable {
  const items: unknown[] = [];
  const lines = buffer.toString("utf-8").split(/\r?\n/);

  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    let value: unknown;
    try {
      value = JSON.parse(trimmed);
    } catch (err) {
      throw new LoadError(
        `Invalid JSON on line ${i + 1} of ${filePath}: ${errorMessage(err)}`,
        filePath,
        { cause: err },
      );
    }
    if (!isPlainObject(value)) {
      throw new LoadError(`Line ${i + 1} of ${filePath} is not a JSON object`, filePath);
    }
    items.push(value);
  });

  return readObjects(items);
}

function readTable(format: DataFormat, buffer: Buffer, filePath: string, delimiter: string): RawTable {
  switch (format) {
    case "csv":
      return readCsv(buffer, delimiter);
    case "xlsx":
      return readXlsx(buffer);
    case "json":
      return readJson(buffer, filePath);
    case "jsonl":
      return readJsonLines(buffer, filePath);
  }
}

// ── Public API ──────────────────────────────────────────────────────

/**
 * Load all records from a data file.
 *
 * Fails with UnsupportedFormatError for an unknown extension and LoadError
 * when the file cannot be read or parsed; no partial record list is returned.
 */
export function loadRecords(filePath: string, options: LoadOptions = {}): RecordSet {
  const format = detectFormat(filePath);
  const normalize = options.normalizeHeaders ?? true;
  const keyOf = (name: string) => fieldKey(name, normalize);

  let buffer: Buffer;
  try {
    buffer = readFileSync(filePath);
  } catch (err) {
    throw new LoadError(`Cannot read data file ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }

  let raw: RawTable;
  try {
    raw = readTable(format, buffer, filePath, options.csvDelimiter ?? ",");
  } catch (err) {
    if (err instanceof LoadError) throw err;
    throw new LoadError(`Cannot parse ${format} file ${filePath}: ${errorMessage(err)}`, filePath, {
      cause: err,
    });
  }

  // Source header → record key, skipping unnamed columns and duplicates.
  const columns: Array<{ index: number; key: string }> = [];
  const fields: string[] = [];
  raw.headers.forEach((source, index) => {
    const key = keyOf(source);
    if (!key) return;
    if (fields.includes(key)) {
      raw.warnings.push(`Duplicate column "${source}" (field "${key}"); first occurrence kept`);
      return;
    }
    fields.push(key);
    columns.push({ index, key });
  });

  const required = (options.requiredFields ?? []).map(keyOf).filter(Boolean);
  const dateKeys = new Set((options.dateFields ?? []).map(keyOf));
  const records: FieldRecord[] = [];
  const rejected: RejectedRow[] = [];

  raw.rows.forEach((row, i) => {
    const record: Record<string, string> = {};
    for (const { index, key } of columns) {
      const text = stringifyCell(row[index]);
      record[key] = dateKeys.has(key) ? formatDateField(text) : text;
    }

    const missing = required.filter((f) => !record[f]);
    if (missing.length > 0) {
      rejected.push({ row: i + 1, values: record, reasons: missing.map((f) => `missing: ${f}`) });
      return;
    }
    records.push(record);
  });

  return { format, fields, records, rejected, warnings: raw.warnings };
}
