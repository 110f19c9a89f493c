/**
 * PDF Export Tests
 *
 * LibreOffice is never launched: the command runner is replaced by a fake
 * that records the call and optionally writes the PDF.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "fs";
import path from "path";

import { SofficePdfExporter, pdfPathFor } from "../src/exports/pdf_export.js";
import type { CommandResult, CommandRunner } from "../src/exports/pdf_export.js";
import { ExportError } from "../src/shared/errors.js";
import { makeTempDir, removeDir } from "./helpers/fixtures.js";

interface Call {
  command: string;
  args: string[];
}

function fakeRunner(result: CommandResult, writePdf: boolean, calls: Call[]): CommandRunner {
  return (command, args) => {
    calls.push({ command, args });
    const docx = args[args.length - 1];
    if (writePdf && docx) writeFileSync(pdfPathFor(docx), "%PDF-1.7");
    return result;
  };
}

let dir: string;
let docxPath: string;

beforeEach(() => {
  dir = makeTempDir("pdf-");
  docxPath = path.join(dir, "Ana_Kovacs.docx");
  writeFileSync(docxPath, "docx");
});

afterEach(() => {
  removeDir(dir);
});

describe("pdfPathFor", () => {
  it("swaps the extension for .pdf", () => {
    expect(pdfPathFor(path.join("out", "Ana_Kovacs.docx"))).toBe(path.join("out", "Ana_Kovacs.pdf"));
  });
});

describe("SofficePdfExporter", () => {
  it("converts headlessly into the DOCX's own directory", async () => {
    const calls: Call[] = [];
    const exporter = new SofficePdfExporter(
      "/opt/libreoffice/soffice",
      fakeRunner({ status: 0, stdout: "convert ok", stderr: "" }, true, calls),
    );

    const pdf = await exporter.exportPdf(docxPath);

    expect(pdf).toBe(path.join(dir, "Ana_Kovacs.pdf"));
    expect(calls).toEqual([
      {
        command: "/opt/libreoffice/soffice",
        args: ["--headless", "--convert-to", "pdf", "--outdir", dir, docxPath],
      },
    ]);
  });

  it("reports a missing LibreOffice binary", async () => {
    const calls: Call[] = [];
    const exporter = new SofficePdfExporter(
      "soffice",
      fakeRunner({ status: null, stdout: "", stderr: "", error: new Error("spawnSync soffice ENOENT") }, false, calls),
    );
    await expect(exporter.exportPdf(docxPath)).rejects.toThrow(
      'Cannot run "soffice" (is LibreOffice installed?): spawnSync soffice ENOENT',
    );
  });

  it("reports a non-zero exit with the converter's output", async () => {
    const calls: Call[] = [];
    const exporter = new SofficePdfExporter(
      "soffice",
      fakeRunner({ status: 1, stdout: "", stderr: "  source file could not be loaded\n" }, false, calls),
    );
    await expect(exporter.exportPdf(docxPath)).rejects.toThrow(
      "PDF conversion exited with status 1: source file could not be loaded",
    );
  });

  it("fails when the converter exits cleanly without writing a PDF", async () => {
    const calls: Call[] = [];
    const exporter = new SofficePdfExporter("soffice", fakeRunner({ status: 0, stdout: "", stderr: "" }, false, calls));

    const error = await exporter.exportPdf(docxPath).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ExportError);
    expect(error).toMatchObject({
      code: "EXPORT_ERROR",
      path: docxPath,
      message: `PDF conversion produced no file at ${path.join(dir, "Ana_Kovacs.pdf")}`,
    });
  });
});
