/**
 * Fixed-layout export — DOCX → PDF through LibreOffice.
 *
 * The conversion itself belongs to LibreOffice; this module only builds
 * the command line, runs it to completion and checks that the PDF exists.
 */

import { spawnSync } from "child_process";
import { existsSync } from "fs";
import path from "path";

import { ExportError } from "../shared/errors.js";

export interface PdfExporter {
  /** Convert a DOCX and return the path of the sibling .pdf. */
  exportPdf(docxPath: string): Promise<string>;
}

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

/** Runs a command synchronously. Replaced by a fake in tests. */
export type CommandRunner = (command: string, args: string[]) => CommandResult;

export const runCommand: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: "utf-8" });
  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    error: result.error,
  };
};

/** Sibling path with the .pdf extension. */
export function pdfPathFor(docxPath: string): string {
  const parsed = path.parse(docxPath);
  return path.join(parsed.dir, `${parsed.name}.pdf`);
}

export class SofficePdfExporter implements PdfExporter {
  constructor(
    private readonly binary: string = "soffice",
    private readonly run: CommandRunner = runCommand,
  ) {}

  async exportPdf(docxPath: string): Promise<string> {
    const outDir = path.dirname(path.resolve(docxPath));
    const result = this.run(this.binary, [
      "--headless",
      "--convert-to",
      "pdf",
      "--outdir",
      outDir,
      docxPath,
    ]);

    if (result.error) {
      throw new ExportError(
        `Cannot run "${this.binary}" (is LibreOffice installed?): ${result.error.message}`,
        docxPath,
        { cause: result.error },
      );
    }
    if (result.status !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim() || "no output";
      throw new ExportError(`PDF conversion exited with status ${result.status}: ${detail}`, docxPath);
    }

    const pdfPath = pdfPathFor(docxPath);
    if (!existsSync(pdfPath)) {
      throw new ExportError(`PDF conversion produced no file at ${pdfPath}`, docxPath);
    }
    return pdfPath;
  }
}
