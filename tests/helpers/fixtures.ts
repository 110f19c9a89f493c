/**
 * Test fixtures: DOCX templates built in-process with the `docx` library,
 * plus temporary directories.
 *
 * Every string in a paragraph entry becomes its own formatting run, so
 * ["{na", "me}"] yields a placeholder split across two runs.
 */

import {
  Document,
  Packer,
  Paragraph,
  TextRun,
  Table,
  TableRow,
  TableCell,
} from "docx";
import { mkdtempSync, rmSync } from "fs";
import os from "os";
import path from "path";

export type ParagraphSpec = string | string[];

function paragraph(spec: ParagraphSpec): Paragraph {
  const runs = typeof spec === "string" ? [spec] : spec;
  return new Paragraph({
    children: runs.map((text, i) => new TextRun({ text, bold: i % 2 === 1 })),
  });
}

export interface TemplateSpec {
  paragraphs: ParagraphSpec[];
  /** Table rows; each cell holds one paragraph. */
  table?: ParagraphSpec[][];
}

export async function buildDocx(spec: TemplateSpec): Promise<Buffer> {
  const children: (Paragraph | Table)[] = spec.paragraphs.map(paragraph);
  if (spec.table) {
    children.push(
      new Table({
        rows: spec.table.map(
          (cells) =>
            new TableRow({
              children: cells.map((cell) => new TableCell({ children: [paragraph(cell)] })),
            }),
        ),
      }),
    );
  }
  const doc = new Document({ sections: [{ children }] });
  return Packer.toBuffer(doc);
}

export function makeTempDir(prefix = "filler-"): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** A valid 1×1 PNG. */
export const TINY_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
  "base64",
);
