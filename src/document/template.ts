/**
 * DOCX Template — the loaded template and per-record filled copies.
 *
 * The template bytes are read once. Every fill opens a fresh zip from
 * those bytes, so filling one record can never leak into the next.
 */

import { readFileSync } from "fs";
import PizZip from "pizzip";

import { LoadError, errorMessage } from "../shared/errors.js";
import type { FieldRecord, SubstitutionMode } from "../shared/types.js";
import { scanPlaceholders, splitPlaceholders, substituteDocumentXml } from "./substitute.js";
import { paragraphTexts } from "./word_xml.js";

export const DOCUMENT_PART = "word/document.xml";

function readDocumentPart(zip: PizZip, source: string): string {
  const part = zip.file(DOCUMENT_PART);
  if (!part) {
    throw new LoadError(`Not a Word document (missing ${DOCUMENT_PART}): ${source}`, source);
  }
  return part.asText();
}

export class DocxTemplate {
  private readonly bytes: Buffer;
  private readonly documentXml: string;

  constructor(bytes: Buffer, readonly source: string = "<buffer>") {
    let zip: PizZip;
    try {
      zip = new PizZip(bytes);
    } catch (err) {
      throw new LoadError(`Template is not a valid DOCX archive: ${source} (${errorMessage(err)})`, source, {
        cause: err,
      });
    }
    this.bytes = Buffer.from(bytes);
    this.documentXml = readDocumentPart(zip, source);
  }

  /** Produce the filled DOCX for one record. */
  fill(record: FieldRecord, mode: SubstitutionMode = "run"): Buffer {
    const zip = new PizZip(this.bytes);
    zip.file(DOCUMENT_PART, substituteDocumentXml(this.documentXml, record, mode));
    const buf = zip.generate({ type: "nodebuffer", compression: "DEFLATE" });
    return Buffer.from(buf);
  }

  /** Placeholder keys the template exposes under the given mode. */
  placeholders(mode: SubstitutionMode = "run"): string[] {
    return scanPlaceholders(this.documentXml, mode);
  }

  /**
   * Placeholders with an occurrence split across formatting runs, which
   * "run" mode leaves unfilled.
   */
  splitPlaceholders(): string[] {
    return splitPlaceholders(this.documentXml);
  }

  /** Visible text of each body paragraph, table cells included. */
  paragraphs(): string[] {
    return paragraphTexts(this.documentXml);
  }
}

/**
 * Load a DOCX template from disk.
 * Throws LoadError when the file is missing, unreadable or not a DOCX.
 */
export function loadTemplate(filePath: string): DocxTemplate {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (err) {
    throw new LoadError(`Cannot read template ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
  return new DocxTemplate(bytes, filePath);
}

/** Paragraph texts of a filled DOCX. */
export function readDocxParagraphs(docx: Buffer): string[] {
  return paragraphTexts(readDocumentPart(new PizZip(docx), "<buffer>"));
}
