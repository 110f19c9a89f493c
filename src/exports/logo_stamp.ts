/**
 * Logo stamping — overlays an image on the first page of a PDF.
 */

import { readFileSync, writeFileSync } from "fs";
import path from "path";
import { PDFDocument } from "pdf-lib";
import type { PDFImage } from "pdf-lib";

import { LogoError, errorMessage } from "../shared/errors.js";

export interface LogoStamper {
  /** Stamp the image and return the path of the stamped PDF. */
  stamp(pdfPath: string, imagePath: string): Promise<string>;
}

/** Anchor in PDF points, measured from the page's top-left corner. */
export interface LogoPlacement {
  left: number;
  top: number;
  width: number;
}

export const DEFAULT_LOGO_PLACEMENT: LogoPlacement = { left: 50, top: 50, width: 120 };

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

export type ImageKind = "png" | "jpeg";

export function detectImageKind(bytes: Uint8Array): ImageKind | null {
  const startsWith = (sig: number[]) => sig.every((b, i) => bytes[i] === b);
  if (startsWith(PNG_SIGNATURE)) return "png";
  if (startsWith(JPEG_SIGNATURE)) return "jpeg";
  return null;
}

/** `contract.pdf` → `contract_with_logo.pdf` */
export function stampedPathFor(pdfPath: string): string {
  const parsed = path.parse(pdfPath);
  return path.join(parsed.dir, `${parsed.name}_with_logo${parsed.ext || ".pdf"}`);
}

export class PdfLibLogoStamper implements LogoStamper {
  constructor(private readonly placement: LogoPlacement = DEFAULT_LOGO_PLACEMENT) {}

  async stamp(pdfPath: string, imagePath: string): Promise<string> {
    let imageBytes: Buffer;
    try {
      imageBytes = readFileSync(imagePath);
    } catch (err) {
      throw new LogoError(`Cannot read logo ${imagePath}: ${errorMessage(err)}`, imagePath, { cause: err });
    }
    const kind = detectImageKind(imageBytes);
    if (!kind) {
      throw new LogoError(`Unsupported logo format (PNG or JPEG expected): ${imagePath}`, imagePath);
    }

    let pdfDoc: PDFDocument;
    try {
      pdfDoc = await PDFDocument.load(readFileSync(pdfPath));
    } catch (err) {
      throw new LogoError(`Cannot open PDF ${pdfPath}: ${errorMessage(err)}`, pdfPath, { cause: err });
    }

    let image: PDFImage;
    try {
      image = kind === "png" ? await pdfDoc.embedPng(imageBytes) : await pdfDoc.embedJpg(imageBytes);
    } catch (err) {
      throw new LogoError(`Invalid ${kind.toUpperCase()} logo ${imagePath}: ${errorMessage(err)}`, imagePath, {
        cause: err,
      });
    }

    const [firstPage] = pdfDoc.getPages();
    if (!firstPage) {
      throw new LogoError(`PDF has no pages: ${pdfPath}`, pdfPath);
    }

    const { left, top, width } = this.placement;
    const height = (image.height / image.width) * width;
    firstPage.drawImage(image, {
      x: left,
      y: firstPage.getHeight() - top - height,
      width,
      height,
    });

    const outPath = stampedPathFor(pdfPath);
    try {
      writeFileSync(outPath, await pdfDoc.save());
    } catch (err) {
      throw new LogoError(`Cannot write stamped PDF ${outPath}: ${errorMessage(err)}`, outPath, { cause: err });
    }
    return outPath;
  }
}
