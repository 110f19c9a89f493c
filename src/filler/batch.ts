/**
 * Document Filler — the per-record batch loop.
 *
 * Each record moves through
 *   loaded → filled → exported → stamped → done
 * (export and stamping only when configured). A failure stops that record
 * at its current stage and is recorded; the loop continues with the next
 * record.
 */

import { mkdirSync, rmSync, writeFileSync } from "fs";
import path from "path";

import type { DocxTemplate } from "../document/template.js";
import type { LogoStamper } from "../exports/logo_stamp.js";
import type { PdfExporter } from "../exports/pdf_export.js";
import {
  ExportError,
  FillerError,
  LogoError,
  OutputWriteError,
  errorMessage,
} from "../shared/errors.js";
import type {
  BatchSummary,
  CollisionPolicy,
  FailureStage,
  FieldRecord,
  RecordOutcome,
  SubstitutionMode,
} from "../shared/types.js";
import { DEFAULT_NAME_FIELDS, OutputNamer, buildOutputName } from "./output_naming.js";

export interface FillBatchOptions {
  template: DocxTemplate;
  records: FieldRecord[];
  outDir: string;
  mode?: SubstitutionMode;
  nameFields?: string[];
  onCollision?: CollisionPolicy;
  /** PDF export; omitted or null to write DOCX only. */
  exporter?: PdfExporter | null;
  /** Logo stamping; applied only when `logoPath` is set and PDFs are exported. */
  stamper?: LogoStamper | null;
  logoPath?: string | null;
  /** Keep the unstamped PDF next to the stamped one. */
  keepUnstampedPdf?: boolean;
  /** Called after each record completes or fails. */
  onRecord?: (outcome: RecordOutcome) => void;
}

/** Wraps a foreign error in the taxonomy error for the stage it came from. */
function asStageError(stage: FailureStage, err: unknown, filePath?: string): FillerError {
  if (err instanceof FillerError) return err;
  const message = errorMessage(err);
  switch (stage) {
    case "fill":
    case "write":
      return new OutputWriteError(message, filePath, { cause: err });
    case "export":
      return new ExportError(message, filePath, { cause: err });
    case "stamp":
      return new LogoError(message, filePath, { cause: err });
  }
}

/**
 * Create the output directory (with parents).
 * Failure here is fatal for the whole batch.
 */
export function ensureOutputDir(outDir: string): void {
  try {
    mkdirSync(outDir, { recursive: true });
  } catch (err) {
    throw new OutputWriteError(`Cannot create output directory ${outDir}: ${errorMessage(err)}`, outDir, {
      cause: err,
    });
  }
}

export async function fillBatch(options: FillBatchOptions): Promise<BatchSummary> {
  const {
    template,
    records,
    outDir,
    mode = "run",
    nameFields = DEFAULT_NAME_FIELDS,
    onCollision = "suffix",
    exporter = null,
    stamper = null,
    logoPath = null,
    keepUnstampedPdf = false,
    onRecord,
  } = options;

  const warnings: string[] = [];
  if (logoPath && !exporter) {
    warnings.push("Logo ignored: PDF export is disabled");
  }
  if (logoPath && exporter && !stamper) {
    warnings.push("Logo ignored: no logo stamper configured");
  }

  ensureOutputDir(outDir);
  const namer = new OutputNamer(onCollision);
  const outcomes: RecordOutcome[] = [];

  for (const [index, record] of records.entries()) {
    const outcome: RecordOutcome = {
      index,
      name: buildOutputName(record, index, nameFields),
      stage: "loaded",
      status: "failed",
      outputs: {},
    };
    let stage: FailureStage = "write";
    let target: string | undefined;

    try {
      outcome.name = namer.claim(outcome.name);

      stage = "fill";
      const docx = template.fill(record, mode);

      stage = "write";
      target = path.join(outDir, `${outcome.name}.docx`);
      writeFileSync(target, docx);
      outcome.outputs.docx = target;
      outcome.stage = "filled";

      if (exporter) {
        stage = "export";
        const pdfPath = await exporter.exportPdf(target);
        target = pdfPath;
        outcome.outputs.pdf = pdfPath;
        outcome.stage = "exported";

        if (logoPath && stamper) {
          stage = "stamp";
          const stampedPath = await stamper.stamp(pdfPath, logoPath);
          outcome.outputs.pdf = stampedPath;
          outcome.stage = "stamped";
          if (!keepUnstampedPdf && stampedPath !== pdfPath) {
            rmSync(pdfPath, { force: true });
          }
        }
      }

      outcome.stage = "done";
      outcome.status = "done";
    } catch (err) {
      const failure = asStageError(stage, err, target);
      outcome.failure = { stage, code: failure.code, message: failure.message };
    }

    outcomes.push(outcome);
    onRecord?.(outcome);
  }

  const succeeded = outcomes.filter((o) => o.status === "done").length;
  return {
    outDir,
    outcomes,
    succeeded,
    failed: outcomes.length - succeeded,
    warnings,
  };
}
