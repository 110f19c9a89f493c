#!/usr/bin/env node
/**
 * CLI: contract-fill
 *
 * Usage: npm run fill -- --template <docx> --data <file> --out <dir> [--logo <img>]
 *
 * Loads the template and the client records, writes one filled DOCX per
 * record to the output directory, converts each to PDF and stamps the
 * logo on its first page when one is given.
 */

import "dotenv/config";
import { realpathSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { fieldKey } from "../data/cell_values.js";
import { loadRecords } from "../data/record_loader.js";
import { loadTemplate } from "../document/template.js";
import { PdfLibLogoStamper } from "../exports/logo_stamp.js";
import { SofficePdfExporter } from "../exports/pdf_export.js";
import { ensureOutputDir, fillBatch } from "../filler/batch.js";
import { exitCodeFor, formatOutcome, formatSummary } from "../filler/report.js";
import { ConfigError, FillerError, errorMessage } from "../shared/errors.js";
import { USAGE, parseCliArgs, wantsHelp } from "../shared/run_config.js";
import type { FillerConfig } from "../shared/run_config.js";
import type { RecordSet } from "../shared/types.js";

export const REJECTED_ROWS_FILE = "_rejected_rows.json";

/** Warnings about template placeholders the data cannot fill. */
export function placeholderWarnings(
  templateKeys: string[],
  splitKeys: string[],
  fields: string[],
  mergeRuns: boolean,
): string[] {
  const known = new Set(fields);
  const warnings = templateKeys
    .filter((key) => !known.has(key))
    .map((key) => `Placeholder {${key}} has no matching data field; it will be left as-is`);
  if (!mergeRuns) {
    for (const key of splitKeys) {
      warnings.push(
        `Placeholder {${key}} is split across formatting runs and will not be filled; retype it in one go or use --merge-runs`,
      );
    }
  }
  return warnings;
}

function writeRejectedRows(outDir: string, recordSet: RecordSet): string | null {
  if (recordSet.rejected.length === 0) return null;
  ensureOutputDir(outDir);
  const sink = path.join(outDir, REJECTED_ROWS_FILE);
  writeFileSync(sink, JSON.stringify(recordSet.rejected, null, 2));
  return sink;
}

export async function run(config: FillerConfig): Promise<number> {
  const mode = config.mergeRuns ? "paragraph" : "run";

  const template = loadTemplate(config.template);
  const recordSet = loadRecords(config.data, {
    normalizeHeaders: !config.rawHeaders,
    requiredFields: config.requiredFields,
    dateFields: config.dateFields,
    csvDelimiter: config.delimiter,
  });

  console.log(`  Template:  ${config.template}`);
  console.log(`  Data:      ${config.data} (${recordSet.format}, ${recordSet.records.length} records)`);
  console.log(`  Output:    ${config.out}`);
  console.log(`  PDF:       ${config.pdf ? `yes (${config.soffice})` : "no"}`);
  console.log(`  Logo:      ${config.logo ?? "none"}`);
  console.log();

  const warnings = [
    ...recordSet.warnings,
    ...placeholderWarnings(
      template.placeholders(mode),
      template.splitPlaceholders(),
      recordSet.fields,
      config.mergeRuns,
    ),
  ];

  const sink = writeRejectedRows(config.out, recordSet);
  if (sink) {
    warnings.push(`${recordSet.rejected.length} rows rejected by required-field check; saved to ${sink}`);
  }
  if (recordSet.records.length === 0) {
    warnings.push("No records to process");
  }

  const summary = await fillBatch({
    template,
    records: recordSet.records,
    outDir: config.out,
    mode,
    nameFields: config.nameFields.map((f) => fieldKey(f, !config.rawHeaders)),
    onCollision: config.onCollision,
    exporter: config.pdf ? new SofficePdfExporter(config.soffice) : null,
    stamper: config.logo ? new PdfLibLogoStamper() : null,
    logoPath: config.logo ?? null,
    keepUnstampedPdf: config.keepPdf,
    onRecord: (outcome) => {
      const line = formatOutcome(outcome);
      if (outcome.status === "done") console.log(line);
      else console.error(line);
    },
  });

  warnings.push(...summary.warnings);
  if (warnings.length > 0) {
    console.log();
    console.log("  Warnings:");
    for (const w of warnings) console.warn(`    ⚠ ${w}`);
  }

  console.log();
  for (const line of formatSummary(summary)) console.log(line);
  return exitCodeFor(summary, config.strict);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (wantsHelp(argv)) {
    console.log(USAGE);
    return;
  }

  try {
    const config = parseCliArgs(argv, process.env);
    process.exitCode = await run(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exitCode = 2;
      return;
    }
    const label = err instanceof FillerError ? err.code : "ERROR";
    console.error(`\n  ✗ ${label}: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  realpathSync(process.argv[1]) ===
    realpathSync(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    console.error(`\n  ✗ ${errorMessage(err)}`);
    process.exitCode = 1;
  });
}
