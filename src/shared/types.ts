/**
 * Shared types for the record-driven DOCX filler.
 */

import type { FillerErrorCode } from "./errors.js";

// ── Records ─────────────────────────────────────────────────────────

/** One flat client record: field name → text value. */
export type FieldRecord = Readonly<Record<string, string>>;

export type DataFormat = "xlsx" | "csv" | "json" | "jsonl";

export interface RejectedRow {
  /** 1-based position of the row among the data rows of the source. */
  row: number;
  values: FieldRecord;
  reasons: string[];
}

export interface RecordSet {
  format: DataFormat;
  /** Field names in source order; every record carries exactly these keys. */
  fields: string[];
  records: FieldRecord[];
  rejected: RejectedRow[];
  warnings: string[];
}

// ── Substitution ────────────────────────────────────────────────────

/**
 * "run":       placeholders must sit inside a single formatting run.
 * "paragraph": runs of a paragraph are coalesced before substitution.
 */
export type SubstitutionMode = "run" | "paragraph";

export type CollisionPolicy = "suffix" | "overwrite" | "fail";

// ── Per-record outcome ──────────────────────────────────────────────

export type RecordStage = "loaded" | "filled" | "exported" | "stamped" | "done";

export type FailureStage = "fill" | "write" | "export" | "stamp";

export interface RecordFailure {
  stage: FailureStage;
  code: FillerErrorCode;
  message: string;
}

export interface RecordOutputs {
  docx?: string;
  pdf?: string;
}

export interface RecordOutcome {
  /** 0-based index in the loaded record list. */
  index: number;
  /** Derived output base name (without extension). */
  name: string;
  /** Last stage the record reached. */
  stage: RecordStage;
  status: "done" | "failed";
  outputs: RecordOutputs;
  failure?: RecordFailure;
}

export interface BatchSummary {
  outDir: string;
  outcomes: RecordOutcome[];
  succeeded: number;
  failed: number;
  warnings: string[];
}
