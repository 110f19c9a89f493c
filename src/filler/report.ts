/**
 * Batch report — per-record lines, summary block and exit-code policy.
 */

import type { BatchSummary, RecordOutcome } from "../shared/types.js";

export function formatOutcome(outcome: RecordOutcome): string {
  const label = `#${outcome.index + 1} ${outcome.name}`;
  if (outcome.status === "done") {
    const file = outcome.outputs.pdf ?? outcome.outputs.docx ?? "";
    return `  ✓ ${label} → ${file}`;
  }
  const failure = outcome.failure;
  const reason = failure ? `${failure.code} at ${failure.stage}: ${failure.message}` : "unknown failure";
  return `  ✗ ${label} (${reason})`;
}

export function formatSummary(summary: BatchSummary): string[] {
  const total = summary.outcomes.length;
  const lines = [
    `  Records:   ${total}`,
    `  Succeeded: ${summary.succeeded}`,
    `  Failed:    ${summary.failed}`,
    `  Output:    ${summary.outDir}`,
  ];
  const failures = summary.outcomes.filter((o) => o.status === "failed");
  if (failures.length > 0) {
    lines.push("", "  Failures:");
    for (const o of failures) lines.push(`  ${formatOutcome(o)}`);
  }
  return lines;
}

/**
 * 0 when everything succeeded, or when some records failed but at least
 * one succeeded and `strict` is off. 1 when nothing succeeded, or on any
 * failure in strict mode. An empty batch exits 0.
 */
export function exitCodeFor(summary: BatchSummary, strict = false): number {
  if (summary.failed === 0) return 0;
  if (strict) return 1;
  return summary.succeeded > 0 ? 0 : 1;
}
