/**
 * Placeholder Substitutor — replaces `{field}` tokens with record values.
 */

import type { FieldRecord, SubstitutionMode } from "../shared/types.js";
import { mergeableParagraphs, rewriteParagraphs, rewriteRuns, runTexts, textNodes } from "./word_xml.js";

const PLACEHOLDER_RE = /\{([^{}]+)\}/g;

/**
 * Replace every `{key}` whose key exists in the record.
 * Unknown keys stay literal; substituted values are not scanned again.
 */
export function substituteText(text: string, record: FieldRecord): string {
  return text.replace(PLACEHOLDER_RE, (token, key: string) =>
    Object.hasOwn(record, key) ? record[key] : token,
  );
}

/** Keys of all `{key}` tokens in a text, in order of appearance. */
export function placeholderKeys(text: string): string[] {
  return [...text.matchAll(PLACEHOLDER_RE)].map((m) => m[1] ?? "");
}

/**
 * Substitute placeholders in a WordprocessingML part (document.xml).
 *
 * In "run" mode a placeholder is only found when it sits inside a single
 * run; Word often splits edited text across runs, and such placeholders
 * are left untouched. "paragraph" mode joins the runs of each paragraph
 * first and writes the result back with the first run's formatting.
 */
export function substituteDocumentXml(
  xml: string,
  record: FieldRecord,
  mode: SubstitutionMode = "run",
): string {
  const transform = (text: string) => substituteText(text, record);
  return mode === "paragraph" ? rewriteParagraphs(xml, transform) : rewriteRuns(xml, transform);
}

/** Placeholder keys visible in a part under the given mode, deduplicated. */
export function scanPlaceholders(xml: string, mode: SubstitutionMode = "run"): string[] {
  const texts = runTexts(xml);
  if (mode === "paragraph") {
    texts.unshift(...mergeableParagraphs(xml).map((p) => textNodes(p).join("")));
  }
  const found = new Set<string>();
  for (const text of texts) {
    for (const key of placeholderKeys(text)) found.add(key);
  }
  return [...found];
}

function countKeys(texts: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const key of placeholderKeys(text)) counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Keys with at least one occurrence split across runs, checked paragraph
 * by paragraph: a paragraph that shows more `{key}` tokens once its runs
 * are joined than its runs hold whole has a split occurrence.
 */
export function splitPlaceholders(xml: string): string[] {
  const split = new Set<string>();
  for (const paragraph of mergeableParagraphs(xml)) {
    const whole = countKeys(runTexts(paragraph));
    for (const [key, count] of countKeys([textNodes(paragraph).join("")])) {
      if (count > (whole.get(key) ?? 0)) split.add(key);
    }
  }
  return [...split];
}
