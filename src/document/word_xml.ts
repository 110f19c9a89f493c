/**
 * WordprocessingML helpers.
 *
 * A DOCX body is a sequence of paragraphs (<w:p>), each made of runs
 * (<w:r>) that carry their own formatting and hold the visible text in
 * <w:t> elements. Table cells (<w:tc>) contain ordinary paragraphs.
 *
 *   <w:p>
 *     <w:r><w:rPr><w:b/></w:rPr><w:t>Client: </w:t></w:r>
 *     <w:r><w:t>{name}</w:t></w:r>
 *   </w:p>
 */

// Opening tags must not match self-closing elements (<w:p/>, <w:r/>) nor
// longer names sharing the prefix (<w:rPr>, <w:pPr>, <w:tbl>, <w:tab/>).
const PARAGRAPH_RE = /<w:p(?:\s[^>]*?)?(?<!\/)>[\s\S]*?<\/w:p>/g;
const RUN_RE = /<w:r(?:\s[^>]*?)?(?<!\/)>[\s\S]*?<\/w:r>/g;
const TEXT_RE = /<w:t((?:\s[^>]*?)?)(?<!\/)>([^<]*)<\/w:t>/g;
const TEXT_BOX = "<w:txbxContent";

// Characters XML 1.0 does not allow, lone surrogates included.
const INVALID_XML_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;
const BREAK_OR_TAB = /(\r\n|\r|\n|\t)/;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

export function decodeXmlText(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (entity, body: string) => {
    if (body.startsWith("#x")) return String.fromCodePoint(parseInt(body.slice(2), 16));
    if (body.startsWith("#")) return String.fromCodePoint(parseInt(body.slice(1), 10));
    return NAMED_ENTITIES[body] ?? entity;
  });
}

export function escapeXmlText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function stripInvalidXmlChars(text: string): string {
  return text.replace(INVALID_XML_CHARS, "");
}

/**
 * Run content for a text: line breaks become <w:br/>, tabs <w:tab/>, and
 * the pieces between them <w:t> elements carrying `attrs`.
 */
export function runTextXml(text: string, attrs: string): string {
  const pieces = stripInvalidXmlChars(text).split(BREAK_OR_TAB);
  const xml = pieces.map((piece, i) => {
    if (i % 2 === 1) return piece === "\t" ? "<w:tab/>" : "<w:br/>";
    return piece || pieces.length === 1 ? `<w:t${attrs}>${escapeXmlText(piece)}</w:t>` : "";
  });
  return xml.join("");
}

/** Decoded text of every <w:t> element in a fragment, in document order. */
export function textNodes(fragment: string): string[] {
  const texts: string[] = [];
  for (const m of fragment.matchAll(TEXT_RE)) {
    texts.push(decodeXmlText(m[2] ?? ""));
  }
  return texts;
}

/** Visible text of each paragraph of a part, runs concatenated. */
export function paragraphTexts(xml: string): string[] {
  return [...xml.matchAll(PARAGRAPH_RE)].map((m) => textNodes(m[0]).join(""));
}

/**
 * Paragraphs whose runs can be coalesced. A paragraph anchoring a text box
 * is left out: the lazy match ends inside the box.
 */
export function mergeableParagraphs(xml: string): string[] {
  return [...xml.matchAll(PARAGRAPH_RE)].map((m) => m[0]).filter((p) => !p.includes(TEXT_BOX));
}

/** Visible text of each run of a part. */
export function runTexts(xml: string): string[] {
  return [...xml.matchAll(RUN_RE)].map((m) => textNodes(m[0]).join(""));
}

/**
 * Rewrite the text held by a fragment's <w:t> elements.
 *
 * The texts are joined and passed to `transform`. When the result differs,
 * it is written into the first <w:t> (so it takes that run's formatting)
 * and the remaining <w:t> elements of the fragment are emptied. An
 * unchanged fragment is returned as is.
 */
export function rewriteText(fragment: string, transform: (text: string) => string): string {
  const matches = [...fragment.matchAll(TEXT_RE)];
  if (matches.length === 0) return fragment;

  const original = matches.map((m) => decodeXmlText(m[2] ?? "")).join("");
  const updated = transform(original);
  if (updated === original) return fragment;

  let first = true;
  return fragment.replace(TEXT_RE, (_whole, attrs: string) => {
    if (!first) return `<w:t${attrs}></w:t>`;
    first = false;
    const preserved = attrs.includes("xml:space") ? attrs : `${attrs} xml:space="preserve"`;
    return runTextXml(updated, preserved);
  });
}

/** Apply `rewriteText` to every run of a part independently. */
export function rewriteRuns(xml: string, transform: (text: string) => string): string {
  return xml.replace(RUN_RE, (run) => rewriteText(run, transform));
}

/**
 * Apply `rewriteText` to every paragraph of a part, runs coalesced.
 * Text-box paragraphs and whatever lies between matched paragraphs are
 * rewritten run by run.
 */
export function rewriteParagraphs(xml: string, transform: (text: string) => string): string {
  let out = "";
  let last = 0;
  for (const m of xml.matchAll(PARAGRAPH_RE)) {
    const start = m.index ?? 0;
    const paragraph = m[0];
    out += rewriteRuns(xml.slice(last, start), transform);
    out += paragraph.includes(TEXT_BOX) ? rewriteRuns(paragraph, transform) : rewriteText(paragraph, transform);
    last = start + paragraph.length;
  }
  return out + rewriteRuns(xml.slice(last), transform);
}
