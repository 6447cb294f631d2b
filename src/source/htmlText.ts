/**
 * Minimal HTML → text conversion for the rendered positions page. Layout
 * markup becomes line breaks so each card field lands on its own line.
 */

const DROPPED_ELEMENTS = /<(script|style|noscript|svg|template|head)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const COMMENTS = /<!--[\s\S]*?-->/g;
const BLOCK_TAGS =
  /<\/?(?:br|p|div|li|ul|ol|tr|table|thead|tbody|section|article|header|footer|main|aside|nav|h[1-6]|dt|dd|dl|hr)\b[^>]*>/gi;
const CELL_TAGS = /<\/?(?:td|th)\b[^>]*>/gi;
const ANY_TAG = /<[^>]+>/g;

const NAMED_ENTITIES = new Map<string, string>([
  ["amp", "&"],
  ["lt", "<"],
  ["gt", ">"],
  ["quot", '"'],
  ["apos", "'"],
  ["nbsp", " "],
  ["ndash", "–"],
  ["mdash", "—"],
  ["minus", "−"],
]);

const MAX_CODE_POINT = 0x10ffff;

/** Unknown names and out-of-range code points are left as written. */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === "#") {
      const code =
        body[1] === "x" || body[1] === "X" ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES.get(body.toLowerCase()) ?? match;
  });
}

function looksLikeHtml(text: string): boolean {
  return /<\/?[a-z][\s\S]*?>/i.test(text);
}

/** Visible text, one trimmed non-empty line per block, inner whitespace collapsed. */
export function htmlToText(source: string): string {
  const withBreaks = looksLikeHtml(source)
    ? source
        .replace(COMMENTS, "")
        .replace(DROPPED_ELEMENTS, "")
        .replace(BLOCK_TAGS, "\n")
        .replace(CELL_TAGS, " ")
        .replace(ANY_TAG, " ")
    : source;

  return decodeEntities(withBreaks)
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

export interface SectionOptions {
  /** Heading that opens the section, matched case-insensitively. */
  marker: string;
  /** Headings that close it; the first one found after the marker wins. */
  endMarkers: string[];
}

/**
 * Lines between the section heading and the next end heading. An absent
 * heading yields "" so the caller sees a degraded, empty section.
 */
export function extractSection(text: string, opts: SectionOptions): string {
  const lines = text.split("\n");
  const marker = opts.marker.toUpperCase();
  const start = lines.findIndex((line) => line.toUpperCase().includes(marker));
  if (start === -1) return "";

  const ends = opts.endMarkers.map((m) => m.toUpperCase());
  const body: string[] = [];
  // Text sharing the heading line ("ACTIVE POSITIONS Total: …") belongs to the section.
  const tail = lines[start].slice(lines[start].toUpperCase().indexOf(marker) + marker.length).trim();
  if (tail) body.push(tail);

  for (const line of lines.slice(start + 1)) {
    const upper = line.toUpperCase();
    if (ends.some((end) => upper.includes(end))) break;
    body.push(line);
  }
  return body.join("\n").trim();
}
