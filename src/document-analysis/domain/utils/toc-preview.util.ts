const TOC_HEADING_RE =
  /^(table of contents|contents|оглавление|содержание)(?=$|[\s:.])/iu;
const DOTTED_ENTRY_RE = /^(\S.{2,}?)\s*(?:\.{2,}|…+|·{2,})\s*\d{1,4}$/u;
const NUMBERED_HEADING_RE = /^\d{1,2}(?:\.\d{1,2}){0,3}\.?\s+\p{Lu}.{2,80}$/u;
const CHAPTER_RE =
  /^(chapter|part|section|appendix|глава|часть|раздел|приложение)\s+[\p{L}\p{N}]+/iu;

const isTocLine = (line: string): boolean =>
  TOC_HEADING_RE.test(line) ||
  DOTTED_ENTRY_RE.test(line) ||
  NUMBERED_HEADING_RE.test(line) ||
  CHAPTER_RE.test(line);

/**
 * Collect outline-like lines (contents headings, dotted entries, numbered
 * headings, chapter titles) from the leading pages of a document.
 *
 * @returns newline-joined preview truncated to maxChars, or null
 */
export function buildTocPreview(
  pageTexts: string[],
  maxChars: number,
): string | null {
  const seen = new Set<string>();
  const lines: string[] = [];

  for (const pageText of pageTexts) {
    for (const rawLine of pageText.split(/\r?\n/)) {
      const line = rawLine.replace(/\s+/g, ' ').trim();
      if (line.length < 3 || seen.has(line) || !isTocLine(line)) {
        continue;
      }
      seen.add(line);
      lines.push(line);
    }
  }

  if (lines.length === 0) {
    return null;
  }

  const preview = lines.join('\n');
  return preview.length > maxChars ? preview.slice(0, maxChars) : preview;
}
