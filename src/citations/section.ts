/**
 * Reference section lookup.
 */

/** Section headers in priority order; matched case-sensitively. */
export const CITATION_SECTION_HEADERS: readonly string[] = [
  "References",
  "REFERENCES",
  "Bibliography",
  "BIBLIOGRAPHY",
  "Works Cited",
  "WORKS CITED",
  "Literature Cited",
  "LITERATURE CITED",
];

/**
 * Return the text from the first recognized section-header line onward,
 * or "" when the document has no such header line.
 *
 * A header counts only on its own line: preceded by a newline and followed
 * by a newline, CRLF, or colon. The first header in list order wins even if
 * a later one appears earlier in the text.
 */
export function extractCitationSection(text: string): string {
  for (const header of CITATION_SECTION_HEADERS) {
    for (const sep of [`\n${header}\n`, `\n${header}\r\n`, `\n${header}:`]) {
      const idx = text.indexOf(sep);
      if (idx >= 0) return text.slice(idx + 1);
    }
  }
  return "";
}
