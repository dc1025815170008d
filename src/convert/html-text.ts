/**
 * Readable body text from an HTML page, used when a paper has no PDF.
 */

import { parse as parseHtml } from "node-html-parser";

/** Elements whose content is never readable text. */
const NON_CONTENT_SELECTOR = "script, style, noscript, template, svg, head";

/** Extract readable text from HTML: tags stripped, blocks on their own lines. */
export function extractHtmlText(html: string): string {
  const root = parseHtml(html);
  for (const el of root.querySelectorAll(NON_CONTENT_SELECTOR)) {
    el.remove();
  }
  const body = root.querySelector("body") ?? root;
  return body.structuredText
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
