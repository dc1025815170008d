/**
 * Plain-text rendering of papers and citations for tool output.
 */

import type { CitationRef, PaperResult } from "../types.js";

const ABSTRACT_DISPLAY_LIMIT = 500;
const RAW_TEXT_DISPLAY_LIMIT = 200;

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/** Render a search result as labelled lines; empty fields are skipped. */
export function formatPaper(paper: PaperResult): string {
  const lines: string[] = [`Title: ${paper.title}`];
  if (paper.authors.length > 0) lines.push(`Authors: ${paper.authors.join(", ")}`);
  if (paper.year) lines.push(`Year: ${paper.year}`);
  if (paper.doi) lines.push(`DOI: ${paper.doi}`);
  if (paper.url) lines.push(`URL: ${paper.url}`);
  if (paper.pdfUrl) lines.push(`PDF: ${paper.pdfUrl}`);
  if (paper.abstract) {
    lines.push(`Abstract: ${truncate(paper.abstract, ABSTRACT_DISPLAY_LIMIT)}`);
  }
  lines.push(`Source: ${paper.source}`);
  return `${lines.join("\n")}\n`;
}

/** Render a citation record; the "[N] " prefix appears only for numbered entries. */
export function formatCitation(ref: CitationRef): string {
  const prefix = ref.index > 0 ? `[${ref.index}] ` : "";
  const lines: string[] = [];
  if (ref.title) lines.push(`Title: ${ref.title}`);
  if (ref.authors) lines.push(`Authors: ${ref.authors}`);
  if (ref.year) lines.push(`Year: ${ref.year}`);
  if (ref.doi) lines.push(`DOI: ${ref.doi}`);
  if (ref.pageUrl) lines.push(`URL: ${ref.pageUrl}`);
  if (ref.pdfUrl) lines.push(`PDF: ${ref.pdfUrl}`);
  lines.push(`Open Access: ${ref.isOA}`);
  if (ref.rawText) lines.push(`Raw: ${truncate(ref.rawText, RAW_TEXT_DISPLAY_LIMIT)}`);
  return `${prefix}${lines.join("\n")}\n`;
}
