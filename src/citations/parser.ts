/**
 * Reference-list parsing.
 *
 * Strategy cascade, first one with at least two matches wins:
 * 1. "[N]" markers at line start
 * 2. "N. " markers at line start
 * 3. every distinct DOI in the text
 */

import { createCitationRef, type CitationRef } from "../types.js";

const BRACKET_MARKER = /^\s*\[(\d+)\]/gm;
const DOT_MARKER = /^\s*(\d+)\.\s/gm;
const BRACKET_INDEX = /^\[(\d+)\]/;
const DOT_INDEX = /^(\d+)\./;

const DOI_SOURCE = String.raw`(?:doi:|https?://doi\.org/)?(10\.\d{4,}/[^\s\])>"',]+)`;
const DOI_PATTERN = new RegExp(DOI_SOURCE, "i");
const DOI_PATTERN_GLOBAL = new RegExp(DOI_SOURCE, "gi");
const YEAR_PATTERN = /\b(?:19\d{2}|20[0-2]\d)\b/;

const DOI_RESOLVER = "https://doi.org/";

/** Minimum marker count for a numbering style to be trusted. */
const MIN_MARKERS = 2;

/** Strip trailing punctuation that belongs to the sentence, not the DOI. */
function trimDoi(doi: string): string {
  return doi.replace(/[.,;)]+$/, "");
}

/**
 * Return the first DOI in the text, without any "doi:" or resolver prefix
 * and without trailing punctuation; "" when there is none.
 */
export function extractDoiFromText(text: string): string {
  const match = DOI_PATTERN.exec(text);
  return match?.[1] ? trimDoi(match[1]) : "";
}

/** Return the first plausible publication year (1900-2029), or "". */
export function extractYearFromText(text: string): string {
  return YEAR_PATTERN.exec(text)?.[0] ?? "";
}

/** Landing page URL for a DOI. */
export function doiUrl(doi: string): string {
  return `${DOI_RESOLVER}${doi}`;
}

function markerOffsets(section: string, pattern: RegExp): number[] {
  return Array.from(section.matchAll(pattern), (m) => m.index ?? 0);
}

function splitAtMarkers(
  section: string,
  offsets: number[],
  indexPattern: RegExp,
  max: number
): CitationRef[] {
  const refs: CitationRef[] = [];
  for (let i = 0; i < offsets.length && refs.length < max; i++) {
    const start = offsets[i] ?? 0;
    const end = offsets[i + 1] ?? section.length;
    const block = section.slice(start, end).trim();

    const ref = createCitationRef({ rawText: block });
    const indexText = indexPattern.exec(block)?.[1];
    if (indexText) ref.index = Number.parseInt(indexText, 10);

    ref.doi = extractDoiFromText(block);
    ref.year = extractYearFromText(block);
    if (ref.doi) ref.pageUrl = doiUrl(ref.doi);
    refs.push(ref);
  }
  return refs;
}

function extractDoiRefs(section: string, max: number): CitationRef[] {
  const seen = new Set<string>();
  const refs: CitationRef[] = [];
  for (const m of section.matchAll(DOI_PATTERN_GLOBAL)) {
    if (refs.length >= max) break;
    const doi = trimDoi(m[1] ?? "");
    if (!doi || seen.has(doi)) continue;
    seen.add(doi);
    refs.push(createCitationRef({ doi, rawText: doi, pageUrl: doiUrl(doi) }));
  }
  return refs;
}

/**
 * Split a references section into citation records, in document order,
 * keeping at most `maxCitations` (the earliest ones).
 */
export function parseCitationRefs(section: string, maxCitations: number): CitationRef[] {
  if (!section || maxCitations <= 0) return [];

  const bracketOffsets = markerOffsets(section, BRACKET_MARKER);
  if (bracketOffsets.length >= MIN_MARKERS) {
    return splitAtMarkers(section, bracketOffsets, BRACKET_INDEX, maxCitations);
  }

  const dotOffsets = markerOffsets(section, DOT_MARKER);
  if (dotOffsets.length >= MIN_MARKERS) {
    return splitAtMarkers(section, dotOffsets, DOT_INDEX, maxCitations);
  }

  return extractDoiRefs(section, maxCitations);
}
