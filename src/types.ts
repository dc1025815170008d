/**
 * Shared type definitions for paper search, fetching, and citation extraction.
 */

/**
 * Raw result of an HTTP document fetch.
 */
export interface FetchedDocument {
  /** Response body bytes */
  body: Uint8Array;
  /** URL after following redirects */
  finalUrl: string;
  /** Declared Content-Type header; empty when the server sent none */
  contentType: string;
}

/**
 * A paper discovered by one of the search sources.
 * Missing values are empty strings or empty arrays, never null.
 */
export interface PaperResult {
  /** Human-readable source label, e.g. "OpenAlex" */
  source: string;
  title: string;
  authors: string[];
  /** Publication year; empty when the source reports none */
  year: string;
  abstract: string;
  doi: string;
  /** Landing page URL */
  url: string;
  pdfUrl: string;
}

/**
 * A single entry parsed out of a paper's reference list.
 *
 * The parser fills `index`, `rawText`, and whatever DOI/year it can find;
 * the enricher later fills bibliographic metadata and OA availability in place.
 */
export interface CitationRef {
  /** Reference number from the source list; 0 when unnumbered */
  index: number;
  /** Citation text as it appeared in the document */
  rawText: string;
  doi: string;
  title: string;
  /** Author names joined with ", " */
  authors: string;
  year: string;
  /** Whether an open-access version is available */
  isOA: boolean;
  /** Open-access PDF (or best OA) URL */
  pdfUrl: string;
  /** Landing page URL */
  pageUrl: string;
}

/**
 * The best Open Access location reported for a DOI.
 */
export interface OALocation {
  /** URL to the fulltext */
  url: string;
  /** Type of content at the URL */
  urlType: "pdf" | "html";
  /** Version of the article */
  version: "published" | "accepted" | "submitted";
  /** License identifier (e.g., "cc-by") */
  license?: string;
}

/**
 * What fetch-paper does when a DOI has no open-access version.
 */
export type DoiNotOpenAccessPolicy = "fallback_to_landing_page" | "fail";

/** Create an empty citation record. */
export function createCitationRef(fields: Partial<CitationRef> = {}): CitationRef {
  return {
    index: 0,
    rawText: "",
    doi: "",
    title: "",
    authors: "",
    year: "",
    isOA: false,
    pdfUrl: "",
    pageUrl: "",
    ...fields,
  };
}

/** Create a paper result with empty defaults for everything but source and title. */
export function createPaperResult(
  source: string,
  title: string,
  fields: Partial<Omit<PaperResult, "source" | "title">> = {}
): PaperResult {
  return {
    source,
    title,
    authors: [],
    year: "",
    abstract: "",
    doi: "",
    url: "",
    pdfUrl: "",
    ...fields,
  };
}
