/**
 * Citation enrichment: Crossref metadata, Unpaywall availability, and
 * optional download of open-access PDFs.
 *
 * Every step is best-effort per record. A failed lookup or download leaves
 * that record as it was and never stops the remaining records.
 */

import anyAscii from "any-ascii";
import { join } from "node:path";
import { lookupCrossrefWork } from "../discovery/crossref.js";
import { lookupOpenAccess } from "../discovery/unpaywall.js";
import { detectPdf } from "../download/detect.js";
import { fetchDocument } from "../download/http.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { CitationRef } from "../types.js";
import type { PaperFileSystem } from "../workspace.js";

const log = createChildLogger({ module: "enricher" });

export interface EnrichOptions {
  /** Contact email for Crossref/Unpaywall; OA lookup is skipped without it */
  email: string;
  /** Download OA PDFs into this directory when set */
  downloadDir?: string;
  /** Required when downloadDir is set */
  fs?: PaperFileSystem;
  signal?: AbortSignal;
}

export interface EnrichSummary {
  /** Number of records visited before finishing or being cancelled */
  processed: number;
  downloaded: number;
  cancelled: boolean;
}

let fallbackCounter = 0;

/**
 * File name for a downloaded citation: the DOI with "/", ":", and spaces
 * replaced by "_", else "citation_<index>", else a time-based name.
 */
export function citationFileName(ref: CitationRef): string {
  let name: string;
  if (ref.doi) {
    name = anyAscii(ref.doi).replace(/[/: ]/g, "_");
  } else if (ref.index > 0) {
    name = `citation_${ref.index}`;
  } else {
    fallbackCounter++;
    name = `citation_${Date.now()}${fallbackCounter}`;
  }
  return `${name}.pdf`;
}

/** Fill title, authors, and year from Crossref; leaves the record untouched on failure. */
export async function lookupCitationMetadata(
  ref: CitationRef,
  email: string,
  signal?: AbortSignal
): Promise<void> {
  if (!ref.doi) return;
  const work = await lookupCrossrefWork(ref.doi, email, { signal });
  if (!work) return;
  if (work.title) ref.title = work.title;
  if (work.authors.length > 0) ref.authors = work.authors.join(", ");
  if (work.year) ref.year = work.year;
}

/** Mark the record open access when Unpaywall reports a usable location. */
export async function enrichCitationOA(
  ref: CitationRef,
  email: string,
  signal?: AbortSignal
): Promise<void> {
  if (!ref.doi || !email) return;
  try {
    const location = await lookupOpenAccess(ref.doi, email, { signal });
    if (!location?.url) return;
    ref.isOA = true;
    ref.pdfUrl = location.url;
  } catch (err) {
    log.debug({ doi: ref.doi, err: errorMessage(err) }, "Unpaywall lookup failed");
  }
}

/**
 * Download a citation's OA PDF to `destPath`.
 * The body must pass PDF detection before it is written.
 *
 * @returns true when the file was written
 */
export async function downloadCitationPaper(
  ref: CitationRef,
  destPath: string,
  fs: PaperFileSystem,
  signal?: AbortSignal
): Promise<boolean> {
  if (!ref.pdfUrl) return false;
  try {
    const doc = await fetchDocument(ref.pdfUrl, { signal });
    if (!detectPdf(doc.body, doc.contentType, ref.pdfUrl)) {
      log.debug({ url: ref.pdfUrl, contentType: doc.contentType }, "citation download is not a PDF");
      return false;
    }
    await fs.writeFile(destPath, doc.body);
    return true;
  } catch (err) {
    log.debug({ url: ref.pdfUrl, err: errorMessage(err) }, "citation download failed");
    return false;
  }
}

/** Run both lookups for one record. Records without a DOI are left as parsed. */
export async function enrichCitation(
  ref: CitationRef,
  options: Pick<EnrichOptions, "email" | "signal">
): Promise<void> {
  if (!ref.doi) return;
  await lookupCitationMetadata(ref, options.email, options.signal);
  await enrichCitationOA(ref, options.email, options.signal);
}

/**
 * Enrich records in document order, mutating them in place.
 * Stops between records once the signal is aborted, keeping what was done.
 */
export async function enrichCitations(
  refs: CitationRef[],
  options: EnrichOptions
): Promise<EnrichSummary> {
  const summary: EnrichSummary = { processed: 0, downloaded: 0, cancelled: false };
  const { downloadDir, fs, signal } = options;

  for (const ref of refs) {
    if (signal?.aborted) {
      summary.cancelled = true;
      log.info({ processed: summary.processed, total: refs.length }, "citation enrichment cancelled");
      break;
    }

    await enrichCitation(ref, options);

    if (downloadDir && fs && ref.isOA && ref.pdfUrl) {
      const destPath = join(downloadDir, citationFileName(ref));
      if (await downloadCitationPaper(ref, destPath, fs, signal)) {
        summary.downloaded++;
      }
    }
    summary.processed++;
  }

  return summary;
}
