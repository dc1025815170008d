/**
 * academic_fetch_paper: download one paper by URL or DOI, PDF first.
 *
 * Flow: resolve the URL (Unpaywall for DOIs), fetch it, and if the
 * response is a landing page, follow an advertised PDF link. Saves the PDF
 * bytes verbatim, or the page text behind a provenance header.
 */

import { lookupOpenAccess } from "../discovery/unpaywall.js";
import { detectPdf } from "../download/detect.js";
import { fetchDocument } from "../download/http.js";
import { findPdfUrlInHtml } from "../download/pdf-link.js";
import { extractHtmlText } from "../convert/html-text.js";
import { doiUrl } from "../citations/parser.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { FetchedDocument, OALocation } from "../types.js";
import { errorResult, successResult, type ToolContext, type ToolResult } from "./result.js";

const log = createChildLogger({ module: "fetch-paper" });

export interface FetchPaperArgs {
  /** Direct URL of the paper (PDF or HTML page) */
  url?: string;
  /** DOI, used to find an OA copy via Unpaywall when no url is given */
  doi?: string;
  /** File path to save the paper to */
  save_to?: string;
}

type UrlResolution = { url: string } | { error: string };

/** RFC 3339 UTC timestamp with second precision. */
function rfc3339Now(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}

function isHttpUrl(raw: string): boolean {
  try {
    const { protocol } = new URL(raw);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

async function resolvePaperUrl(args: FetchPaperArgs, context: ToolContext): Promise<UrlResolution> {
  const url = args.url?.trim() ?? "";
  const doi = args.doi?.trim() ?? "";
  if (url) return { url };
  if (!doi) return { error: "either url or doi must be provided" };

  const { emailForPolite, onDoiNotOpenAccess } = context.config;
  if (!emailForPolite) {
    return {
      error:
        "email_for_polite must be set in academic tools config to use DOI/Unpaywall lookup (set ACADEMIC_EMAIL_FOR_POLITE)",
    };
  }

  let location: OALocation | null;
  try {
    location = await lookupOpenAccess(doi, emailForPolite, { signal: context.signal });
  } catch (err) {
    return { error: `Unpaywall lookup failed for DOI ${doi}: ${errorMessage(err)}` };
  }
  if (location) {
    const { url: oaUrl, urlType, version, license } = location;
    log.info({ doi, url: oaUrl, urlType, version, license }, "open-access location found");
    return { url: oaUrl };
  }

  if (onDoiNotOpenAccess === "fail") {
    return { error: `no open-access version found for DOI ${doi}` };
  }
  log.info({ doi }, "no open-access version; falling back to DOI landing page");
  return { url: doiUrl(doi) };
}

/**
 * When the first response is a landing page, try the PDF it links to.
 * Returns the PDF document, or null to keep the original page.
 */
async function upgradeToPdf(
  page: FetchedDocument,
  signal: AbortSignal | undefined
): Promise<FetchedDocument | null> {
  const html = Buffer.from(page.body).toString("utf-8");
  const pdfLink = findPdfUrlInHtml(html, page.finalUrl);
  if (!pdfLink) return null;

  try {
    const pdf = await fetchDocument(pdfLink, { signal });
    if (detectPdf(pdf.body, pdf.contentType, pdfLink)) {
      return { ...pdf, finalUrl: pdfLink };
    }
    log.debug({ pdfLink, contentType: pdf.contentType }, "embedded PDF link did not return a PDF");
  } catch (err) {
    log.debug({ pdfLink, err: errorMessage(err) }, "embedded PDF link fetch failed");
  }
  return null;
}

function toSavedText(doc: FetchedDocument): string {
  const raw = Buffer.from(doc.body).toString("utf-8");
  const text = doc.contentType.includes("text/html") ? extractHtmlText(raw) : raw;
  return `Source: ${doc.finalUrl}\nFetched: ${rfc3339Now()}\n\n${text}`;
}

/** Fetch a paper by URL or DOI and save it as PDF or text. */
export async function fetchPaper(args: FetchPaperArgs, context: ToolContext): Promise<ToolResult> {
  const saveTo = args.save_to?.trim() ?? "";
  if (!saveTo) return errorResult("save_to is required");

  const resolution = await resolvePaperUrl(args, context);
  if ("error" in resolution) return errorResult(resolution.error);
  const paperUrl = resolution.url;

  if (!isHttpUrl(paperUrl)) {
    return errorResult("only http/https URLs are supported");
  }

  let doc: FetchedDocument;
  try {
    doc = await fetchDocument(paperUrl, { signal: context.signal });
  } catch (err) {
    return errorResult(errorMessage(err));
  }

  let isPdf = detectPdf(doc.body, doc.contentType, doc.finalUrl);
  if (!isPdf && doc.contentType.includes("text/html")) {
    const pdf = await upgradeToPdf(doc, context.signal);
    if (pdf) {
      doc = pdf;
      isPdf = true;
    }
  }

  const fileType = isPdf ? "PDF" : "text";
  const data: Uint8Array = isPdf ? doc.body : Buffer.from(toSavedText(doc), "utf-8");

  try {
    await context.fs.writeFile(saveTo, data);
  } catch (err) {
    return errorResult(`failed to save file: ${errorMessage(err)}`);
  }

  log.info({ url: doc.finalUrl, saveTo, fileType, bytes: data.length }, "paper saved");
  return successResult(`Paper saved as ${fileType} (${data.length} bytes) to ${saveTo}`);
}
