/**
 * academic_extract_citations: read a saved paper, parse its reference list,
 * enrich each citation, optionally download OA copies, and report.
 */

import { enrichCitations } from "../citations/enricher.js";
import { formatCitation } from "../citations/format.js";
import { parseCitationRefs } from "../citations/parser.js";
import { extractCitationSection } from "../citations/section.js";
import { extractTextFromPdf } from "../convert/pdf-text.js";
import { hasPdfMagic } from "../download/detect.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { errorResult, successResult, type ToolContext, type ToolResult } from "./result.js";

const log = createChildLogger({ module: "extract-citations" });

export const DEFAULT_MAX_CITATIONS = 20;
export const MAX_CITATIONS_LIMIT = 50;

export const NO_CITATIONS_MESSAGE =
  "No citations could be extracted from the paper (no reference section or DOIs found)";

export interface ExtractCitationsArgs {
  /** Path to the saved paper (PDF or text) */
  file_path?: string;
  /** 1-50, default 20 */
  max_citations?: number;
  download_available?: boolean;
  /** Directory for downloaded cited papers; required with download_available */
  save_dir?: string;
  /** Optional path for the report */
  save_report_to?: string;
}

function resolveMaxCitations(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_MAX_CITATIONS;
  const n = Math.trunc(value);
  return n > 0 && n <= MAX_CITATIONS_LIMIT ? n : DEFAULT_MAX_CITATIONS;
}

/** Plain text of a saved paper: PDF text extraction or UTF-8 decoding. */
export function documentText(data: Uint8Array): string {
  if (hasPdfMagic(data)) return extractTextFromPdf(data);
  return Buffer.from(data).toString("utf-8");
}

/** Extract, enrich, and report the citations of a saved paper. */
export async function extractCitations(
  args: ExtractCitationsArgs,
  context: ToolContext
): Promise<ToolResult> {
  const filePath = args.file_path?.trim() ?? "";
  if (!filePath) return errorResult("file_path is required");

  const maxCitations = resolveMaxCitations(args.max_citations);
  const downloadAvailable = args.download_available === true;
  const saveDir = args.save_dir?.trim() ?? "";
  const saveReportTo = args.save_report_to?.trim() ?? "";

  if (downloadAvailable && !saveDir) {
    return errorResult("save_dir is required when download_available=true");
  }

  let fileData: Uint8Array;
  try {
    fileData = await context.fs.readFile(filePath);
  } catch (err) {
    return errorResult(`failed to read file: ${errorMessage(err)}`);
  }

  const text = documentText(fileData);
  if (text.trim().length === 0) {
    return errorResult("no text content could be extracted from the file");
  }

  // Without a references header, look for citation evidence anywhere.
  const refSection = extractCitationSection(text) || text;
  const refs = parseCitationRefs(refSection, maxCitations);
  if (refs.length === 0) {
    return successResult(NO_CITATIONS_MESSAGE);
  }

  const { emailForPolite } = context.config;
  const summary = await enrichCitations(refs, {
    email: emailForPolite,
    signal: context.signal,
    ...(downloadAvailable ? { downloadDir: saveDir, fs: context.fs } : {}),
  });
  const reported = refs.slice(0, summary.processed);
  const oaCount = reported.filter((r) => r.isOA).length;

  let header = `Citation analysis of ${filePath}\nFound ${reported.length} citations`;
  if (emailForPolite) header += `, ${oaCount} open access`;
  if (downloadAvailable) header += `, ${summary.downloaded} downloaded`;
  if (summary.cancelled) header += ` (cancelled after ${summary.processed} of ${refs.length})`;

  const blocks = reported.map((ref, i) => `--- Citation ${i + 1} ---\n${formatCitation(ref)}\n`);
  const report = `${header}\n\n${blocks.join("")}`;

  log.info(
    { filePath, citations: reported.length, openAccess: oaCount, downloaded: summary.downloaded },
    "citation extraction finished"
  );

  if (saveReportTo) {
    try {
      await context.fs.writeFile(saveReportTo, report);
    } catch (err) {
      return errorResult(`analysis done but failed to save report: ${errorMessage(err)}`);
    }
    return successResult(
      `Found ${reported.length} citations (${oaCount} open access). Report saved to ${saveReportTo}`,
      report
    );
  }

  return successResult(report);
}
