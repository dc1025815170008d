/**
 * # paper-harvest
 *
 * Academic paper tools for agents: multi-source search, open-access paper
 * download, and citation extraction with enrichment.
 *
 * ## Tools
 *
 * 1. **Search**: fan a query out across OpenAlex, arXiv, Crossref, PubMed Central
 *    and eight more sources, with bounded concurrency.
 * 2. **Fetch**: download a paper by URL or DOI (via Unpaywall), preferring a PDF and
 *    falling back to the landing page's text.
 * 3. **Extract citations**: parse the reference list of a saved paper, look up
 *    Crossref metadata and Unpaywall status, and optionally download OA copies.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { academicSearch, createConfig, createFileSystem, fetchPaper } from "paper-harvest";
 *
 * const config = createConfig({ emailForPolite: "you@example.com" });
 * const fs = createFileSystem("/tmp/papers", true);
 *
 * const search = await academicSearch({ query: "graph neural networks", sources: ["arxiv"] }, { config, fs });
 * console.log(search.forUser);
 *
 * const fetched = await fetchPaper({ doi: "10.1234/example", save_to: "paper.pdf" }, { config, fs });
 * if (fetched.isError) console.error(fetched.forModel);
 * ```
 *
 * The same tools are served over MCP stdio by the `paper-harvest-mcp` binary.
 *
 * @packageDocumentation
 */

// Types
export type {
  CitationRef,
  DoiNotOpenAccessPolicy,
  FetchedDocument,
  OALocation,
  PaperResult,
} from "./types.js";
export { createCitationRef, createPaperResult } from "./types.js";

// Errors
export {
  ConfigurationError,
  errorMessage,
  PaperHarvestError,
  ParseError,
  TransportError,
} from "./errors.js";

// Configuration and file access
export type { AcademicToolsConfig } from "./config.js";
export { createConfig, DEFAULT_CONFIG, loadConfig } from "./config.js";
export type { PaperFileSystem } from "./workspace.js";
export { createFileSystem, HostFileSystem, SandboxFileSystem } from "./workspace.js";

// Tools
export type { ToolContext, ToolResult } from "./tools/result.js";
export type { AcademicSearchArgs } from "./tools/search.js";
export { academicSearch } from "./tools/search.js";
export type { FetchPaperArgs } from "./tools/fetch-paper.js";
export { fetchPaper } from "./tools/fetch-paper.js";
export type { ExtractCitationsArgs } from "./tools/extract-citations.js";
export { extractCitations } from "./tools/extract-citations.js";

// Search
export type { PaperSource, SearchOutcome, SourceName } from "./search/index.js";
export { PAPER_SOURCES, searchSources, selectSources, SOURCE_NAMES } from "./search/index.js";

// Building blocks
export { lookupOpenAccess } from "./discovery/unpaywall.js";
export { lookupCrossrefWork } from "./discovery/crossref.js";
export { fetchDocument } from "./download/http.js";
export { detectPdf } from "./download/detect.js";
export { findPdfUrlInHtml } from "./download/pdf-link.js";
export { extractTextFromPdf } from "./convert/pdf-text.js";
export { extractHtmlText } from "./convert/html-text.js";
export { extractCitationSection } from "./citations/section.js";
export { parseCitationRefs } from "./citations/parser.js";
export { enrichCitations } from "./citations/enricher.js";
export { formatCitation, formatPaper } from "./citations/format.js";

// MCP
export { createServer } from "./mcp.js";
