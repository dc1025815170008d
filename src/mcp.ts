/**
 * MCP server exposing the three academic tools over any transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AcademicToolsConfig } from "./config.js";
import { describeSources } from "./search/index.js";
import { extractCitations, MAX_CITATIONS_LIMIT } from "./tools/extract-citations.js";
import { fetchPaper } from "./tools/fetch-paper.js";
import type { ToolResult } from "./tools/result.js";
import { academicSearch, MAX_RESULTS_LIMIT } from "./tools/search.js";
import type { PaperFileSystem } from "./workspace.js";

export const SERVER_NAME = "paper-harvest";
export const SERVER_VERSION = "0.1.0";

/** MCP text content for a tool result; the user-facing body wins when present. */
export function toCallToolResult(result: ToolResult) {
  return {
    content: [{ type: "text" as const, text: result.forUser || result.forModel }],
    isError: result.isError,
  };
}

export function createServer(config: AcademicToolsConfig, fs: PaperFileSystem): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "academic_search",
    {
      description:
        "Search for academic papers on a topic across multiple sources. " +
        `Available sources: ${describeSources()}. ` +
        "Returns titles, authors, years, DOIs, links and abstracts.",
      inputSchema: {
        query: z.string().describe("Search query"),
        sources: z
          .array(z.string())
          .optional()
          .describe("Sources to search; defaults to all"),
        max_results: z
          .number()
          .optional()
          .describe(`Maximum results per source (1-${MAX_RESULTS_LIMIT})`),
        save_to: z.string().optional().describe("File path to save the results to"),
      },
    },
    async (args, extra) =>
      toCallToolResult(await academicSearch(args, { config, fs, signal: extra.signal }))
  );

  server.registerTool(
    "academic_fetch_paper",
    {
      description:
        "Download an academic paper by URL or DOI and save it. PDFs are saved as-is; " +
        "HTML pages are searched for a PDF link and otherwise saved as extracted text.",
      inputSchema: {
        url: z.string().optional().describe("Paper URL (PDF or landing page)"),
        doi: z.string().optional().describe("DOI, resolved through Unpaywall"),
        save_to: z.string().describe("File path to save the paper to"),
      },
    },
    async (args, extra) =>
      toCallToolResult(await fetchPaper(args, { config, fs, signal: extra.signal }))
  );

  server.registerTool(
    "academic_extract_citations",
    {
      description:
        "Extract the reference list from a saved paper (PDF or text), enrich each citation " +
        "with Crossref metadata and Unpaywall open-access status, and optionally download " +
        "the open-access PDFs.",
      inputSchema: {
        file_path: z.string().describe("Path to the saved paper"),
        max_citations: z
          .number()
          .optional()
          .describe(`Maximum citations to process (1-${MAX_CITATIONS_LIMIT}, default 20)`),
        download_available: z
          .boolean()
          .optional()
          .describe("Download open-access PDFs of cited papers"),
        save_dir: z
          .string()
          .optional()
          .describe("Directory for downloaded papers; required with download_available"),
        save_report_to: z.string().optional().describe("File path to save the report to"),
      },
    },
    async (args, extra) =>
      toCallToolResult(await extractCitations(args, { config, fs, signal: extra.signal }))
  );

  return server;
}
