/**
 * academic_search: fan a query out across the paper sources and merge the results.
 */

import { formatPaper } from "../citations/format.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { searchSources, selectSources } from "../search/index.js";
import { errorResult, successResult, type ToolContext, type ToolResult } from "./result.js";

const log = createChildLogger({ module: "academic-search" });

export const MAX_RESULTS_LIMIT = 20;

export interface AcademicSearchArgs {
  query?: string;
  /** Source names; empty or missing means all */
  sources?: string[];
  /** Per source, 1-20; otherwise the configured default */
  max_results?: number;
  save_to?: string;
}

function resolveMaxResults(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  const n = Math.trunc(value);
  return n > 0 && n <= MAX_RESULTS_LIMIT ? n : fallback;
}

export async function academicSearch(
  args: AcademicSearchArgs,
  context: ToolContext
): Promise<ToolResult> {
  const query = args.query?.trim() ?? "";
  if (!query) return errorResult("query is required");

  const limit = resolveMaxResults(args.max_results, context.config.maxResultsPerSource);
  const sources = selectSources(args.sources);
  const saveTo = args.save_to?.trim() ?? "";

  const { results, errors } = await searchSources(query, limit, {
    config: context.config,
    sources,
    signal: context.signal,
  });

  if (results.length === 0 && errors.length > 0) {
    return errorResult(`all searches failed: ${errors.join("; ")}`);
  }

  const quoted = JSON.stringify(query);
  let report = `Academic search results for: ${quoted}\nFound ${results.length} papers\n`;
  if (errors.length > 0) report += `Errors: ${errors.join("; ")}\n`;
  report += "\n";
  results.forEach((paper, i) => {
    report += `--- Paper ${i + 1} ---\n${formatPaper(paper)}\n`;
  });

  log.info(
    { query, sources: sources.length, papers: results.length, failed: errors.length },
    "search finished"
  );

  if (saveTo) {
    try {
      await context.fs.writeFile(saveTo, report);
    } catch (err) {
      return errorResult(`search succeeded but failed to save results: ${errorMessage(err)}`);
    }
    return successResult(
      `Found ${results.length} papers for ${quoted}. Results saved to ${saveTo}`,
      report
    );
  }

  return successResult(report);
}
