/**
 * Semantic Scholar paper search.
 *
 * API: https://api.semanticscholar.org/graph/v1/paper/search
 * An API key (x-api-key) raises the rate limit but is optional.
 */

import { requestJson } from "../download/http.js";
import { TransportError } from "../errors.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { yearString, type PaperSource } from "./types.js";

const LABEL = "Semantic Scholar";

interface SemanticScholarPaper {
  title?: string | null;
  year?: number | null;
  abstract?: string | null;
  url?: string | null;
  authors?: Array<{ name?: string | null }>;
  openAccessPdf?: { url?: string | null } | null;
  externalIds?: { DOI?: string | null } | null;
}

interface SemanticScholarResponse {
  data?: SemanticScholarPaper[];
}

function toPaper(item: SemanticScholarPaper): PaperResult {
  return createPaperResult(LABEL, item.title ?? "", {
    authors: (item.authors ?? []).map((a) => a.name ?? "").filter((n) => n !== ""),
    year: yearString(item.year),
    abstract: item.abstract ?? "",
    doi: item.externalIds?.DOI ?? "",
    url: item.url ?? "",
    pdfUrl: item.openAccessPdf?.url ?? "",
  });
}

export const semanticScholarSource: PaperSource = {
  name: "semantic_scholar",
  label: LABEL,
  async search(query, limit, { config, signal }) {
    const params = new URLSearchParams({
      query,
      limit: String(limit),
      fields: "title,authors,year,abstract,openAccessPdf,externalIds,url",
    });
    const headers: Record<string, string> = {};
    if (config.semanticScholarApiKey) headers["x-api-key"] = config.semanticScholarApiKey;

    let data: SemanticScholarResponse;
    try {
      data = await requestJson<SemanticScholarResponse>(
        `https://api.semanticscholar.org/graph/v1/paper/search?${params.toString()}`,
        { headers, source: LABEL, signal }
      );
    } catch (err) {
      if (err instanceof TransportError && err.status === 429) {
        throw new TransportError("rate limited by Semantic Scholar", err.url, {
          status: 429,
          cause: err,
        });
      }
      throw err;
    }
    return (data.data ?? []).map(toPaper);
  },
};
