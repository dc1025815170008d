/**
 * IEEE Xplore article search. Requires an API key.
 *
 * API: https://ieeexploreapi.ieee.org/api/v1/search/articles
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { requireApiKey, type PaperSource } from "./types.js";

const LABEL = "IEEE Xplore";

interface IeeeArticle {
  title?: string;
  doi?: string;
  publication_year?: string | number;
  abstract?: string;
  html_url?: string;
  pdf_url?: string;
  authors?: { authors?: Array<{ full_name?: string }> };
}

interface IeeeResponse {
  articles?: IeeeArticle[];
}

function toPaper(item: IeeeArticle): PaperResult {
  return createPaperResult(LABEL, item.title ?? "", {
    authors: (item.authors?.authors ?? []).map((a) => a.full_name ?? "").filter((n) => n !== ""),
    year: item.publication_year !== undefined ? String(item.publication_year) : "",
    abstract: item.abstract ?? "",
    doi: item.doi ?? "",
    url: item.html_url ?? "",
    pdfUrl: item.pdf_url ?? "",
  });
}

export const ieeeSource: PaperSource = {
  name: "ieee",
  label: LABEL,
  requiresKey: true,
  async search(query, limit, { config, signal }) {
    const apiKey = requireApiKey(config.ieeeApiKey);
    const params = new URLSearchParams({
      querytext: query,
      max_records: String(limit),
      apikey: apiKey,
    });
    const data = await requestJson<IeeeResponse>(
      `https://ieeexploreapi.ieee.org/api/v1/search/articles?${params.toString()}`,
      { source: LABEL, signal }
    );
    return (data.articles ?? []).map(toPaper);
  },
};
