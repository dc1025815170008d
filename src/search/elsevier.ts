/**
 * Elsevier ScienceDirect search. Requires an API key (X-ELS-APIKey).
 *
 * API: https://api.elsevier.com/content/search/sciencedirect?query={q}&count={n}
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { requireApiKey, yearPrefix, type PaperSource } from "./types.js";

const LABEL = "Elsevier ScienceDirect";

interface ElsevierEntry {
  "dc:title"?: string;
  "prism:doi"?: string;
  "dc:creator"?: string;
  "prism:url"?: string;
  "prism:coverDate"?: string;
}

interface ElsevierResponse {
  "search-results"?: { entry?: ElsevierEntry[] };
}

function toPaper(item: ElsevierEntry): PaperResult {
  const creator = item["dc:creator"] ?? "";
  return createPaperResult(LABEL, item["dc:title"] ?? "", {
    authors: creator ? [creator] : [],
    year: yearPrefix(item["prism:coverDate"]),
    doi: item["prism:doi"] ?? "",
    url: item["prism:url"] ?? "",
  });
}

export const elsevierSource: PaperSource = {
  name: "elsevier",
  label: LABEL,
  requiresKey: true,
  async search(query, limit, { config, signal }) {
    const apiKey = requireApiKey(config.elsevierApiKey);
    const params = new URLSearchParams({ query, count: String(limit) });
    const data = await requestJson<ElsevierResponse>(
      `https://api.elsevier.com/content/search/sciencedirect?${params.toString()}`,
      { headers: { "X-ELS-APIKey": apiKey }, source: "Elsevier", signal }
    );
    return (data["search-results"]?.entry ?? []).map(toPaper);
  },
};
