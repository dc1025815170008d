/**
 * Lens.org scholarly search. Requires an API token.
 *
 * API: POST https://api.lens.org/scholarly/search
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { requireApiKey, yearString, type PaperSource } from "./types.js";

const LABEL = "Lens.org";

interface LensRecord {
  title?: string;
  year_published?: number;
  abstract?: string;
  doi?: string;
  authors?: Array<{ display_name?: string; first_name?: string; last_name?: string }>;
}

interface LensResponse {
  data?: LensRecord[];
}

function toPaper(item: LensRecord): PaperResult {
  const doi = item.doi ?? "";
  const authors = (item.authors ?? [])
    .map((a) => a.display_name ?? `${a.first_name ?? ""} ${a.last_name ?? ""}`.trim())
    .filter((n) => n !== "");
  return createPaperResult(LABEL, item.title ?? "", {
    authors,
    year: yearString(item.year_published),
    abstract: item.abstract ?? "",
    doi,
    url: doi ? `https://doi.org/${doi}` : "",
  });
}

export const lensSource: PaperSource = {
  name: "lens",
  label: LABEL,
  requiresKey: true,
  async search(query, limit, { config, signal }) {
    const apiKey = requireApiKey(config.lensApiKey);
    const payload = {
      query: { match: { title: query } },
      size: limit,
      include: ["title", "authors", "year_published", "abstract", "doi", "open_access", "external_ids"],
    };
    const data = await requestJson<LensResponse>("https://api.lens.org/scholarly/search", {
      method: "POST",
      headers: { Authorization: `Bearer ${apiKey}`, "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      source: LABEL,
      signal,
    });
    return (data.data ?? []).map(toPaper);
  },
};
