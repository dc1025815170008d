/**
 * Springer Nature open access search. Requires an API key.
 *
 * API: https://api.springernature.com/openaccess/json?q={q}&p={n}&api_key={key}
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { requireApiKey, yearPrefix, type PaperSource } from "./types.js";

const LABEL = "Springer";

interface SpringerRecord {
  title?: string;
  doi?: string;
  abstract?: string;
  publicationDate?: string;
  url?: Array<{ value?: string; format?: string }>;
  creators?: Array<{ creator?: string }>;
}

interface SpringerResponse {
  records?: SpringerRecord[];
}

function toPaper(item: SpringerRecord): PaperResult {
  let url = "";
  let pdfUrl = "";
  for (const u of item.url ?? []) {
    if (u.format === "pdf") {
      pdfUrl = u.value ?? "";
    } else if (!url) {
      url = u.value ?? "";
    }
  }
  return createPaperResult(LABEL, item.title ?? "", {
    authors: (item.creators ?? []).map((c) => c.creator ?? "").filter((n) => n !== ""),
    year: yearPrefix(item.publicationDate),
    abstract: item.abstract ?? "",
    doi: item.doi ?? "",
    url,
    pdfUrl,
  });
}

export const springerSource: PaperSource = {
  name: "springer",
  label: LABEL,
  requiresKey: true,
  async search(query, limit, { config, signal }) {
    const apiKey = requireApiKey(config.springerApiKey);
    const params = new URLSearchParams({ q: query, p: String(limit), api_key: apiKey });
    const data = await requestJson<SpringerResponse>(
      `https://api.springernature.com/openaccess/json?${params.toString()}`,
      { source: LABEL, signal }
    );
    return (data.records ?? []).map(toPaper);
  },
};
