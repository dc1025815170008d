/**
 * OpenAlex works search.
 *
 * API: https://api.openalex.org/works?search={q}&per-page={n}
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { yearString, type PaperSource } from "./types.js";

const LABEL = "OpenAlex";

interface OpenAlexWork {
  title?: string | null;
  doi?: string | null;
  publication_year?: number | null;
  open_access?: { is_oa?: boolean; oa_url?: string | null } | null;
  primary_location?: { landing_page_url?: string | null; pdf_url?: string | null } | null;
  authorships?: Array<{ author?: { display_name?: string | null } | null }>;
}

interface OpenAlexResponse {
  results?: OpenAlexWork[];
}

function toPaper(work: OpenAlexWork): PaperResult {
  const authors = (work.authorships ?? [])
    .map((a) => a.author?.display_name ?? "")
    .filter((name) => name !== "");
  let pdfUrl = work.primary_location?.pdf_url ?? "";
  if (!pdfUrl && work.open_access?.is_oa) {
    pdfUrl = work.open_access.oa_url ?? "";
  }
  return createPaperResult(LABEL, work.title ?? "", {
    authors,
    year: yearString(work.publication_year),
    doi: work.doi ?? "",
    url: work.primary_location?.landing_page_url ?? "",
    pdfUrl,
  });
}

export const openAlexSource: PaperSource = {
  name: "openalex",
  label: LABEL,
  async search(query, limit, { signal }) {
    const params = new URLSearchParams({
      search: query,
      "per-page": String(limit),
      select: "id,title,doi,open_access,primary_location,publication_year,authorships",
    });
    const data = await requestJson<OpenAlexResponse>(
      `https://api.openalex.org/works?${params.toString()}`,
      { source: LABEL, signal }
    );
    return (data.results ?? []).map(toPaper);
  },
};
