/**
 * DOAJ (Directory of Open Access Journals) article search.
 *
 * API: https://doaj.org/api/search/articles/{q}?pageSize={n}
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import type { PaperSource } from "./types.js";

const LABEL = "DOAJ";

interface DoajBibjson {
  title?: string;
  abstract?: string;
  year?: string;
  author?: Array<{ name?: string }>;
  identifier?: Array<{ type?: string; id?: string }>;
  link?: Array<{ url?: string; type?: string }>;
}

interface DoajResponse {
  results?: Array<{ bibjson?: DoajBibjson }>;
}

function toPaper(bib: DoajBibjson): PaperResult {
  let doi = "";
  for (const id of bib.identifier ?? []) {
    if (id.type?.toLowerCase() === "doi") doi = id.id ?? "";
  }
  let url = "";
  let pdfUrl = "";
  for (const link of bib.link ?? []) {
    if (link.type === "fulltext") {
      url = link.url ?? "";
    } else if (link.type === "pdf") {
      pdfUrl = link.url ?? "";
    }
  }
  if (!url && doi) url = `https://doi.org/${doi}`;
  return createPaperResult(LABEL, bib.title ?? "", {
    authors: (bib.author ?? []).map((a) => a.name ?? "").filter((n) => n !== ""),
    year: bib.year ?? "",
    abstract: bib.abstract ?? "",
    doi,
    url,
    pdfUrl,
  });
}

export const doajSource: PaperSource = {
  name: "doaj",
  label: LABEL,
  async search(query, limit, { signal }) {
    const data = await requestJson<DoajResponse>(
      `https://doaj.org/api/search/articles/${encodeURIComponent(query)}?pageSize=${limit}`,
      { source: LABEL, signal }
    );
    return (data.results ?? []).map((r) => toPaper(r.bibjson ?? {}));
  },
};
