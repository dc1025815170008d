/**
 * PLOS search (Solr).
 *
 * API: https://api.plos.org/search?q={q}&rows={n}
 * PLOS ids are DOIs, so links go through the DOI resolver.
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { yearPrefix, type PaperSource } from "./types.js";

const LABEL = "PLOS";

interface PlosDoc {
  id?: string;
  title?: string;
  author?: string[];
  abstract?: string[];
  publication_date?: string;
}

interface PlosResponse {
  response?: { docs?: PlosDoc[] };
}

function toPaper(item: PlosDoc): PaperResult {
  const doi = item.id ?? "";
  const link = doi ? `https://doi.org/${doi}` : "";
  return createPaperResult(LABEL, item.title ?? "", {
    authors: item.author ?? [],
    year: yearPrefix(item.publication_date),
    abstract: item.abstract?.[0] ?? "",
    doi,
    url: link,
    pdfUrl: link,
  });
}

export const plosSource: PaperSource = {
  name: "plos",
  label: LABEL,
  async search(query, limit, { signal }) {
    const params = new URLSearchParams({
      q: query,
      rows: String(limit),
      fl: "id,title,author,abstract,publication_date",
    });
    const data = await requestJson<PlosResponse>(
      `https://api.plos.org/search?${params.toString()}`,
      { source: LABEL, signal }
    );
    return (data.response?.docs ?? []).map(toPaper);
  },
};
