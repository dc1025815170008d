/**
 * Crossref works search.
 *
 * API: https://api.crossref.org/works?query={q}&rows={n}[&mailto={email}]
 */

import {
  crossrefAuthorNames,
  crossrefYear,
  type CrossrefAuthor,
  type CrossrefDate,
} from "../discovery/crossref.js";
import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import type { PaperSource } from "./types.js";

const LABEL = "Crossref";

interface CrossrefItem {
  title?: string[];
  DOI?: string;
  abstract?: string;
  published?: CrossrefDate;
  author?: CrossrefAuthor[];
  link?: Array<{ URL?: string; "content-type"?: string }>;
}

interface CrossrefSearchResponse {
  message?: { items?: CrossrefItem[] };
}

function toPaper(item: CrossrefItem): PaperResult {
  const doi = item.DOI ?? "";
  let pdfUrl = "";
  for (const link of item.link ?? []) {
    if (link["content-type"] === "application/pdf") pdfUrl = link.URL ?? "";
  }
  return createPaperResult(LABEL, item.title?.[0] ?? "", {
    authors: crossrefAuthorNames(item.author),
    year: crossrefYear(item.published),
    abstract: item.abstract ?? "",
    doi,
    url: doi ? `https://doi.org/${doi}` : "",
    pdfUrl,
  });
}

export const crossrefSource: PaperSource = {
  name: "crossref",
  label: LABEL,
  async search(query, limit, { config, signal }) {
    const params = new URLSearchParams({
      query,
      rows: String(limit),
      select: "title,author,published,DOI,link,abstract",
    });
    if (config.emailForPolite) params.set("mailto", config.emailForPolite);
    const data = await requestJson<CrossrefSearchResponse>(
      `https://api.crossref.org/works?${params.toString()}`,
      { source: LABEL, signal }
    );
    return (data.message?.items ?? []).map(toPaper);
  },
};
