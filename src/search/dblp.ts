/**
 * DBLP publication search.
 *
 * API: https://dblp.org/search/publ/api?q={q}&format=json&h={n}
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import type { PaperSource } from "./types.js";

const LABEL = "DBLP";

/** DBLP returns a single author as an object and several as a list */
type DblpAuthor = string | { text?: string };

interface DblpInfo {
  title?: string;
  year?: string;
  url?: string;
  doi?: string;
  authors?: { author?: DblpAuthor | DblpAuthor[] };
}

interface DblpResponse {
  result?: { hits?: { hit?: Array<{ info?: DblpInfo }> } };
}

function authorName(author: DblpAuthor): string {
  return typeof author === "string" ? author : (author.text ?? "");
}

/** Normalize DBLP's single-or-list author field. */
export function dblpAuthors(field: DblpAuthor | DblpAuthor[] | undefined): string[] {
  if (field === undefined) return [];
  const list = Array.isArray(field) ? field : [field];
  return list.map(authorName).filter((n) => n !== "");
}

function toPaper(info: DblpInfo): PaperResult {
  return createPaperResult(LABEL, info.title ?? "", {
    authors: dblpAuthors(info.authors?.author),
    year: info.year ?? "",
    doi: info.doi ?? "",
    url: info.url ?? "",
  });
}

export const dblpSource: PaperSource = {
  name: "dblp",
  label: LABEL,
  async search(query, limit, { signal }) {
    const params = new URLSearchParams({ q: query, format: "json", h: String(limit) });
    const data = await requestJson<DblpResponse>(
      `https://dblp.org/search/publ/api?${params.toString()}`,
      { source: LABEL, signal }
    );
    return (data.result?.hits?.hit ?? []).map((h) => toPaper(h.info ?? {}));
  },
};
