/**
 * PubMed Central search via E-utilities: esearch for ids, then esummary
 * for metadata.
 *
 * esearch: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi?db=pmc&term={q}
 * esummary: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi?db=pmc&id={ids}
 */

import { requestJson } from "../download/http.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { yearPrefix, type PaperSource } from "./types.js";

const LABEL = "PubMed Central";

const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

interface ESearchResponse {
  esearchresult?: { idlist?: string[] };
}

interface ESummaryDoc {
  title?: string;
  pubdate?: string;
  authors?: Array<{ name?: string }>;
  elocationid?: string;
}

interface ESummaryResponse {
  result?: Record<string, unknown>;
}

function isSummaryDoc(value: unknown): value is ESummaryDoc {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPaper(id: string, doc: ESummaryDoc): PaperResult {
  return createPaperResult(LABEL, doc.title ?? "", {
    authors: (doc.authors ?? []).map((a) => a.name ?? "").filter((n) => n !== ""),
    year: yearPrefix(doc.pubdate),
    doi: doc.elocationid ?? "",
    url: `https://www.ncbi.nlm.nih.gov/pmc/articles/PMC${id}/`,
    pdfUrl: `https://www.ncbi.nlm.nih.gov/pmc/articles/PMC${id}/pdf/`,
  });
}

export const pubmedSource: PaperSource = {
  name: "pubmed",
  label: LABEL,
  async search(query, limit, { config, signal }) {
    const searchParams = new URLSearchParams({
      db: "pmc",
      term: query,
      retmax: String(limit),
      retmode: "json",
    });
    if (config.pubmedApiKey) searchParams.set("api_key", config.pubmedApiKey);

    const search = await requestJson<ESearchResponse>(
      `${EUTILS_BASE}/esearch.fcgi?${searchParams.toString()}`,
      { source: "PubMed esearch", signal }
    );
    const ids = (search.esearchresult?.idlist ?? []).slice(0, limit);
    if (ids.length === 0) return [];

    const summaryParams = new URLSearchParams({ db: "pmc", id: ids.join(","), retmode: "json" });
    if (config.pubmedApiKey) summaryParams.set("api_key", config.pubmedApiKey);

    const summary = await requestJson<ESummaryResponse>(
      `${EUTILS_BASE}/esummary.fcgi?${summaryParams.toString()}`,
      { source: "PubMed esummary", signal }
    );

    const results: PaperResult[] = [];
    for (const id of ids) {
      const doc = summary.result?.[id];
      if (isSummaryDoc(doc)) results.push(toPaper(id, doc));
    }
    return results;
  },
};
