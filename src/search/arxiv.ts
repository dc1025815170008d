/**
 * arXiv search via the Atom export API.
 *
 * API: https://export.arxiv.org/api/query?search_query=all:{q}&max_results={n}
 */

import { XMLParser } from "fast-xml-parser";
import { requestText } from "../download/http.js";
import { ParseError, errorMessage } from "../errors.js";
import { createPaperResult, type PaperResult } from "../types.js";
import { yearPrefix, type PaperSource } from "./types.js";

const LABEL = "arXiv";

const ARXIV_TIMEOUT_MS = 20_000;

interface AtomLink {
  "@_href"?: string;
  "@_type"?: string;
  "@_title"?: string;
  "@_rel"?: string;
}

interface AtomEntry {
  id?: string;
  title?: string;
  summary?: string;
  published?: string;
  author?: Array<{ name?: string }>;
  link?: AtomLink[];
}

interface AtomFeed {
  feed?: { entry?: AtomEntry[] };
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  isArray: (name) => name === "entry" || name === "author" || name === "link",
});

/** Collapse the line-wrapped whitespace arXiv puts in titles and abstracts. */
function squash(text: string | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

function toPaper(entry: AtomEntry): PaperResult {
  const id = entry.id ?? "";
  let pdfUrl = "";
  let pageUrl = id;
  for (const link of entry.link ?? []) {
    if (link["@_title"] === "pdf" || link["@_type"] === "application/pdf") {
      pdfUrl = link["@_href"] ?? "";
    } else if (link["@_rel"] === "alternate") {
      pageUrl = link["@_href"] ?? pageUrl;
    }
  }
  // http://arxiv.org/abs/1234.5678v1 -> http://arxiv.org/pdf/1234.5678v1
  if (!pdfUrl && id.includes("arxiv.org/abs/")) {
    pdfUrl = id.replace("/abs/", "/pdf/");
  }
  return createPaperResult(LABEL, squash(entry.title), {
    authors: (entry.author ?? []).map((a) => squash(a.name)).filter((n) => n !== ""),
    year: yearPrefix(entry.published),
    abstract: squash(entry.summary),
    url: pageUrl,
    pdfUrl,
  });
}

/** Parse an arXiv Atom feed into paper results. */
export function parseArxivFeed(xml: string): PaperResult[] {
  let feed: AtomFeed;
  try {
    feed = parser.parse(xml, true);
  } catch (err) {
    throw new ParseError(`arXiv parse error: ${errorMessage(err)}`, { source: LABEL, cause: err });
  }
  return (feed.feed?.entry ?? []).map(toPaper);
}

export const arxivSource: PaperSource = {
  name: "arxiv",
  label: LABEL,
  async search(query, limit, { signal }) {
    const params = new URLSearchParams({
      search_query: `all:${query}`,
      start: "0",
      max_results: String(limit),
    });
    const xml = await requestText(`https://export.arxiv.org/api/query?${params.toString()}`, {
      timeoutMs: ARXIV_TIMEOUT_MS,
      signal,
    });
    return parseArxivFeed(xml);
  },
};
