/**
 * Search source registry and the bounded fan-out over it.
 */

import type { AcademicToolsConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { PaperResult } from "../types.js";
import { arxivSource } from "./arxiv.js";
import { crossrefSource } from "./crossref.js";
import { dblpSource } from "./dblp.js";
import { doajSource } from "./doaj.js";
import { elsevierSource } from "./elsevier.js";
import { ieeeSource } from "./ieee.js";
import { lensSource } from "./lens.js";
import { openAlexSource } from "./openalex.js";
import { plosSource } from "./plos.js";
import { pubmedSource } from "./pubmed.js";
import { semanticScholarSource } from "./semantic-scholar.js";
import { springerSource } from "./springer.js";
import { SOURCE_NAMES, type PaperSource, type SourceName } from "./types.js";

export { SOURCE_NAMES } from "./types.js";
export type { PaperSource, SourceName, SourceSearchContext } from "./types.js";

const log = createChildLogger({ module: "search" });

const SOURCE_REGISTRY: Record<SourceName, PaperSource> = {
  openalex: openAlexSource,
  arxiv: arxivSource,
  plos: plosSource,
  crossref: crossrefSource,
  doaj: doajSource,
  dblp: dblpSource,
  pubmed: pubmedSource,
  semantic_scholar: semanticScholarSource,
  springer: springerSource,
  ieee: ieeeSource,
  elsevier: elsevierSource,
  lens: lensSource,
};

/** All sources in registry order. */
export const PAPER_SOURCES: readonly PaperSource[] = SOURCE_NAMES.map(
  (name) => SOURCE_REGISTRY[name]
);

/**
 * Sources to query for a request: every source when none are named,
 * otherwise the named ones, still in registry order. Unknown names match nothing.
 */
export function selectSources(requested: readonly string[] | undefined): PaperSource[] {
  if (!requested || requested.length === 0) return [...PAPER_SOURCES];
  const wanted = new Set(requested);
  return PAPER_SOURCES.filter((source) => wanted.has(source.name));
}

/** One-line listing for tool descriptions, e.g. "openalex, ..., lens (API key)". */
export function describeSources(): string {
  return PAPER_SOURCES.map((s) => (s.requiresKey ? `${s.name} (API key)` : s.name)).join(", ");
}

export interface SearchOptions {
  config: AcademicToolsConfig;
  /** Defaults to every registered source */
  sources?: readonly PaperSource[];
  signal?: AbortSignal;
}

export interface SearchOutcome {
  /** Results of the successful sources, concatenated in source order */
  results: PaperResult[];
  /** One "name: message" entry per failed source */
  errors: string[];
}

/**
 * Query sources concurrently, at most `config.searchConcurrency` at a time.
 * A failing source is recorded and does not affect the others.
 */
export async function searchSources(
  query: string,
  limit: number,
  options: SearchOptions
): Promise<SearchOutcome> {
  const sources = options.sources ?? PAPER_SOURCES;
  const concurrency = Math.max(1, options.config.searchConcurrency);
  const perSource: Array<PaperResult[] | Error> = new Array(sources.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < sources.length) {
      const index = nextIndex++;
      const source = sources[index];
      if (!source) continue;

      try {
        const found = await source.search(query, limit, {
          config: options.config,
          signal: options.signal,
        });
        perSource[index] = found;
        log.debug({ source: source.name, count: found.length }, "source search finished");
      } catch (err) {
        perSource[index] = err instanceof Error ? err : new Error(errorMessage(err));
        log.warn({ source: source.name, err: errorMessage(err) }, "source search failed");
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, sources.length) }, () => worker());
  await Promise.all(workers);

  const results: PaperResult[] = [];
  const errors: string[] = [];
  sources.forEach((source, i) => {
    const outcome = perSource[i];
    if (outcome instanceof Error) {
      errors.push(`${source.name}: ${outcome.message}`);
    } else if (outcome) {
      results.push(...outcome);
    }
  });
  return { results, errors };
}
