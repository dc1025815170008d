/**
 * Search source contract.
 */

import type { AcademicToolsConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { PaperResult } from "../types.js";

export const SOURCE_NAMES = [
  "openalex",
  "arxiv",
  "plos",
  "crossref",
  "doaj",
  "dblp",
  "pubmed",
  "semantic_scholar",
  "springer",
  "ieee",
  "elsevier",
  "lens",
] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface SourceSearchContext {
  config: AcademicToolsConfig;
  signal?: AbortSignal;
}

/** One academic search API behind a uniform contract. */
export interface PaperSource {
  name: SourceName;
  /** Label shown in results, e.g. "Semantic Scholar" */
  label: string;
  /** Needs an API key from configuration */
  requiresKey?: boolean;
  search(query: string, limit: number, context: SourceSearchContext): Promise<PaperResult[]>;
}

/** @throws ConfigurationError when the source's API key is not configured */
export function requireApiKey(key: string): string {
  if (!key) throw new ConfigurationError("no API key configured");
  return key;
}

/** First four characters of a date string, when it has them. */
export function yearPrefix(date: string | undefined | null): string {
  return date && date.length >= 4 ? date.slice(0, 4) : "";
}

/** Year number to string; 0 or missing gives "". */
export function yearString(year: number | undefined | null): string {
  return year && year > 0 ? String(year) : "";
}
