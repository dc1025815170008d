/**
 * Crossref work lookup by DOI.
 *
 * API: https://api.crossref.org/works/{doi}[?mailto={email}]
 */

import { z } from "zod";
import { requestJson } from "../download/http.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";

const log = createChildLogger({ module: "crossref" });

const CROSSREF_WORKS_URL = "https://api.crossref.org/works";

const CROSSREF_TIMEOUT_MS = 10_000;

/** Crossref author entry */
export interface CrossrefAuthor {
  given?: string;
  family?: string;
  name?: string;
}

/** Crossref date ("date-parts": [[2020, 5, 17]]) */
export interface CrossrefDate {
  "date-parts"?: Array<Array<number | null> | null>;
}

const crossrefDateSchema = z.object({
  "date-parts": z.array(z.array(z.number().nullable()).nullable()).optional(),
});

// A malformed field is dropped rather than rejecting the whole record.
const crossrefWorkResponseSchema = z.object({
  message: z.object({
    title: z.array(z.string()).optional().catch(undefined),
    author: z
      .array(
        z.object({
          given: z.string().optional().catch(undefined),
          family: z.string().optional().catch(undefined),
          name: z.string().optional().catch(undefined),
        })
      )
      .optional()
      .catch(undefined),
    published: crossrefDateSchema.optional().catch(undefined),
    issued: crossrefDateSchema.optional().catch(undefined),
  }),
});

/** Bibliographic metadata for one work */
export interface CrossrefWork {
  title: string;
  authors: string[];
  year: string;
}

/** "Given Family" (or the organisation name) for each author. */
export function crossrefAuthorNames(authors: CrossrefAuthor[] | undefined): string[] {
  const names: string[] = [];
  for (const a of authors ?? []) {
    const name = `${a.given ?? ""} ${a.family ?? ""}`.trim() || (a.name ?? "").trim();
    if (name) names.push(name);
  }
  return names;
}

/** First year of a Crossref date, or "". */
export function crossrefYear(date: CrossrefDate | undefined): string {
  const year = date?.["date-parts"]?.[0]?.[0];
  return typeof year === "number" && year > 0 ? String(year) : "";
}

/**
 * Fetch title, authors, and year for a DOI.
 *
 * @returns The work's metadata, or null on any failure (network, HTTP, unparseable body)
 */
export async function lookupCrossrefWork(
  doi: string,
  email: string,
  options: { signal?: AbortSignal } = {}
): Promise<CrossrefWork | null> {
  if (!doi) return null;

  let url = `${CROSSREF_WORKS_URL}/${encodeURIComponent(doi)}`;
  if (email) url += `?mailto=${encodeURIComponent(email)}`;

  let data: unknown;
  try {
    data = await requestJson<unknown>(url, {
      timeoutMs: CROSSREF_TIMEOUT_MS,
      source: "Crossref",
      signal: options.signal,
    });
  } catch (err) {
    log.debug({ doi, err: errorMessage(err) }, "Crossref lookup failed");
    return null;
  }

  const parsed = crossrefWorkResponseSchema.safeParse(data);
  if (!parsed.success) {
    log.debug({ doi }, "Crossref returned an unexpected body");
    return null;
  }
  const { message } = parsed.data;
  return {
    title: message.title?.[0] ?? "",
    authors: crossrefAuthorNames(message.author),
    year: crossrefYear(message.published ?? message.issued),
  };
}
