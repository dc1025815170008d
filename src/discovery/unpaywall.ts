/**
 * Unpaywall OA lookup client.
 * Finds the best Open Access location for a DOI via the Unpaywall API.
 *
 * API: https://api.unpaywall.org/v2/{doi}?email={email}
 * Rate limit: 100,000 requests/day (no per-second limit documented)
 */

import { z } from "zod";
import { ConfigurationError, TransportError } from "../errors.js";
import { requestJson } from "../download/http.js";
import type { OALocation } from "../types.js";

const UNPAYWALL_BASE_URL = "https://api.unpaywall.org/v2";

const UNPAYWALL_TIMEOUT_MS = 10_000;

const optionalText = z.string().nullish().catch(null);

/** Unpaywall API response location shape */
const unpaywallLocationSchema = z.object({
  url: optionalText,
  url_for_pdf: optionalText,
  url_for_landing_page: optionalText,
  license: optionalText,
  version: optionalText,
});

type UnpaywallLocation = z.infer<typeof unpaywallLocationSchema>;

const unpaywallResponseSchema = z.object({
  is_oa: z.boolean().optional().catch(false),
  best_oa_location: unpaywallLocationSchema.nullish().catch(null),
});

export interface UnpaywallOptions {
  signal?: AbortSignal;
}

/** Map Unpaywall version strings to our OALocation version format */
function mapVersion(version: string | null | undefined): OALocation["version"] {
  switch (version) {
    case "acceptedVersion":
      return "accepted";
    case "submittedVersion":
      return "submitted";
    default:
      return "published";
  }
}

/** Convert Unpaywall's best location to an OALocation; null when it has no URL */
function toOALocation(loc: UnpaywallLocation): OALocation | null {
  const pdfUrl = loc.url_for_pdf ?? "";
  const url = pdfUrl || loc.url || loc.url_for_landing_page || "";
  if (!url) return null;

  const result: OALocation = {
    url,
    urlType: pdfUrl ? "pdf" : "html",
    version: mapVersion(loc.version),
  };
  if (loc.license) {
    result.license = loc.license;
  }
  return result;
}

/** Unpaywall API URL for a DOI. */
export function unpaywallUrl(doi: string, email: string): string {
  return `${UNPAYWALL_BASE_URL}/${encodeURIComponent(doi).replace(/%2F/gi, "/")}?email=${encodeURIComponent(email)}`;
}

/**
 * Look up the best Open Access location for a DOI.
 *
 * @param doi - The article's DOI
 * @param email - Email address required by Unpaywall API (free, no registration)
 * @returns The best OA location, or null when the article is closed or unknown (404)
 * @throws TransportError on rate limit (429), other HTTP errors, or network failure
 */
export async function lookupOpenAccess(
  doi: string,
  email: string,
  options: UnpaywallOptions = {}
): Promise<OALocation | null> {
  if (!doi) return null;

  if (!email) {
    throw new ConfigurationError("Unpaywall email is required for API access");
  }

  const url = unpaywallUrl(doi, email);
  let data: unknown;
  try {
    data = await requestJson<unknown>(url, {
      timeoutMs: UNPAYWALL_TIMEOUT_MS,
      source: "Unpaywall",
      signal: options.signal,
    });
  } catch (err) {
    if (err instanceof TransportError && err.status === 404) return null;
    if (err instanceof TransportError && err.status === 429) {
      throw new TransportError("Unpaywall rate limit exceeded", url, { status: 429, cause: err });
    }
    throw err;
  }

  // Anything that is not a lookup record reads as closed access.
  const parsed = unpaywallResponseSchema.safeParse(data);
  if (!parsed.success) return null;
  const { is_oa, best_oa_location } = parsed.data;
  if (!is_oa || !best_oa_location) return null;
  return toOALocation(best_oa_location);
}
