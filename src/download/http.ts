/**
 * HTTP transport shared by the document fetcher, metadata lookups, and
 * search sources.
 *
 * Redirects are followed manually so the hop limit can be enforced and the
 * final URL reported; every request runs under a deadline that also honors
 * the caller's abort signal.
 */

import { ParseError, TransportError, errorMessage } from "../errors.js";
import type { FetchedDocument } from "../types.js";

export const USER_AGENT = "paper-harvest/0.1.0 (academic paper tools; Node.js)";

/** Timeout for paper and citation downloads */
export const DOCUMENT_TIMEOUT_MS = 120_000;

/** Default timeout for metadata API calls */
export const API_TIMEOUT_MS = 15_000;

export const MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/** Query parameters whose values never appear in error messages */
const SECRET_PARAM_PATTERN = /([?&](?:api_key|apikey|api-key|key)=)[^&#]*/gi;

export interface RequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Source name attached to parse errors */
  source?: string;
}

interface RawResponse<T> {
  value: T;
  finalUrl: string;
  contentType: string;
}

/** Strip credentials from a URL before it is shown to anyone. */
export function redactUrl(url: string): string {
  return url.replace(SECRET_PARAM_PATTERN, "$1***");
}

function truncateBody(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

/**
 * Run `fn` with a signal that fires on timeout or when the caller aborts,
 * translating low-level failures into TransportError.
 */
async function withDeadline<T>(
  url: string,
  timeoutMs: number,
  callerSignal: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = (): void => controller.abort();
  if (callerSignal?.aborted) {
    controller.abort();
  } else {
    callerSignal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    return await fn(controller.signal);
  } catch (err) {
    if (err instanceof TransportError || err instanceof ParseError) throw err;
    const shown = redactUrl(url);
    if (callerSignal?.aborted) {
      throw new TransportError(`request aborted: ${shown}`, url, { cause: err });
    }
    if (controller.signal.aborted) {
      throw new TransportError(`request timed out after ${timeoutMs}ms: ${shown}`, url, {
        cause: err,
      });
    }
    throw new TransportError(`request failed: ${errorMessage(err)}`, url, { cause: err });
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Issue a request, following up to MAX_REDIRECTS redirects, and read the
 * successful response with `read`.
 */
async function request<T>(
  url: string,
  options: RequestOptions,
  defaultTimeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<RawResponse<T>> {
  const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;

  return withDeadline(url, timeoutMs, options.signal, async (signal) => {
    let current = url;
    let method = options.method ?? "GET";
    let body = options.body;

    for (let hop = 0; ; hop++) {
      const init: RequestInit = {
        method,
        headers: { "User-Agent": USER_AGENT, ...options.headers },
        redirect: "manual",
        signal,
      };
      if (body !== undefined) init.body = body;

      const response = await fetch(current, init);

      const location = response.headers.get("location");
      if (REDIRECT_STATUSES.has(response.status) && location) {
        await response.body?.cancel();
        if (hop >= MAX_REDIRECTS) {
          throw new TransportError(
            `stopped after ${MAX_REDIRECTS} redirects fetching ${redactUrl(url)}`,
            url,
            { status: response.status }
          );
        }
        const keepsMethod = response.status === 307 || response.status === 308;
        if (!keepsMethod && method === "POST") {
          method = "GET";
          body = undefined;
        }
        current = new URL(location, current).toString();
        continue;
      }

      if (!response.ok) {
        const detail = truncateBody((await response.text()).trim());
        throw new TransportError(
          `HTTP ${response.status} when fetching ${redactUrl(current)}${detail ? `: ${detail}` : ""}`,
          current,
          { status: response.status }
        );
      }

      return {
        value: await read(response),
        finalUrl: current,
        contentType: response.headers.get("content-type") ?? "",
      };
    }
  });
}

/**
 * Fetch a document's bytes, final URL, and declared content type.
 *
 * @throws TransportError on network failure, timeout, non-2xx, or more than
 *   MAX_REDIRECTS redirects
 */
export async function fetchDocument(
  url: string,
  options: RequestOptions = {}
): Promise<FetchedDocument> {
  const { value, finalUrl, contentType } = await request(
    url,
    options,
    DOCUMENT_TIMEOUT_MS,
    async (response) => new Uint8Array(await response.arrayBuffer())
  );
  return { body: value, finalUrl, contentType };
}

/** Fetch a text body (XML feeds and the like). */
export async function requestText(url: string, options: RequestOptions = {}): Promise<string> {
  const { value } = await request(url, options, API_TIMEOUT_MS, (response) => response.text());
  return value;
}

/**
 * Fetch and parse a JSON body.
 *
 * @throws ParseError when the body is not valid JSON
 */
export async function requestJson<T>(url: string, options: RequestOptions = {}): Promise<T> {
  const text = await requestText(url, {
    ...options,
    headers: { Accept: "application/json", ...options.headers },
  });
  try {
    return JSON.parse(text) as T;
  } catch (err) {
    const prefix = options.source ? `${options.source} ` : "";
    throw new ParseError(`${prefix}parse error: ${errorMessage(err)}`, {
      source: options.source,
      cause: err,
    });
  }
}
