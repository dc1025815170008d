/**
 * Error hierarchy.
 *
 * Transport and parse failures of a single collaborator (one search source,
 * one citation lookup) are caught where they happen; only missing input and
 * whole-operation failures reach the caller as error results.
 */

/** Base class for errors raised by this package. */
export class PaperHarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Network failure, timeout, non-2xx status, or redirect limit.
 */
export class TransportError extends PaperHarvestError {
  readonly url: string;
  readonly status: number | undefined;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown }) {
    super(message, options);
    this.url = url;
    this.status = options?.status;
  }
}

/**
 * Malformed upstream response body.
 */
export class ParseError extends PaperHarvestError {
  readonly source: string | undefined;

  constructor(message: string, options?: { source?: string; cause?: unknown }) {
    super(message, options);
    this.source = options?.source;
  }
}

/**
 * Missing or invalid required input; raised before any network activity.
 */
export class ConfigurationError extends PaperHarvestError {}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
