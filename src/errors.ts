import type { ScrapeOutcome } from "./types/BusinessRecord";

export const ERROR_CODES = {
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  FETCH_TIMEOUT: "FETCH_TIMEOUT",
  NAVIGATION_FAILED: "NAVIGATION_FAILED",
  STRUCTURE_CHANGED: "STRUCTURE_CHANGED",
  DETAIL_FETCH_FAILED: "DETAIL_FETCH_FAILED",
  EXPORT_FAILED: "EXPORT_FAILED"
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for every error the scraper raises on purpose.
 * Anything else reaching the pipeline is treated as a bug.
 */
export class ScraperError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends ScraperError {
  constructor(message: string) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message);
  }
}

export class FetchTimeoutError extends ScraperError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(
      ERROR_CODES.FETCH_TIMEOUT,
      `Timed out after ${timeoutMs}ms loading ${url}`,
      options
    );
  }
}

export class NavigationError extends ScraperError {
  constructor(readonly url: string, reason: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.NAVIGATION_FAILED, `Failed to load ${url}: ${reason}`, options);
  }
}

/** The search results container is gone: the site layout changed. */
export class StructuralError extends ScraperError {
  /** Set by the pipeline once the partial outcome has been exported. */
  outcome?: ScrapeOutcome;

  constructor(readonly selector: string, message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.STRUCTURE_CHANGED, message, options);
  }
}

export class DetailFetchError extends ScraperError {
  constructor(
    readonly reference: string | null,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      ERROR_CODES.DETAIL_FETCH_FAILED,
      `Detail page ${reference ?? "(no link)"} failed: ${reason}`,
      options
    );
  }
}

export class ExportError extends ScraperError {
  /** The failure that ended the run before the export was attempted, if any. */
  runFailure?: unknown;

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(
      ERROR_CODES.EXPORT_FAILED,
      `Could not write ${path}: ${toErrorMessage(options?.cause)}`,
      options
    );
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
