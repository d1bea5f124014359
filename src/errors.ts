/**
 * Error taxonomy shared by the pipeline, the orchestrator and the API layer.
 * Every error carries a stable `code` so callers can branch without
 * `instanceof` checks across module boundaries.
 */
export type ErrorCode =
  | "INVALID_URL"
  | "EXTRACTION_FAILED"
  | "NETWORK"
  | "DUPLICATE_ENTRY"
  | "MALFORMED_ENTRY"
  | "RATE_LIMITED"
  | "SOURCE_NOT_FOUND"
  | "DUPLICATE_SOURCE";

export class FeedsmithError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidURLError extends FeedsmithError {
  readonly input: string;

  constructor(input: string, options?: ErrorOptions) {
    super("INVALID_URL", `invalid URL: ${input}`, options);
    this.input = input;
  }
}

export class ExtractionError extends FeedsmithError {
  constructor(message: string, options?: ErrorOptions) {
    super("EXTRACTION_FAILED", message, options);
  }
}

export type NetworkFailureReason = "timeout" | "http" | "connection";

export class NetworkError extends FeedsmithError {
  readonly url: string;
  readonly reason: NetworkFailureReason;
  readonly status: number | null;

  constructor(
    url: string,
    reason: NetworkFailureReason,
    message: string,
    options?: ErrorOptions & { status?: number },
  ) {
    super("NETWORK", message, options);
    this.url = url;
    this.reason = reason;
    this.status = options?.status ?? null;
  }

  /** 4xx answers other than 408 and 429 will not change on retry. */
  get retryable(): boolean {
    if (this.reason !== "http" || this.status === null) return true;
    if (this.status === 408 || this.status === 429) return true;
    return this.status >= 500;
  }
}

export class DuplicateEntryError extends FeedsmithError {
  readonly canonicalUrl: string;

  constructor(canonicalUrl: string, existing: string) {
    super("DUPLICATE_ENTRY", `${canonicalUrl} duplicates ${existing}`);
    this.canonicalUrl = canonicalUrl;
  }
}

export class MalformedEntryError extends FeedsmithError {
  constructor(message: string, options?: ErrorOptions) {
    super("MALFORMED_ENTRY", message, options);
  }
}

export class RateLimitExceeded extends FeedsmithError {
  readonly origin: string;
  readonly retryAfterMs: number;

  constructor(origin: string, retryAfterMs: number) {
    super("RATE_LIMITED", `rate limit for ${origin}, retry in ${retryAfterMs}ms`);
    this.origin = origin;
    this.retryAfterMs = retryAfterMs;
  }
}

export class SourceNotFoundError extends FeedsmithError {
  constructor(name: string) {
    super("SOURCE_NOT_FOUND", `source '${name}' not found`);
  }
}

export class DuplicateSourceError extends FeedsmithError {
  constructor(message: string) {
    super("DUPLICATE_SOURCE", message);
  }
}

const MAX_REASON_LENGTH = 100;

/**
 * Short, human-readable failure reason recorded on a source after a
 * failed refresh.
 */
export function describeError(err: unknown): string {
  if (err instanceof NetworkError) {
    switch (err.reason) {
      case "timeout":
        return "request timed out";
      case "connection":
        return "site unreachable";
      case "http":
        if (err.status === 404) return "not found (404)";
        if (err.status === 401 || err.status === 403) {
          return "access denied (401/403)";
        }
        if (err.status !== null && err.status >= 500) {
          return `server error (${err.status})`;
        }
        return err.status !== null ? `HTTP error (${err.status})` : "HTTP error";
    }
  }

  if (err instanceof InvalidURLError) return "invalid URL";

  const message = err instanceof Error ? err.message : String(err);
  return message.slice(0, MAX_REASON_LENGTH);
}
