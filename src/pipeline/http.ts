// pattern: Imperative Shell
import pRetry, { AbortError } from "p-retry";
import type { Logger } from "pino";
import { NetworkError } from "../errors";
import type { OriginRateLimiter } from "./rate-limiter";

export type FetchedDocument = {
  /** Final URL after redirects. */
  readonly url: string;
  readonly status: number;
  readonly contentType: string | null;
  readonly body: string;
};

export type FetchOptions = {
  readonly signal?: AbortSignal;
  /** Overrides the client's retry count; discovery probes use 0. */
  readonly retries?: number;
  readonly accept?: string;
};

export type HttpClient = {
  readonly fetchText: (
    url: string,
    options?: FetchOptions,
  ) => Promise<FetchedDocument>;
};

export type HttpClientConfig = {
  readonly limiter: OriginRateLimiter;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly userAgent: string;
  readonly logger: Logger;
  /** Base delay of the exponential backoff between attempts. */
  readonly backoffMs?: number;
};

const DEFAULT_ACCEPT =
  "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === "TimeoutError";
}

/**
 * One request with a bounded timeout. Failures come back as `NetworkError`,
 * except a cancellation by the caller, which is rethrown as is.
 */
async function attemptFetch(
  url: string,
  config: HttpClientConfig,
  accept: string,
  signal: AbortSignal | undefined,
): Promise<FetchedDocument> {
  const timeout = AbortSignal.timeout(config.timeoutMs);
  const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

  try {
    const response = await fetch(url, {
      signal: combined,
      headers: {
        "User-Agent": config.userAgent,
        Accept: accept,
      },
    });

    if (!response.ok) {
      throw new NetworkError(
        url,
        "http",
        `HTTP ${response.status}: ${response.statusText}`,
        { status: response.status },
      );
    }

    const body = await response.text();
    return {
      url: response.url || url,
      status: response.status,
      contentType: response.headers.get("content-type"),
      body,
    };
  } catch (err) {
    if (err instanceof NetworkError) throw err;
    if (signal?.aborted) throw err;
    if (isTimeout(err) || timeout.aborted) {
      throw new NetworkError(
        url,
        "timeout",
        `request to ${url} timed out after ${config.timeoutMs}ms`,
        { cause: err },
      );
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new NetworkError(url, "connection", message, { cause: err });
  }
}

/**
 * Creates the shared HTTP client. Every attempt first takes the origin's
 * rate-limit token; transient failures are retried with exponential backoff.
 */
export function createHttpClient(config: HttpClientConfig): HttpClient {
  const backoffMs = config.backoffMs ?? 1000;

  const fetchText = async (
    url: string,
    options?: FetchOptions,
  ): Promise<FetchedDocument> => {
    const signal = options?.signal;
    const accept = options?.accept ?? DEFAULT_ACCEPT;

    return pRetry(
      async () => {
        try {
          await config.limiter.acquire(url, signal);
          return await attemptFetch(url, config, accept, signal);
        } catch (err) {
          if (err instanceof NetworkError && err.retryable) throw err;
          throw new AbortError(err instanceof Error ? err : String(err));
        }
      },
      {
        retries: options?.retries ?? config.retries,
        factor: 2,
        minTimeout: backoffMs,
        maxTimeout: backoffMs * 8,
        signal,
        onFailedAttempt: (error) => {
          config.logger.warn(
            {
              url,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            },
            "fetch attempt failed",
          );
        },
      },
    );
  };

  return { fetchText };
}
