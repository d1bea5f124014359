// pattern: Functional Core
import { InvalidURLError } from "../errors";

/**
 * Query parameters that only carry campaign or click tracking. Entries
 * ending in `*` match by prefix.
 */
export const DEFAULT_TRACKING_PARAMS: ReadonlyArray<string> = [
  "utm_*",
  "fbclid",
  "gclid",
  "dclid",
  "gbraid",
  "wbraid",
  "msclkid",
  "yclid",
  "igshid",
  "mc_cid",
  "mc_eid",
  "_hsenc",
  "_hsmi",
  "mkt_tok",
];

export type NormalizeOptions = {
  readonly trackingParams?: ReadonlyArray<string>;
};

const DEFAULT_PORTS: Readonly<Record<string, string>> = {
  "http:": "80",
  "https:": "443",
};

function isTrackingParam(key: string, patterns: ReadonlyArray<string>): boolean {
  const lower = key.toLowerCase();
  return patterns.some((pattern) =>
    pattern.endsWith("*")
      ? lower.startsWith(pattern.slice(0, -1))
      : lower === pattern,
  );
}

/**
 * Canonical string form of a URL, used as the identity of items and sources.
 * Two URLs are duplicates iff their canonical forms are equal.
 *
 * Lower-cases scheme and host, drops default ports, tracking parameters and
 * the fragment, sorts the remaining query by key and strips a trailing slash
 * from any path other than `/`.
 *
 * @throws InvalidURLError when the input cannot be parsed as an absolute URL
 */
export function normalizeUrl(input: string, options?: NormalizeOptions): string {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch (err) {
    throw new InvalidURLError(input, { cause: err });
  }

  const patterns = options?.trackingParams ?? DEFAULT_TRACKING_PARAMS;

  // WHATWG URL already lower-cases these and drops default ports; special
  // schemes are handled here for URLs built by hand with an explicit port.
  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();
  if (DEFAULT_PORTS[url.protocol] === url.port) {
    url.port = "";
  }

  const kept = [...url.searchParams.entries()]
    .filter(([key]) => !isTrackingParam(key, patterns))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  url.search = new URLSearchParams(kept).toString();

  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "") || "/";
  }

  url.hash = "";
  return url.href;
}

/** True when both URLs normalize to the same canonical form. */
export function isSameUrl(
  a: string,
  b: string,
  options?: NormalizeOptions,
): boolean {
  return normalizeUrl(a, options) === normalizeUrl(b, options);
}

/**
 * Like `normalizeUrl` but returns `null` instead of throwing, for callers
 * that drop unusable URLs rather than fail.
 */
export function tryNormalizeUrl(
  input: string,
  options?: NormalizeOptions,
): string | null {
  try {
    return normalizeUrl(input, options);
  } catch {
    return null;
  }
}

/** Prefixes `https://` when the input has no scheme, as users type hosts bare. */
export function ensureScheme(input: string): string {
  const trimmed = input.trim();
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/** `scheme://host[:port]`, the unit of rate limiting. */
export function originOf(input: string): string {
  try {
    return new URL(input).origin;
  } catch (err) {
    throw new InvalidURLError(input, { cause: err });
  }
}
