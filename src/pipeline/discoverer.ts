// pattern: Imperative Shell
import * as cheerio from "cheerio";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { FetchedDocument, HttpClient } from "./http";
import { ensureScheme, tryNormalizeUrl } from "./normalize";
import type { NormalizeOptions } from "./normalize";
import { resolveHref } from "./html-tree";

export const FEED_MIME_TYPES: ReadonlySet<string> = new Set([
  "application/rss+xml",
  "application/atom+xml",
]);

export const CONVENTIONAL_FEED_PATHS: ReadonlyArray<string> = [
  "/feed",
  "/rss",
  "/rss.xml",
  "/atom.xml",
  "/feed.xml",
  "/index.xml",
];

/** Path shapes of in-page links that usually point at a feed. */
export const FEED_LINK_PATTERNS: ReadonlyArray<RegExp> = [
  /\/(?:feed|rss|atom)\/?$/i,
  /\/(?:feed|rss|atom)\.xml$/i,
  /\/feed\/(?:rss|atom)\/?$/i,
  /\.rss$/i,
];

const MAX_LINKED_CANDIDATES = 5;

const FEED_ACCEPT =
  "application/rss+xml,application/atom+xml,application/xml;q=0.9,text/xml;q=0.8";

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  processEntities: false,
});

export type DiscoverOptions = {
  readonly signal?: AbortSignal;
  readonly probePaths?: ReadonlyArray<string>;
  readonly normalize?: NormalizeOptions;
};

export type Discovery = {
  /** Feed URLs, best first. */
  readonly feeds: Array<string>;
  /** The page as fetched during discovery, or null when it was unreachable. */
  readonly page: FetchedDocument | null;
  /** Why the page fetch failed, when it did. */
  readonly pageError: unknown;
};

/**
 * True when `body` is well-formed XML rooted at an RSS channel, an Atom
 * feed or an RDF document.
 */
export function isFeedDocument(body: string): boolean {
  const trimmed = body.trim();
  if (!trimmed.startsWith("<")) return false;
  if (XMLValidator.validate(trimmed) !== true) return false;

  let parsed: unknown;
  try {
    parsed = xmlParser.parse(trimmed);
  } catch {
    return false;
  }
  if (typeof parsed !== "object" || parsed === null) return false;

  if ("feed" in parsed || "rdf:RDF" in parsed) return true;
  if ("rss" in parsed) {
    const rss: unknown = parsed.rss;
    return typeof rss === "object" && rss !== null && "channel" in rss;
  }
  return false;
}

/**
 * Feed URLs advertised by `<link rel="alternate">` in the document head,
 * absolute, in document order and without duplicates.
 */
export function findAlternateFeeds(
  html: string,
  pageUrl: string,
  normalize?: NormalizeOptions,
): Array<string> {
  const $ = cheerio.load(html);
  const found: Array<string> = [];
  const seen = new Set<string>();

  $("head link[rel][href]").each((_, el) => {
    const rel = ($(el).attr("rel") ?? "").toLowerCase().split(/\s+/);
    const type = ($(el).attr("type") ?? "").toLowerCase().split(";")[0]?.trim() ?? "";
    if (!rel.includes("alternate") || !FEED_MIME_TYPES.has(type)) return;

    const resolved = resolveHref($(el).attr("href") ?? "", pageUrl);
    if (resolved === null) return;
    const key = tryNormalizeUrl(resolved, normalize) ?? resolved;
    if (seen.has(key)) return;
    seen.add(key);
    found.push(resolved);
  });

  return found;
}

/**
 * Same-origin anchors whose path looks like a feed (`/feed`, `/rss.xml`,
 * `/news/rss`, `*.rss`), absolute, in document order and without duplicates.
 */
export function findLinkedFeeds(
  html: string,
  pageUrl: string,
  normalize?: NormalizeOptions,
): Array<string> {
  const $ = cheerio.load(html);
  const origin = new URL(pageUrl).origin;
  const found: Array<string> = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const resolved = resolveHref($(el).attr("href") ?? "", pageUrl);
    if (resolved === null) return;
    const target = new URL(resolved);
    if (target.origin !== origin) return;
    if (!FEED_LINK_PATTERNS.some((pattern) => pattern.test(target.pathname))) return;

    const key = tryNormalizeUrl(resolved, normalize) ?? resolved;
    if (seen.has(key)) return;
    seen.add(key);
    found.push(resolved);
  });

  return found;
}

/** Fetches each candidate once, without retry, keeping those that serve feed XML. */
async function acceptFeeds(
  candidates: ReadonlyArray<string>,
  http: HttpClient,
  signal: AbortSignal | undefined,
): Promise<Array<string>> {
  const accepted: Array<string> = [];
  for (const candidate of candidates) {
    if (signal?.aborted) break;
    try {
      const response = await http.fetchText(candidate, {
        signal,
        retries: 0,
        accept: FEED_ACCEPT,
      });
      if (isFeedDocument(response.body)) accepted.push(candidate);
    } catch {
      continue;
    }
  }
  return accepted;
}

/**
 * Candidate feed URLs for a page, best first. Never rejects: an empty list
 * means nothing was found (or nothing was reachable).
 */
export async function discoverFeeds(
  pageUrl: string,
  http: HttpClient,
  options?: DiscoverOptions,
): Promise<Array<string>> {
  const discovery = await discoverPage(pageUrl, http, options);
  return discovery.feeds;
}

/**
 * Discovery that also hands back the fetched page, so a caller falling back
 * to extraction does not fetch it again.
 *
 * The page is fetched once and its head scanned for alternate links. When
 * it advertises none, same-origin links that look like feeds are tried,
 * then a few conventional paths on the origin. Each of those gets one
 * request and is kept only if it answers with feed XML.
 */
export async function discoverPage(
  pageUrl: string,
  http: HttpClient,
  options?: DiscoverOptions,
): Promise<Discovery> {
  const signal = options?.signal;
  const normalize = options?.normalize;
  let target: string;
  try {
    target = new URL(ensureScheme(pageUrl)).href;
  } catch (err) {
    return { feeds: [], page: null, pageError: err };
  }

  let page: FetchedDocument | null = null;
  let pageError: unknown = null;
  const tried = new Set<string>();
  try {
    page = await http.fetchText(target, { signal });
    const advertised = findAlternateFeeds(page.body, page.url, normalize);
    if (advertised.length > 0) return { feeds: advertised, page, pageError };

    const linked = findLinkedFeeds(page.body, page.url, normalize).slice(
      0,
      MAX_LINKED_CANDIDATES,
    );
    for (const url of linked) tried.add(url);
    const accepted = await acceptFeeds(linked, http, signal);
    if (accepted.length > 0) return { feeds: accepted, page, pageError };
  } catch (err) {
    pageError = err;
    if (signal?.aborted) return { feeds: [], page, pageError };
    // an unreachable page may still sit on an origin that serves a feed
  }

  const origin = new URL(target).origin;
  const probes = (options?.probePaths ?? CONVENTIONAL_FEED_PATHS)
    .map((path) => new URL(path, origin).href)
    .filter((url) => !tried.has(url));
  const feeds = await acceptFeeds(probes, http, signal);
  return { feeds, page, pageError };
}
