// pattern: Functional Core
import * as cheerio from "cheerio";
import { ExtractionError } from "../errors";
import {
  BOILERPLATE_TAGS,
  attribute,
  collapseWhitespace,
  elementChildren,
  findAll,
  findFirst,
  isElement,
  parseHtml,
  resolveHref,
  textContent,
  walkElements,
} from "./html-tree";
import type { HtmlElement } from "./html-tree";
import type {
  ExtractedItem,
  ExtractionResult,
  ExtractionStrategy,
} from "./types";

export type ExtractorOptions = {
  readonly strategy?: ExtractionStrategy;
  /** CSS selector for article blocks; tried before auto detection. */
  readonly selector?: string | null;
  /** Minimum repeated siblings for a page to count as a listing. */
  readonly listingThreshold?: number;
  readonly minTitleLength?: number;
  readonly maxItems?: number;
  readonly maxSummaryLength?: number;
  /** Weight of link text subtracted from an element's score. */
  readonly linkPenalty?: number;
  /** Timestamp given to items without a machine-readable date. */
  readonly now?: Date;
};

export const DEFAULT_EXTRACTOR_OPTIONS = {
  listingThreshold: 5,
  minTitleLength: 10,
  maxItems: 50,
  maxSummaryLength: 500,
  linkPenalty: 2,
} as const;

const MAX_TITLE_LENGTH = 200;
const SHAPE_DEPTH = 3;

const STRUCTURAL_TAGS: ReadonlySet<string> = new Set(["html", "head", "body"]);

const HEADING_TAGS: ReadonlyArray<string> = ["h1", "h2", "h3", "h4"];

/** Tags whose text counts towards the parent's content score. */
const INLINE_CONTENT_TAGS: ReadonlySet<string> = new Set([
  "p", "span", "em", "strong", "b", "i", "u", "a", "code", "pre",
  "blockquote", "small", "mark", "sub", "sup", "abbr", "cite", "q", "br",
]);

const DATE_META_NAMES: ReadonlySet<string> = new Set([
  "article:published_time",
  "og:published_time",
  "date",
  "pubdate",
  "publishdate",
  "publish_date",
  "publication_date",
  "dc.date",
  "dc.date.issued",
  "dcterms.created",
  "datepublished",
  "sailthru.date",
  "parsely-pub-date",
]);

type ResolvedOptions = {
  readonly listingThreshold: number;
  readonly minTitleLength: number;
  readonly maxItems: number;
  readonly maxSummaryLength: number;
  readonly linkPenalty: number;
  readonly now: Date;
};

function resolveOptions(options?: ExtractorOptions): ResolvedOptions {
  return {
    listingThreshold:
      options?.listingThreshold ?? DEFAULT_EXTRACTOR_OPTIONS.listingThreshold,
    minTitleLength:
      options?.minTitleLength ?? DEFAULT_EXTRACTOR_OPTIONS.minTitleLength,
    maxItems: options?.maxItems ?? DEFAULT_EXTRACTOR_OPTIONS.maxItems,
    maxSummaryLength:
      options?.maxSummaryLength ?? DEFAULT_EXTRACTOR_OPTIONS.maxSummaryLength,
    linkPenalty: options?.linkPenalty ?? DEFAULT_EXTRACTOR_OPTIONS.linkPenalty,
    now: options?.now ?? new Date(),
  };
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

// ---------- Listing mode ----------

type Candidate = {
  readonly block: HtmlElement;
  readonly url: string;
  readonly title: string;
};

type CandidateGroup = {
  readonly candidates: ReadonlyArray<Candidate>;
};

/**
 * Structural fingerprint of an element: its tag plus the sorted set of
 * descendant tag names down to SHAPE_DEPTH levels.
 */
export function shapeOf(element: HtmlElement): string {
  const tags = new Set<string>();
  const collect = (current: HtmlElement, depth: number): void => {
    if (depth > SHAPE_DEPTH) return;
    for (const child of elementChildren(current)) {
      tags.add(child.tagName);
      collect(child, depth + 1);
    }
  };
  collect(element, 1);
  return `${element.tagName}|${[...tags].sort().join(",")}`;
}

/**
 * The block's single outbound link with a title-length anchor text, or null
 * when it has none or several distinct ones.
 */
function candidateOf(
  block: HtmlElement,
  pageUrl: string,
  minTitleLength: number,
): Candidate | null {
  const titled = new Map<string, string>();
  for (const anchor of findAll(block, (el) => el.tagName === "a")) {
    const href = attribute(anchor, "href");
    if (href === null) continue;
    const url = resolveHref(href, pageUrl);
    if (url === null) continue;
    const text = textContent(anchor);
    if (text.length < minTitleLength) continue;
    if (!titled.has(url)) titled.set(url, text);
  }
  if (titled.size !== 1) return null;
  const [entry] = titled;
  if (!entry) return null;
  const [url, title] = entry;
  return { block, url, title: truncate(title, MAX_TITLE_LENGTH) };
}

/**
 * Groups repeated sibling structures that each carry exactly one titled
 * link. Boilerplate subtrees are never searched.
 */
export function findCandidateGroups(
  root: HtmlElement,
  pageUrl: string,
  minTitleLength: number,
): Array<CandidateGroup> {
  const groups: Array<CandidateGroup> = [];

  walkElements(root, (element) => {
    if (BOILERPLATE_TAGS.has(element.tagName)) return false;

    const byShape = new Map<string, Array<Candidate>>();
    for (const child of elementChildren(element)) {
      if (BOILERPLATE_TAGS.has(child.tagName)) continue;
      const candidate = candidateOf(child, pageUrl, minTitleLength);
      if (!candidate) continue;
      const shape = shapeOf(child);
      const bucket = byShape.get(shape);
      if (bucket) bucket.push(candidate);
      else byShape.set(shape, [candidate]);
    }
    for (const candidates of byShape.values()) {
      groups.push({ candidates });
    }
    return true;
  });

  return groups;
}

function largestGroup(
  groups: ReadonlyArray<CandidateGroup>,
): CandidateGroup | null {
  let best: CandidateGroup | null = null;
  for (const group of groups) {
    if (!best || group.candidates.length > best.candidates.length) {
      best = group;
    }
  }
  return best;
}

function firstTimestamp(block: HtmlElement): Date | null {
  const time = findFirst(
    block,
    (el) => el.tagName === "time" && attribute(el, "datetime") !== null,
  );
  return time ? parseDate(attribute(time, "datetime")) : null;
}

function itemsFromCandidates(
  candidates: ReadonlyArray<Candidate>,
  options: ResolvedOptions,
): Array<ExtractedItem> {
  const seen = new Set<string>();
  const items: Array<ExtractedItem> = [];
  for (const candidate of candidates) {
    if (items.length >= options.maxItems) break;
    if (seen.has(candidate.url)) continue;
    seen.add(candidate.url);
    items.push({
      url: candidate.url,
      title: candidate.title,
      publishedAt: firstTimestamp(candidate.block) ?? options.now,
      summary: truncate(textContent(candidate.block), options.maxSummaryLength),
    });
  }
  return items;
}

// ---------- Single-article mode ----------

type Scored = {
  readonly element: HtmlElement;
  readonly score: number;
};

/**
 * Density score: the element's own text (direct text and inline children)
 * minus a penalty for the share of it that is link text. Boilerplate
 * elements and anything inside them score below zero.
 */
export function scoreElements(
  root: HtmlElement,
  linkPenalty: number = DEFAULT_EXTRACTOR_OPTIONS.linkPenalty,
): Array<Scored> {
  const scored: Array<Scored> = [];

  walkElements(root, (element, ancestors) => {
    let textLength = 0;
    let linkLength = 0;
    for (const child of element.children) {
      if (!isElement(child)) {
        textLength += collapseWhitespace(child.text).length;
        continue;
      }
      if (!INLINE_CONTENT_TAGS.has(child.tagName)) continue;
      const text = textContent(child);
      textLength += text.length;
      if (child.tagName === "a") {
        linkLength += text.length;
      } else {
        for (const anchor of findAll(child, (el) => el.tagName === "a")) {
          linkLength += textContent(anchor).length;
        }
      }
    }

    const boilerplate =
      BOILERPLATE_TAGS.has(element.tagName) ||
      ancestors.some((ancestor) => BOILERPLATE_TAGS.has(ancestor.tagName));
    const score = boilerplate
      ? -textLength - 1
      : textLength - linkPenalty * linkLength;

    scored.push({ element, score });
    return true;
  });

  return scored;
}

function bestContentElement(
  root: HtmlElement,
  linkPenalty: number,
): HtmlElement | null {
  let best: Scored | null = null;
  for (const entry of scoreElements(root, linkPenalty)) {
    if (STRUCTURAL_TAGS.has(entry.element.tagName)) continue;
    if (entry.score <= 0) continue;
    if (!best || entry.score > best.score) best = entry;
  }
  return best ? best.element : null;
}

function documentTitle(root: HtmlElement): string | null {
  const title = findFirst(root, (el) => el.tagName === "title");
  const titleText = title ? textContent(title) : "";
  if (titleText) return titleText;

  for (const tag of HEADING_TAGS.slice(0, 3)) {
    const heading = findFirst(root, (el) => el.tagName === tag);
    const text = heading ? textContent(heading) : "";
    if (text) return text;
  }
  return null;
}

/**
 * First machine-readable date in document order among `<time datetime>`
 * elements and date-like `<meta>` tags.
 */
export function publicationDate(root: HtmlElement): Date | null {
  let found: Date | null = null;
  walkElements(root, (element) => {
    if (found) return false;
    let candidate: string | null = null;
    if (element.tagName === "time") {
      candidate = attribute(element, "datetime");
    } else if (element.tagName === "meta") {
      const key = (
        attribute(element, "property") ??
        attribute(element, "name") ??
        attribute(element, "itemprop") ??
        ""
      ).toLowerCase();
      if (DATE_META_NAMES.has(key)) candidate = attribute(element, "content");
    }
    const parsed = parseDate(candidate);
    if (parsed) {
      found = parsed;
      return false;
    }
    return true;
  });
  return found;
}

function extractArticle(
  root: HtmlElement,
  pageUrl: string,
  options: ResolvedOptions,
): ExtractedItem {
  const content = bestContentElement(root, options.linkPenalty);
  const body = content
    ? textContent(content, { exclude: BOILERPLATE_TAGS })
    : "";
  return {
    url: pageUrl,
    title: truncate(documentTitle(root) ?? pageUrl, MAX_TITLE_LENGTH),
    publishedAt: publicationDate(root) ?? options.now,
    summary: truncate(body, options.maxSummaryLength),
  };
}

// ---------- Selector mode ----------

function itemFromBlock(
  block: HtmlElement,
  pageUrl: string,
  options: ResolvedOptions,
): ExtractedItem | null {
  const heading = findFirst(block, (el) => HEADING_TAGS.includes(el.tagName));
  const anchor = findFirst(
    block,
    (el) => el.tagName === "a" && attribute(el, "href") !== null,
  );
  const title = textContent(heading ?? anchor ?? block);
  if (title.length < 5) return null;

  const href = anchor ? attribute(anchor, "href") : attribute(block, "href");
  const url = href !== null ? resolveHref(href, pageUrl) : null;
  if (url === null) return null;

  return {
    url,
    title: truncate(title, MAX_TITLE_LENGTH),
    publishedAt: firstTimestamp(block) ?? options.now,
    summary: truncate(textContent(block), options.maxSummaryLength),
  };
}

function extractWithSelector(
  html: string,
  selector: string,
  pageUrl: string,
  options: ResolvedOptions,
): Array<ExtractedItem> {
  const $ = cheerio.load(html);
  let matched: Array<string>;
  try {
    matched = $(selector)
      .toArray()
      .slice(0, options.maxItems)
      .map((el) => $.html(el));
  } catch {
    // an invalid selector degrades to auto detection
    return [];
  }

  const seen = new Set<string>();
  const items: Array<ExtractedItem> = [];
  for (const fragment of matched) {
    const block = findFirst(
      parseHtml(fragment),
      (el) => !STRUCTURAL_TAGS.has(el.tagName),
    );
    if (!block) continue;
    const item = itemFromBlock(block, pageUrl, options);
    if (!item || seen.has(item.url)) continue;
    seen.add(item.url);
    items.push(item);
  }
  return items;
}

// ---------- Entry point ----------

function hasMarkup(root: HtmlElement): boolean {
  return (
    findFirst(root, (el) => !STRUCTURAL_TAGS.has(el.tagName)) !== null
  );
}

/**
 * Extracts article items from a page.
 *
 * A pinned `listing` or `article` strategy skips mode detection; `auto`
 * picks listing mode when the largest group of repeated, link-bearing
 * siblings reaches `listingThreshold`. With a `selector`, matching blocks
 * are tried first. Item URLs are absolute but not yet canonical.
 *
 * @throws ExtractionError when the document holds no markup at all
 */
export function extractItems(
  pageUrl: string,
  html: string,
  options?: ExtractorOptions,
): ExtractionResult {
  const resolved = resolveOptions(options);
  const root = parseHtml(html);
  if (!hasMarkup(root)) {
    throw new ExtractionError(`no markup found in document from ${pageUrl}`);
  }

  if (options?.selector) {
    const items = extractWithSelector(html, options.selector, pageUrl, resolved);
    if (items.length > 0) return { mode: "selector", items };
  }

  const strategy = options?.strategy ?? "auto";
  if (strategy !== "article") {
    const group = largestGroup(
      findCandidateGroups(root, pageUrl, resolved.minTitleLength),
    );
    const size = group ? group.candidates.length : 0;
    if (group && (strategy === "listing" || size >= resolved.listingThreshold)) {
      return {
        mode: "listing",
        items: itemsFromCandidates(group.candidates, resolved),
      };
    }
    if (strategy === "listing") return { mode: "listing", items: [] };
  }

  return { mode: "article", items: [extractArticle(root, pageUrl, resolved)] };
}
