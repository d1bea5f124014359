// pattern: Functional Core
import type { Item, Source } from "./types";

export type RssChannel = {
  readonly title: string;
  readonly link: string;
  readonly description: string;
  readonly language?: string;
  /** Public URL of this feed, emitted as `atom:link rel="self"`. */
  readonly selfUrl?: string | null;
  readonly buildDate: Date;
};

export function escapeXml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Drops characters XML 1.0 does not allow, which scraped text sometimes carries. */
function stripInvalidXmlChars(input: string): string {
  return input.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g, "");
}

function text(value: string): string {
  return escapeXml(stripInvalidXmlChars(value));
}

function renderItem(item: Item): string {
  return [
    "    <item>",
    `      <title>${text(item.title)}</title>`,
    `      <link>${text(item.url)}</link>`,
    `      <description>${text(item.summary)}</description>`,
    `      <guid isPermaLink="true">${text(item.url)}</guid>`,
    `      <pubDate>${item.publishedAt.toUTCString()}</pubDate>`,
    "    </item>",
  ].join("\n");
}

/**
 * Serializes items as an RSS 2.0 document. Items are written in the order
 * given; ordering and deduplication belong to `synthesizeFeed`.
 */
export function renderRss(
  channel: RssChannel,
  items: ReadonlyArray<Item>,
): string {
  const head = [
    `    <title>${text(channel.title)}</title>`,
    `    <link>${text(channel.link)}</link>`,
    `    <description>${text(channel.description)}</description>`,
    channel.language ? `    <language>${text(channel.language)}</language>` : "",
    `    <lastBuildDate>${channel.buildDate.toUTCString()}</lastBuildDate>`,
    channel.selfUrl
      ? `    <atom:link href="${text(channel.selfUrl)}" rel="self" type="application/rss+xml" />`
      : "",
  ].filter(Boolean);

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">',
    "  <channel>",
    ...head,
    ...items.map(renderItem),
    "  </channel>",
    "</rss>",
    "",
  ].join("\n");
}

export type SourceFeedOptions = {
  readonly baseUrl?: string | null;
  readonly language?: string;
  readonly now?: Date;
};

/** Public path of a source's generated feed. */
export function feedPath(sourceName: string): string {
  return `/feed/${encodeURIComponent(sourceName)}.xml`;
}

/**
 * RSS for one source. A source without items gets a single placeholder
 * entry pointing at its page, so readers show why the feed is empty.
 */
export function renderSourceFeed(
  source: Source,
  items: ReadonlyArray<Item>,
  options?: SourceFeedOptions,
): string {
  const now = options?.now ?? new Date();
  const entries: ReadonlyArray<Item> =
    items.length > 0
      ? items
      : [
          {
            url: source.url,
            title: "No articles found",
            publishedAt: source.lastRefreshAt ?? now,
            summary: "No articles could be extracted from this page yet.",
            sourceName: source.name,
          },
        ];

  const baseUrl = options?.baseUrl?.replace(/\/+$/, "");
  return renderRss(
    {
      title: source.name,
      link: source.url,
      description: source.category ?? source.url,
      language: options?.language,
      selfUrl: baseUrl ? `${baseUrl}${feedPath(source.name)}` : null,
      buildDate: now,
    },
    entries,
  );
}
