import Parser from "rss-parser";
import type { Logger } from "pino";
import { describeError } from "../errors";
import type { HttpClient } from "./http";
import { resolveHref } from "./html-tree";
import type { ExtractedItem } from "./types";

type CustomItem = {
  dcDate?: string;
};

export type FeedParser = Pick<
  Parser<Record<string, unknown>, CustomItem>,
  "parseString"
>;

export type PollResult = {
  readonly sourceName: string;
  readonly items: ReadonlyArray<ExtractedItem>;
  readonly error: string | null;
};

export type PollOptions = {
  readonly signal?: AbortSignal;
  readonly maxSummaryLength?: number;
  readonly now?: Date;
};

let parserInstance: FeedParser | null = null;

export function createParser(): Parser<Record<string, unknown>, CustomItem> {
  return new Parser<Record<string, unknown>, CustomItem>({
    customFields: {
      item: [["dc:date", "dcDate"]],
    },
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

function firstDate(...values: ReadonlyArray<string | undefined>): Date | null {
  for (const value of values) {
    if (!value) continue;
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  return null;
}

/**
 * Pulls a native RSS/Atom feed through the shared HTTP client and maps its
 * entries to extracted items. Entries without a usable link are skipped.
 * Failures are reported in `error`, never thrown, except cancellation.
 */
export async function pollFeed(
  sourceName: string,
  feedUrl: string,
  http: HttpClient,
  logger: Logger,
  options?: PollOptions,
): Promise<PollResult> {
  const now = options?.now ?? new Date();
  const maxSummaryLength = options?.maxSummaryLength ?? 500;

  try {
    const response = await http.fetchText(feedUrl, {
      signal: options?.signal,
      accept: "application/rss+xml,application/atom+xml,application/xml;q=0.9",
    });
    const feed = await getParserInstance().parseString(response.body);

    const items: Array<ExtractedItem> = [];
    for (const item of feed.items) {
      const link = item.link ?? item.guid;
      const url = link ? resolveHref(link, response.url) : null;
      if (url === null) continue;

      const summary = item.contentSnippet ?? item.summary ?? item.content ?? "";
      items.push({
        url,
        title: (item.title ?? url).trim(),
        publishedAt: firstDate(item.isoDate, item.pubDate, item.dcDate) ?? now,
        summary: summary.trim().slice(0, maxSummaryLength),
      });
    }

    logger.info({ sourceName, itemCount: items.length }, "feed polled successfully");
    return { sourceName, items, error: null };
  } catch (err) {
    if (options?.signal?.aborted) throw err;
    const message = describeError(err);
    logger.error({ sourceName, feedUrl, error: message }, "feed poll failed");
    return { sourceName, items: [], error: message };
  }
}
