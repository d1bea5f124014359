import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { NetworkError } from "../errors";
import { rssDocument } from "../test-utils/pages";
import * as pollerModule from "./poller";
import type { FetchedDocument, HttpClient } from "./http";

const FEED_URL = "https://example.com/rss";
const NOW = new Date("2024-06-01T12:00:00Z");

function fakeHttp(body = "<rss/>"): HttpClient {
  const document: FetchedDocument = {
    url: FEED_URL,
    status: 200,
    contentType: "application/rss+xml",
    body,
  };
  return { fetchText: vi.fn().mockResolvedValue(document) };
}

describe("pollFeed", () => {
  const logger = pino({ level: "silent" });

  beforeEach(() => {
    pollerModule.resetParser();
  });

  afterEach(() => {
    pollerModule.resetParser();
  });

  it("should map feed entries to items", async () => {
    pollerModule.setParserInstance({
      parseString: vi.fn().mockResolvedValue({
        items: [
          {
            title: "  First Article ",
            link: "/posts/1",
            isoDate: "2024-05-01T10:00:00.000Z",
            contentSnippet: "Snippet text",
          },
        ],
      }),
    });

    const result = await pollerModule.pollFeed("example", FEED_URL, fakeHttp(), logger, {
      now: NOW,
    });

    expect(result).toEqual({
      sourceName: "example",
      error: null,
      items: [
        {
          url: "https://example.com/posts/1",
          title: "First Article",
          publishedAt: new Date("2024-05-01T10:00:00.000Z"),
          summary: "Snippet text",
        },
      ],
    });
  });

  it("should fall back to guid, other date fields and the poll time", async () => {
    pollerModule.setParserInstance({
      parseString: vi.fn().mockResolvedValue({
        items: [
          { guid: "https://example.com/a", title: "A", pubDate: "Mon, 01 Jan 2024 00:00:00 GMT" },
          { link: "https://example.com/b", title: "B", dcDate: "2024-02-01T00:00:00Z" },
          { link: "https://example.com/c", title: "C", summary: "sum" },
          { title: "no link at all" },
        ],
      }),
    });

    const result = await pollerModule.pollFeed("example", FEED_URL, fakeHttp(), logger, {
      now: NOW,
    });

    expect(result.items.map((i) => [i.url, i.publishedAt.toISOString(), i.summary])).toEqual([
      ["https://example.com/a", "2024-01-01T00:00:00.000Z", ""],
      ["https://example.com/b", "2024-02-01T00:00:00.000Z", ""],
      ["https://example.com/c", NOW.toISOString(), "sum"],
    ]);
  });

  it("should truncate summaries", async () => {
    pollerModule.setParserInstance({
      parseString: vi.fn().mockResolvedValue({
        items: [{ link: "https://example.com/a", title: "A", content: "abcdefghij" }],
      }),
    });

    const result = await pollerModule.pollFeed("example", FEED_URL, fakeHttp(), logger, {
      maxSummaryLength: 4,
    });

    expect(result.items[0]?.summary).toBe("abcd");
  });

  it("should parse a real RSS document with the default parser", async () => {
    const body = rssDocument([
      { title: "Hello", link: "https://example.com/hello", pubDate: "Mon, 01 Jan 2024 00:00:00 GMT" },
    ]);

    const result = await pollerModule.pollFeed("example", FEED_URL, fakeHttp(body), logger);

    expect(result.error).toBeNull();
    expect(result.items).toEqual([
      {
        url: "https://example.com/hello",
        title: "Hello",
        publishedAt: new Date("2024-01-01T00:00:00Z"),
        summary: "About Hello",
      },
    ]);
  });

  it("should report fetch failures in the result", async () => {
    const http: HttpClient = {
      fetchText: vi
        .fn()
        .mockRejectedValue(new NetworkError(FEED_URL, "http", "HTTP 404: Not Found", { status: 404 })),
    };

    const result = await pollerModule.pollFeed("example", FEED_URL, http, logger);

    expect(result).toEqual({ sourceName: "example", items: [], error: "not found (404)" });
  });

  it("should report parse failures in the result", async () => {
    pollerModule.setParserInstance({
      parseString: vi.fn().mockRejectedValue(new Error("Non-whitespace before first tag.")),
    });

    const result = await pollerModule.pollFeed("example", FEED_URL, fakeHttp(), logger);

    expect(result.error).toBe("Non-whitespace before first tag.");
    expect(result.items).toEqual([]);
  });

  it("should rethrow when the caller cancelled", async () => {
    const controller = new AbortController();
    const reason = new Error("cancelled");
    controller.abort(reason);
    const http: HttpClient = { fetchText: vi.fn().mockRejectedValue(reason) };

    await expect(
      pollerModule.pollFeed("example", FEED_URL, http, logger, { signal: controller.signal }),
    ).rejects.toBe(reason);
  });
});
