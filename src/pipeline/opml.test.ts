import { describe, it, expect } from "vitest";
import { DuplicateEntryError, MalformedEntryError } from "../errors";
import { exportOpml, importOpml, parseOpml, slugifyName } from "./opml";
import type { Source } from "./types";

const DOCUMENT = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head><title>Subscriptions</title></head>
  <body>
    <outline text="Tech">
      <outline text="Example Blog" htmlUrl="https://example.com/blog" xmlUrl="https://example.com/feed.xml" />
      <outline text="News &amp; Views" xmlUrl="https://news.example.org/rss" />
    </outline>
    <outline text="Loose" htmlUrl="https://loose.example.net/" />
  </body>
</opml>`;

function source(name: string, url: string, category: string | null): Source {
  return {
    name,
    url,
    feedUrl: null,
    strategy: "auto",
    selector: null,
    category,
    lastRefreshAt: null,
    lastStatus: "never",
    lastError: null,
    itemCount: 0,
    discoveredAt: null,
    createdAt: new Date("2024-01-01T00:00:00Z"),
  };
}

describe("parseOpml", () => {
  it("should flatten nested outlines and carry the parent as category", () => {
    expect(parseOpml(DOCUMENT)).toEqual([
      {
        title: "Example Blog",
        url: "https://example.com/blog",
        feedUrl: "https://example.com/feed.xml",
        category: "Tech",
      },
      {
        title: "News & Views",
        url: "https://news.example.org/rss",
        feedUrl: null,
        category: "Tech",
      },
      {
        title: "Loose",
        url: "https://loose.example.net/",
        feedUrl: null,
        category: null,
      },
    ]);
  });

  it("should return no entries for an empty body", () => {
    expect(parseOpml('<opml version="2.0"><head/><body/></opml>')).toEqual([]);
  });

  it("should reject documents that are not well-formed XML", () => {
    expect(() => parseOpml("<opml><body>")).toThrow(MalformedEntryError);
  });

  it("should reject XML without an opml root", () => {
    expect(() => parseOpml("<html><body></body></html>")).toThrow(
      "document has no <opml> root element",
    );
  });
});

describe("slugifyName", () => {
  it("should produce lower-case dash-separated names", () => {
    expect(slugifyName("News & Views")).toBe("news-views");
    expect(slugifyName("  Tech / Science  ")).toBe("tech-science");
    expect(slugifyName("!!!")).toBe("source");
  });

  it("should cap names at 50 characters", () => {
    expect(slugifyName("a".repeat(80))).toHaveLength(50);
  });
});

describe("importOpml", () => {
  it("should reject entries already registered under another URL form", () => {
    const result = importOpml(DOCUMENT, [
      { name: "existing", url: "https://EXAMPLE.com/blog/?utm_source=x" },
    ]);

    expect(result.accepted).toEqual([
      {
        name: "news-views",
        url: "https://news.example.org/rss",
        feedUrl: null,
        category: "Tech",
      },
      {
        name: "loose",
        url: "https://loose.example.net/",
        feedUrl: null,
        category: null,
      },
    ]);
    expect(result.rejected).toHaveLength(1);
    const [rejected] = result.rejected;
    expect(rejected?.entry.url).toBe("https://example.com/blog");
    expect(rejected?.reason).toBeInstanceOf(DuplicateEntryError);
    expect(rejected?.reason.message).toBe(
      "https://example.com/blog duplicates existing",
    );
  });

  it("should reject duplicates within the same document", () => {
    const doc = `<opml version="2.0"><body>
      <outline text="First" htmlUrl="https://example.com/a" />
      <outline text="Second" htmlUrl="https://example.com/a/#top" />
    </body></opml>`;
    const result = importOpml(doc, []);
    expect(result.accepted.map((s) => s.name)).toEqual(["first"]);
    expect(result.rejected[0]?.reason).toBeInstanceOf(DuplicateEntryError);
  });

  it("should not keep a feed URL that is the page itself", () => {
    const doc = `<opml version="2.0"><body>
      <outline text="Same" htmlUrl="https://same.example.com/blog" xmlUrl="https://same.example.com/blog/" />
    </body></opml>`;
    const result = importOpml(doc, []);
    expect(result.accepted).toEqual([
      { name: "same", url: "https://same.example.com/blog", feedUrl: null, category: null },
    ]);
  });

  it("should make generated names unique", () => {
    const doc = `<opml version="2.0"><body>
      <outline text="My Site" htmlUrl="https://one.example.com/" />
      <outline text="My Site" htmlUrl="https://two.example.com/" />
    </body></opml>`;
    const result = importOpml(doc, [{ name: "my-site", url: "https://zero.example.com/" }]);
    expect(result.accepted.map((s) => s.name)).toEqual(["my-site-2", "my-site-3"]);
  });

  it("should collect unparseable URLs without aborting the batch", () => {
    const doc = `<opml version="2.0"><body>
      <outline text="Broken" htmlUrl="not a url" />
      <outline text="Fine" htmlUrl="https://fine.example.com/" />
    </body></opml>`;
    const result = importOpml(doc, []);
    expect(result.accepted.map((s) => s.name)).toEqual(["fine"]);
    expect(result.rejected[0]?.reason).toBeInstanceOf(MalformedEntryError);
  });
});

describe("exportOpml", () => {
  it("should write one category outline per category", () => {
    const xml = exportOpml([source("a", "https://a.example.com/", "Tech")]);
    expect(xml.split("\n")).toEqual([
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<opml version="2.0">',
      "  <head>",
      "    <title>feedsmith sources</title>",
      "  </head>",
      "  <body>",
      '    <outline text="Tech" title="Tech">',
      '      <outline text="a" title="a" type="rss" htmlUrl="https://a.example.com/" />',
      "    </outline>",
      "  </body>",
      "</opml>",
      "",
    ]);
  });

  it("should point leaves at generated feeds under a base URL", () => {
    const xml = exportOpml([source("a", "https://a.example.com/", null)], {
      baseUrl: "https://feeds.example.org/",
    });
    expect(xml).toContain('    <outline text="Uncategorized" title="Uncategorized">');
    expect(xml).toContain('xmlUrl="https://feeds.example.org/feed/a.xml"');
  });

  it("should point leaves at a discovered feed without a base URL", () => {
    const xml = exportOpml([
      { ...source("a", "https://a.example.com/", null), feedUrl: "https://a.example.com/rss" },
    ]);
    expect(xml).toContain(
      '      <outline text="a" title="a" type="rss" xmlUrl="https://a.example.com/rss" htmlUrl="https://a.example.com/" />',
    );
  });

  it("should round-trip through parseOpml", () => {
    const sources = [
      source("a", "https://a.example.com/", "Tech"),
      source("b", "https://b.example.com/news", null),
      source("c", "https://c.example.com/?q=1&r=2", "Tech"),
    ];
    expect(parseOpml(exportOpml(sources))).toEqual([
      { title: "a", url: "https://a.example.com/", feedUrl: null, category: "Tech" },
      { title: "c", url: "https://c.example.com/?q=1&r=2", feedUrl: null, category: "Tech" },
      { title: "b", url: "https://b.example.com/news", feedUrl: null, category: null },
    ]);
  });

  it("should re-import an export as the same sources", () => {
    const sources = [
      source("a", "https://a.example.com/", "Tech"),
      { ...source("b", "https://b.example.com/news", null), feedUrl: "https://b.example.com/feed.xml" },
    ];

    const result = importOpml(exportOpml(sources), []);

    expect(result.rejected).toEqual([]);
    expect(result.accepted).toEqual([
      { name: "a", url: "https://a.example.com/", feedUrl: null, category: "Tech" },
      {
        name: "b",
        url: "https://b.example.com/news",
        feedUrl: "https://b.example.com/feed.xml",
        category: null,
      },
    ]);
  });
});
