import { describe, it, expect } from "vitest";
import pino from "pino";
import { seedSources } from "./seed";
import { appConfigSchema } from "./config/schema";
import { createTestStore, seedTestSource } from "./test-utils/db";

const logger = pino({ level: "silent" });

const config = appConfigSchema.parse({
  sources: [
    { name: "blog", url: "https://example.com/blog", category: "Tech" },
    {
      name: "news",
      url: "https://news.example.org/",
      strategy: "listing",
      selector: "article.story",
    },
  ],
});

describe("seedSources", () => {
  it("should register configured sources into an empty store", () => {
    const store = createTestStore();

    seedSources(store, config, logger);

    const sources = store.listSources();
    expect(sources.map((s) => [s.name, s.strategy, s.selector, s.category])).toEqual([
      ["blog", "auto", null, "Tech"],
      ["news", "listing", "article.story", null],
    ]);
    expect(sources.every((s) => s.lastStatus === "never" && s.feedUrl === null)).toBe(true);
  });

  it("should skip seeding when any source exists", () => {
    const store = createTestStore();
    seedTestSource(store, { name: "manual", url: "https://manual.example.com/" });

    seedSources(store, config, logger);

    expect(store.listSources().map((s) => s.name)).toEqual(["manual"]);
  });

  it("should be idempotent across restarts", () => {
    const store = createTestStore();

    seedSources(store, config, logger);
    seedSources(store, config, logger);

    expect(store.listSources()).toHaveLength(2);
  });
});
