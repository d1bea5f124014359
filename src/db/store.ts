// pattern: Imperative Shell
import { asc, eq } from "drizzle-orm";
import type { AppDatabase } from "./index";
import { items, sources } from "./schema";
import type { ItemRow, SourceRow } from "./schema";
import type { Item, Source } from "../pipeline/types";

/**
 * Persistence boundary of the refresh engine. Every write is atomic; the
 * loaders return `null` for "not found" and throw on any other failure.
 */
export type FeedStore = {
  readonly loadSource: (name: string) => Source | null;
  readonly saveSource: (source: Source) => void;
  readonly listSources: () => Array<Source>;
  readonly deleteSource: (name: string) => boolean;
  readonly loadItems: (name: string) => Array<Item>;
  readonly saveFeed: (name: string, orderedItems: ReadonlyArray<Item>) => void;
};

function toSource(row: SourceRow): Source {
  return {
    name: row.name,
    url: row.url,
    feedUrl: row.feedUrl,
    strategy: row.strategy,
    selector: row.selector,
    category: row.category,
    lastRefreshAt: row.lastRefreshAt,
    lastStatus: row.lastStatus,
    lastError: row.lastError,
    itemCount: row.itemCount,
    discoveredAt: row.discoveredAt,
    createdAt: row.createdAt,
  };
}

function toItem(row: ItemRow): Item {
  return {
    url: row.url,
    title: row.title,
    publishedAt: row.publishedAt,
    summary: row.summary,
    sourceName: row.sourceName,
  };
}

export function createSqliteStore(db: AppDatabase): FeedStore {
  return {
    loadSource: (name) => {
      const row = db.select().from(sources).where(eq(sources.name, name)).get();
      return row ? toSource(row) : null;
    },

    saveSource: (source) => {
      db.insert(sources)
        .values(source)
        .onConflictDoUpdate({
          target: sources.name,
          set: {
            url: source.url,
            feedUrl: source.feedUrl,
            strategy: source.strategy,
            selector: source.selector,
            category: source.category,
            lastRefreshAt: source.lastRefreshAt,
            lastStatus: source.lastStatus,
            lastError: source.lastError,
            itemCount: source.itemCount,
            discoveredAt: source.discoveredAt,
          },
        })
        .run();
    },

    listSources: () =>
      db.select().from(sources).orderBy(asc(sources.createdAt), asc(sources.name)).all().map(toSource),

    deleteSource: (name) => {
      const result = db.delete(sources).where(eq(sources.name, name)).run();
      return result.changes > 0;
    },

    loadItems: (name) =>
      db
        .select()
        .from(items)
        .where(eq(items.sourceName, name))
        .orderBy(asc(items.position))
        .all()
        .map(toItem),

    saveFeed: (name, orderedItems) => {
      db.transaction((tx) => {
        tx.delete(items).where(eq(items.sourceName, name)).run();
        orderedItems.forEach((item, position) => {
          tx.insert(items)
            .values({
              sourceName: name,
              url: item.url,
              title: item.title,
              publishedAt: item.publishedAt,
              summary: item.summary,
              position,
            })
            .run();
        });
      });
    },
  };
}
