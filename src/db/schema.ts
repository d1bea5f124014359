import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const sources = sqliteTable("sources", {
  name: text("name").primaryKey(),
  url: text("url").notNull(),
  feedUrl: text("feed_url"),
  strategy: text("strategy", { enum: ["auto", "listing", "article"] })
    .notNull()
    .default("auto"),
  selector: text("selector"),
  category: text("category"),
  lastRefreshAt: integer("last_refresh_at", { mode: "timestamp_ms" }),
  lastStatus: text("last_status", { enum: ["never", "ok", "error"] })
    .notNull()
    .default("never"),
  lastError: text("last_error"),
  itemCount: integer("item_count").notNull().default(0),
  discoveredAt: integer("discovered_at", { mode: "timestamp_ms" }),
  createdAt: integer("created_at", { mode: "timestamp_ms" })
    .notNull()
    .default(sql`(unixepoch() * 1000)`),
});

export const items = sqliteTable(
  "items",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sourceName: text("source_name")
      .notNull()
      .references(() => sources.name, { onDelete: "cascade", onUpdate: "cascade" }),
    url: text("url").notNull(),
    title: text("title").notNull(),
    publishedAt: integer("published_at", { mode: "timestamp_ms" }).notNull(),
    summary: text("summary").notNull().default(""),
    position: integer("position").notNull(),
  },
  (table) => ({
    sourceUrlIdx: uniqueIndex("items_source_url_idx").on(table.sourceName, table.url),
    sourcePositionIdx: index("items_source_position_idx").on(
      table.sourceName,
      table.position,
    ),
  }),
);

export type SourceRow = typeof sources.$inferSelect;
export type ItemRow = typeof items.$inferSelect;
