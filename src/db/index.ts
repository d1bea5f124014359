// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

/**
 * DDL matching `./schema`. Applied on every open; each statement is
 * idempotent.
 */
const SCHEMA_STATEMENTS: ReadonlyArray<string> = [
  `CREATE TABLE IF NOT EXISTS sources (
    name TEXT PRIMARY KEY NOT NULL,
    url TEXT NOT NULL,
    feed_url TEXT,
    strategy TEXT NOT NULL DEFAULT 'auto',
    selector TEXT,
    category TEXT,
    last_refresh_at INTEGER,
    last_status TEXT NOT NULL DEFAULT 'never',
    last_error TEXT,
    item_count INTEGER NOT NULL DEFAULT 0,
    discovered_at INTEGER,
    created_at INTEGER NOT NULL DEFAULT (unixepoch() * 1000)
  )`,
  `CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
    source_name TEXT NOT NULL REFERENCES sources(name) ON DELETE CASCADE ON UPDATE CASCADE,
    url TEXT NOT NULL,
    title TEXT NOT NULL,
    published_at INTEGER NOT NULL,
    summary TEXT NOT NULL DEFAULT '',
    position INTEGER NOT NULL
  )`,
  "CREATE UNIQUE INDEX IF NOT EXISTS items_source_url_idx ON items (source_name, url)",
  "CREATE INDEX IF NOT EXISTS items_source_position_idx ON items (source_name, position)",
];

export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  for (const statement of SCHEMA_STATEMENTS) {
    sqlite.exec(statement);
  }

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type DatabaseResult = ReturnType<typeof createDatabase>;
export type AppDatabase = BetterSQLite3Database<typeof schema>;
