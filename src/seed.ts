import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { FeedStore } from "./db/store";

/**
 * Registers the sources listed in the configuration.
 *
 * Seeding is idempotent: when any source already exists it is skipped
 * entirely, so the database stays the source of truth after the first run.
 */
export function seedSources(
  store: FeedStore,
  config: AppConfig,
  logger: Logger,
): void {
  const existing = store.listSources();

  if (existing.length > 0) {
    logger.info(
      { existingCount: existing.length },
      "sources already exist, skipping seed",
    );
    return;
  }

  logger.info({ sourceCount: config.sources.length }, "seeding sources from config");

  const createdAt = new Date();
  for (const source of config.sources) {
    store.saveSource({
      name: source.name,
      url: source.url,
      feedUrl: null,
      strategy: source.strategy,
      selector: source.selector ?? null,
      category: source.category ?? null,
      lastRefreshAt: null,
      lastStatus: "never",
      lastError: null,
      itemCount: 0,
      discoveredAt: null,
      createdAt,
    });
  }
}
