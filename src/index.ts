import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, refreshSettingsFromConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import { createSqliteStore } from "./db/store";
import { seedSources } from "./seed";
import { OriginRateLimiter } from "./pipeline/rate-limiter";
import { createHttpClient } from "./pipeline/http";
import { RefreshOrchestrator } from "./pipeline/orchestrator";
import { createFeedService } from "./service";
import { createRefreshScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feedsmith.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feedsmith starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { sourceCount: config.sources.length, schedule: config.schedule.refresh },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));
  logger.info("database schema applied");

  const store = createSqliteStore(db);
  seedSources(store, config, logger);

  const limiter = new OriginRateLimiter(config.refresh.perOriginIntervalMs);
  const http = createHttpClient({
    limiter,
    timeoutMs: config.fetch.timeoutMs,
    retries: config.fetch.retries,
    userAgent: config.fetch.userAgent,
    logger,
  });

  const orchestrator = new RefreshOrchestrator({
    store,
    http,
    logger,
    settings: refreshSettingsFromConfig(config),
  });

  const service = createFeedService({ store, orchestrator, http, config, logger });

  const refreshScheduler = createRefreshScheduler(orchestrator, config, logger);
  logger.info({ schedule: config.schedule.refresh }, "refresh scheduler started");

  registerShutdownHandlers({
    schedulers: [refreshScheduler],
    orchestrator: {
      stop: () => {
        orchestrator.stop();
        limiter.close();
      },
    },
    closeDb,
    logger,
  });

  const app = createApiServer({ service, config, logger });
  app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
