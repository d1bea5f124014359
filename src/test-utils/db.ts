import pino from "pino";
import type { Logger } from "pino";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { createSqliteStore } from "../db/store";
import type { FeedStore } from "../db/store";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import { refreshSettingsFromConfig } from "../config";
import { OriginRateLimiter } from "../pipeline/rate-limiter";
import { createHttpClient } from "../pipeline/http";
import type { HttpClient } from "../pipeline/http";
import { RefreshOrchestrator } from "../pipeline/orchestrator";
import type { Source } from "../pipeline/types";
import { createFeedService } from "../service";
import type { FeedService } from "../service";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

export function createTestStore(): FeedStore {
  return createSqliteStore(createTestDatabase());
}

/**
 * Saves a source with test defaults and returns it.
 * @param overrides - Fields to replace on the default source
 */
export function seedTestSource(
  store: FeedStore,
  overrides?: Partial<Source>,
): Source {
  const source: Source = {
    name: "example",
    url: "https://example.com/blog",
    feedUrl: null,
    strategy: "auto",
    selector: null,
    category: null,
    lastRefreshAt: null,
    lastStatus: "never",
    lastError: null,
    itemCount: 0,
    discoveredAt: null,
    createdAt: new Date("2024-01-01T00:00:00Z"),
    ...overrides,
  };
  store.saveSource(source);
  return source;
}

/**
 * Default configuration for tests: every default, one schedule entry and
 * no per-origin spacing.
 */
export function createTestConfig(): AppConfig {
  return appConfigSchema.parse({
    schedule: { refresh: ["0 6 * * *"] },
    refresh: { maxConcurrency: 2, perOriginIntervalMs: 0 },
    fetch: { timeoutMs: 1000, retries: 0 },
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** HTTP client over the global `fetch` with no retry backoff. */
export function createTestHttpClient(
  config: AppConfig = createTestConfig(),
): HttpClient {
  return createHttpClient({
    limiter: new OriginRateLimiter(config.refresh.perOriginIntervalMs),
    timeoutMs: config.fetch.timeoutMs,
    retries: config.fetch.retries,
    userAgent: config.fetch.userAgent,
    logger: silentLogger(),
    backoffMs: 0,
  });
}

export type TestHarness = {
  readonly store: FeedStore;
  readonly config: AppConfig;
  readonly http: HttpClient;
  readonly orchestrator: RefreshOrchestrator;
  readonly service: FeedService;
};

/**
 * Wires store, HTTP client, orchestrator and service the way the
 * application does, over an in-memory database.
 */
export function createTestHarness(options?: {
  readonly config?: AppConfig;
  readonly now?: () => Date;
}): TestHarness {
  const config = options?.config ?? createTestConfig();
  const logger = silentLogger();
  const store = createTestStore();
  const http = createTestHttpClient(config);
  const orchestrator = new RefreshOrchestrator({
    store,
    http,
    logger,
    settings: refreshSettingsFromConfig(config),
    now: options?.now,
  });
  const service = createFeedService({
    store,
    orchestrator,
    http,
    config,
    logger,
    now: options?.now,
  });
  return { store, config, http, orchestrator, service };
}

/**
 * Creates a fully-typed tRPC caller over a fresh harness.
 */
export function createTestCaller(harness: TestHarness = createTestHarness()) {
  const createCaller = createCallerFactory(appRouter);
  return createCaller({
    service: harness.service,
    config: harness.config,
    logger: silentLogger(),
  });
}
