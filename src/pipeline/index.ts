export {
  DEFAULT_TRACKING_PARAMS,
  ensureScheme,
  isSameUrl,
  normalizeUrl,
  tryNormalizeUrl,
} from "./normalize";
export {
  discoverFeeds,
  discoverPage,
  findAlternateFeeds,
  findLinkedFeeds,
  isFeedDocument,
} from "./discoverer";
export { extractItems } from "./extractor";
export { synthesizeFeed } from "./synthesizer";
export { renderRss, renderSourceFeed, feedPath } from "./rss";
export { parseOpml, importOpml, exportOpml } from "./opml";
export { pollFeed } from "./poller";
export { OriginRateLimiter } from "./rate-limiter";
export { createHttpClient } from "./http";
export { RefreshOrchestrator } from "./orchestrator";
export type { Discovery, DiscoverOptions } from "./discoverer";
export type { ExtractorOptions } from "./extractor";
export type { HttpClient, FetchedDocument } from "./http";
export type { NormalizeOptions } from "./normalize";
export type { OpmlImportResult, RejectedEntry } from "./opml";
export type { PollResult } from "./poller";
export type { RefreshSettings, OrchestratorDeps } from "./orchestrator";
export type {
  ExtractedItem,
  ExtractionMode,
  ExtractionResult,
  ExtractionStrategy,
  Item,
  OpmlEntry,
  RefreshState,
  RefreshStatus,
  Source,
} from "./types";
