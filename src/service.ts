// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { FeedStore } from "./db/store";
import {
  DuplicateSourceError,
  SourceNotFoundError,
} from "./errors";
import {
  discoverFeeds,
  ensureScheme,
  exportOpml,
  extractItems,
  importOpml,
  normalizeUrl,
  renderSourceFeed,
  tryNormalizeUrl,
} from "./pipeline";
import type {
  ExtractionResult,
  ExtractionStrategy,
  HttpClient,
  NormalizeOptions,
  RefreshOrchestrator,
  RejectedEntry,
  Source,
} from "./pipeline";

export type RegisterSourceInput = {
  readonly name: string;
  readonly url: string;
  readonly strategy?: ExtractionStrategy;
  readonly selector?: string | null;
  readonly category?: string | null;
  readonly feedUrl?: string | null;
};

export type UpdateSourceInput = {
  readonly url?: string;
  readonly strategy?: ExtractionStrategy;
  readonly selector?: string | null;
  readonly category?: string | null;
};

export type PreviewOptions = {
  readonly strategy?: ExtractionStrategy;
  readonly selector?: string | null;
  readonly signal?: AbortSignal;
};

export type OpmlImportSummary = {
  readonly accepted: ReadonlyArray<Source>;
  readonly rejected: ReadonlyArray<RejectedEntry>;
};

export type FeedServiceDeps = {
  readonly store: FeedStore;
  readonly orchestrator: RefreshOrchestrator;
  readonly http: HttpClient;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly now?: () => Date;
};

/**
 * Operations offered to the API layer. Every refresh goes through the
 * shared orchestrator; discovery and previews never touch persistence.
 */
export type FeedService = {
  readonly registerSource: (input: RegisterSourceInput) => Source;
  readonly updateSource: (name: string, input: UpdateSourceInput) => Source;
  readonly removeSource: (name: string) => boolean;
  readonly listSources: () => Array<Source>;
  readonly getSource: (name: string) => Source;
  readonly refreshOne: (name: string, signal?: AbortSignal) => Promise<Source>;
  readonly refreshAll: (signal?: AbortSignal) => Promise<Array<Source>>;
  readonly discover: (url: string, signal?: AbortSignal) => Promise<Array<string>>;
  readonly previewExtraction: (
    url: string,
    options?: PreviewOptions,
  ) => Promise<ExtractionResult>;
  readonly importOpml: (document: string) => OpmlImportSummary;
  readonly exportOpml: () => string;
  readonly getFeed: (name: string) => string;
};

function newSource(input: RegisterSourceInput, url: string, createdAt: Date): Source {
  return {
    name: input.name,
    url,
    feedUrl: input.feedUrl ?? null,
    strategy: input.strategy ?? "auto",
    selector: input.selector ?? null,
    category: input.category ?? null,
    lastRefreshAt: null,
    lastStatus: "never",
    lastError: null,
    itemCount: 0,
    discoveredAt: null,
    createdAt,
  };
}

export function createFeedService(deps: FeedServiceDeps): FeedService {
  const { store, orchestrator, http, config, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const normalizeOptions: NormalizeOptions = {
    trackingParams: config.normalize.trackingParams,
  };

  const requireSource = (name: string): Source => {
    const source = store.loadSource(name);
    if (!source) throw new SourceNotFoundError(name);
    return source;
  };

  /** Name of a registered source (other than `except`) with the same canonical URL. */
  const findByUrl = (canonical: string, except?: string): string | null => {
    for (const source of store.listSources()) {
      if (source.name === except) continue;
      if (tryNormalizeUrl(source.url, normalizeOptions) === canonical) {
        return source.name;
      }
    }
    return null;
  };

  return {
    registerSource: (input) => {
      const url = ensureScheme(input.url);
      const canonical = normalizeUrl(url, normalizeOptions);

      if (store.loadSource(input.name)) {
        throw new DuplicateSourceError(`source '${input.name}' already exists`);
      }
      const existing = findByUrl(canonical);
      if (existing !== null) {
        throw new DuplicateSourceError(
          `URL '${input.url}' is already registered as '${existing}'`,
        );
      }

      const source = newSource(input, url, now());
      store.saveSource(source);
      logger.info({ sourceName: source.name, url }, "source registered");
      return source;
    },

    updateSource: (name, input) => {
      const source = requireSource(name);
      let next: Source = {
        ...source,
        strategy: input.strategy ?? source.strategy,
        selector: input.selector !== undefined ? input.selector : source.selector,
        category: input.category !== undefined ? input.category : source.category,
      };

      if (input.url !== undefined) {
        const url = ensureScheme(input.url);
        const canonical = normalizeUrl(url, normalizeOptions);
        const existing = findByUrl(canonical, name);
        if (existing !== null) {
          throw new DuplicateSourceError(
            `URL '${input.url}' is already registered as '${existing}'`,
          );
        }
        if (canonical !== tryNormalizeUrl(source.url, normalizeOptions)) {
          // a new page needs its feed discovered again
          next = { ...next, url, feedUrl: null, discoveredAt: null };
        }
      }

      store.saveSource(next);
      logger.info({ sourceName: name }, "source updated");
      return next;
    },

    removeSource: (name) => {
      orchestrator.cancel(name, new SourceNotFoundError(name));
      const removed = store.deleteSource(name);
      if (removed) logger.info({ sourceName: name }, "source removed");
      return removed;
    },

    listSources: () => store.listSources(),

    getSource: requireSource,

    refreshOne: (name, signal) => orchestrator.refreshOne(name, { signal }),

    refreshAll: (signal) => orchestrator.refreshAll({ signal }),

    discover: (url, signal) =>
      discoverFeeds(url, http, { signal, normalize: normalizeOptions }),

    previewExtraction: async (url, options) => {
      const target = ensureScheme(url);
      normalizeUrl(target, normalizeOptions);
      const page = await http.fetchText(target, { signal: options?.signal });
      return extractItems(page.url, page.body, {
        ...config.extraction,
        strategy: options?.strategy,
        selector: options?.selector,
        now: now(),
      });
    },

    importOpml: (document) => {
      const result = importOpml(document, store.listSources(), normalizeOptions);
      const createdAt = now();
      const accepted = result.accepted.map((entry) => {
        const source = newSource(entry, entry.url, createdAt);
        store.saveSource(source);
        return source;
      });
      logger.info(
        { accepted: accepted.length, rejected: result.rejected.length },
        "OPML imported",
      );
      return { accepted, rejected: result.rejected };
    },

    exportOpml: () =>
      exportOpml(store.listSources(), { baseUrl: config.server.baseUrl ?? null }),

    getFeed: (name) => {
      const source = requireSource(name);
      return renderSourceFeed(source, store.loadItems(name), {
        baseUrl: config.server.baseUrl ?? null,
        language: config.feed.language,
        now: now(),
      });
    },
  };
}
