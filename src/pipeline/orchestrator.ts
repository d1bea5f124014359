// pattern: Imperative Shell
import pLimit from "p-limit";
import type { LimitFunction } from "p-limit";
import type { Logger } from "pino";
import { SourceNotFoundError, describeError } from "../errors";
import type { FeedStore } from "../db/store";
import { discoverPage } from "./discoverer";
import type { Discovery } from "./discoverer";
import { extractItems } from "./extractor";
import type { ExtractorOptions } from "./extractor";
import type { FetchedDocument, HttpClient } from "./http";
import { tryNormalizeUrl } from "./normalize";
import type { NormalizeOptions } from "./normalize";
import { pollFeed } from "./poller";
import { synthesizeFeed } from "./synthesizer";
import type {
  ExtractedItem,
  Item,
  RefreshState,
  Source,
} from "./types";

export type RefreshSettings = {
  readonly maxConcurrency: number;
  readonly feedMaxItems: number;
  /** Discovery is skipped when it ran less than this long ago. */
  readonly discoveryRecheckMs: number;
  readonly extraction: Omit<ExtractorOptions, "strategy" | "selector" | "now">;
  readonly normalize: NormalizeOptions;
};

export type TransitionListener = (
  sourceName: string,
  from: RefreshState,
  to: RefreshState,
) => void;

export type OrchestratorDeps = {
  readonly store: FeedStore;
  readonly http: HttpClient;
  readonly logger: Logger;
  readonly settings: RefreshSettings;
  readonly onTransition?: TransitionListener;
  readonly now?: () => Date;
};

export type RefreshOptions = {
  readonly signal?: AbortSignal;
};

/** Discovery results shared by every source of one refresh cycle. */
type DiscoveryCycle = Map<string, Promise<Discovery>>;

type Collected = {
  readonly items: ReadonlyArray<ExtractedItem>;
  readonly feedUrl: string | null;
  readonly discoveredAt: Date | null;
};

/**
 * Runs source refreshes: discovery, native feed pull or page extraction,
 * synthesis and persistence.
 *
 * Scheduled and on-demand refreshes share `refreshOne`, so a source is never
 * refreshed twice at once: a second request joins the one in flight. At
 * most `maxConcurrency` sources are mid-refresh; per-origin pacing lives in
 * the HTTP client's rate limiter.
 */
export class RefreshOrchestrator {
  private readonly limit: LimitFunction;
  private readonly inFlight = new Map<string, Promise<Source>>();
  private readonly cancellers = new Map<string, AbortController>();
  private readonly states = new Map<string, RefreshState>();
  private readonly shutdown = new AbortController();
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.limit = pLimit(deps.settings.maxConcurrency);
    this.now = deps.now ?? (() => new Date());
  }

  getState(sourceName: string): RefreshState {
    return this.states.get(sourceName) ?? "idle";
  }

  isRefreshing(sourceName: string): boolean {
    return this.inFlight.has(sourceName);
  }

  /**
   * Refreshes one source and resolves with its updated record. A failed
   * refresh resolves too, with `lastStatus: "error"`; only cancellation and
   * an unknown or meanwhile removed source reject.
   */
  refreshOne(sourceName: string, options?: RefreshOptions): Promise<Source> {
    return this.schedule(sourceName, new Map(), options?.signal);
  }

  /**
   * Refreshes every registered source. One source failing never affects
   * the others. Sources whose refresh was cancelled come back unchanged.
   */
  async refreshAll(options?: RefreshOptions): Promise<Array<Source>> {
    const cycle: DiscoveryCycle = new Map();
    const due = this.deps.store.listSources();
    this.deps.logger.info({ sourceCount: due.length }, "refresh cycle starting");

    const settled = await Promise.allSettled(
      due.map((source) => this.schedule(source.name, cycle, options?.signal)),
    );

    const results = settled.flatMap((outcome, index) => {
      if (outcome.status === "fulfilled") return [outcome.value];
      const original = due[index];
      if (!original) throw new Error("refresh result without source");
      this.deps.logger.warn(
        { sourceName: original.name, error: describeError(outcome.reason) },
        "refresh did not complete",
      );
      // removed while refreshing
      const current = this.deps.store.loadSource(original.name);
      return current ? [current] : [];
    });

    const failed = results.filter((s) => s.lastStatus === "error").length;
    this.deps.logger.info(
      { sourceCount: results.length, failed },
      "refresh cycle complete",
    );
    return results;
  }

  /** Cancels in-flight and queued refreshes; later requests fail fast. */
  stop(): void {
    this.shutdown.abort(new Error("refresh orchestrator stopped"));
  }

  /**
   * Cancels the refresh of one source, if one is running or queued. Its
   * callers reject with `reason`. Returns whether anything was cancelled.
   */
  cancel(sourceName: string, reason?: Error): boolean {
    const canceller = this.cancellers.get(sourceName);
    if (!canceller) return false;
    canceller.abort(reason ?? new Error(`refresh of '${sourceName}' cancelled`));
    return true;
  }

  private schedule(
    sourceName: string,
    cycle: DiscoveryCycle,
    signal: AbortSignal | undefined,
  ): Promise<Source> {
    const pending = this.inFlight.get(sourceName);
    if (pending) return pending;

    if (!this.deps.store.loadSource(sourceName)) {
      return Promise.reject(new SourceNotFoundError(sourceName));
    }

    const canceller = new AbortController();
    const combined = AbortSignal.any(
      signal
        ? [this.shutdown.signal, canceller.signal, signal]
        : [this.shutdown.signal, canceller.signal],
    );

    const run = this.limit(() => this.run(sourceName, cycle, combined)).finally(
      () => {
        this.inFlight.delete(sourceName);
        this.cancellers.delete(sourceName);
      },
    );
    this.cancellers.set(sourceName, canceller);
    this.inFlight.set(sourceName, run);
    return run;
  }

  private transition(sourceName: string, to: RefreshState): void {
    const from = this.getState(sourceName);
    if (to === "idle") this.states.delete(sourceName);
    else this.states.set(sourceName, to);
    this.deps.logger.debug({ sourceName, from, to }, "refresh state changed");
    this.deps.onTransition?.(sourceName, from, to);
  }

  private async run(
    sourceName: string,
    cycle: DiscoveryCycle,
    signal: AbortSignal,
  ): Promise<Source> {
    signal.throwIfAborted();
    const source = this.deps.store.loadSource(sourceName);
    if (!source) throw new SourceNotFoundError(sourceName);

    this.transition(sourceName, "fetching");
    try {
      const collected = await this.collect(source, cycle, signal);
      signal.throwIfAborted();
      return this.persist(source, collected);
    } catch (err) {
      if (signal.aborted) {
        this.deps.logger.info({ sourceName }, "source refresh cancelled");
        throw err;
      }
      if (err instanceof SourceNotFoundError) throw err;
      return this.recordFailure(source, err);
    } finally {
      this.transition(sourceName, "idle");
    }
  }

  /**
   * Re-reads the source before writing, so edits made while the fetch ran
   * are kept and a source removed meanwhile is not written back.
   */
  private reload(fetched: Source): Source {
    const current = this.deps.store.loadSource(fetched.name);
    if (!current) {
      this.deps.logger.info({ sourceName: fetched.name }, "source removed during refresh");
      throw new SourceNotFoundError(fetched.name);
    }
    return current;
  }

  /** A result fetched for a URL the source no longer has is discarded. */
  private isStale(fetched: Source, current: Source): boolean {
    if (current.url === fetched.url) return false;
    this.deps.logger.info(
      { sourceName: current.name, url: current.url },
      "source URL changed during refresh, result discarded",
    );
    return true;
  }

  private persist(fetched: Source, collected: Collected): Source {
    const { store, logger, settings } = this.deps;
    const current = this.reload(fetched);
    if (this.isStale(fetched, current)) return current;

    const incoming = this.canonicalize(current.name, collected.items);
    const merged = synthesizeFeed(
      store.loadItems(current.name),
      incoming,
      settings.feedMaxItems,
      settings.normalize,
    );
    store.saveFeed(current.name, merged);

    const updated: Source = {
      ...current,
      feedUrl: collected.feedUrl,
      discoveredAt: collected.discoveredAt,
      lastRefreshAt: this.now(),
      lastStatus: "ok",
      lastError: null,
      itemCount: merged.length,
    };
    store.saveSource(updated);
    this.transition(current.name, "updated");
    logger.info(
      {
        sourceName: current.name,
        newItems: incoming.length,
        itemCount: merged.length,
        viaFeed: collected.feedUrl !== null,
      },
      "source refreshed",
    );
    return updated;
  }

  private recordFailure(fetched: Source, err: unknown): Source {
    const current = this.reload(fetched);
    if (this.isStale(fetched, current)) return current;

    const failed: Source = {
      ...current,
      lastRefreshAt: this.now(),
      lastStatus: "error",
      lastError: describeError(err),
    };
    this.deps.store.saveSource(failed);
    this.transition(current.name, "failed");
    this.deps.logger.warn(
      { sourceName: current.name, url: current.url, error: failed.lastError },
      "source refresh failed",
    );
    return failed;
  }

  private async collect(
    source: Source,
    cycle: DiscoveryCycle,
    signal: AbortSignal,
  ): Promise<Collected> {
    const { http, logger, settings } = this.deps;
    const now = this.now();
    const pollOptions = {
      signal,
      maxSummaryLength: settings.extraction.maxSummaryLength,
      now,
    };

    let rediscover = false;
    if (source.feedUrl) {
      const poll = await pollFeed(source.name, source.feedUrl, http, logger, pollOptions);
      if (poll.error === null) {
        return {
          items: poll.items,
          feedUrl: source.feedUrl,
          discoveredAt: source.discoveredAt,
        };
      }
      logger.info(
        { sourceName: source.name, feedUrl: source.feedUrl },
        "known feed failed, rediscovering",
      );
      rediscover = true;
    }

    let discoveredAt = source.discoveredAt;
    const stale =
      discoveredAt === null ||
      now.getTime() - discoveredAt.getTime() >= settings.discoveryRecheckMs;

    let discovered: FetchedDocument | null = null;
    if (rediscover || stale) {
      const discovery = await this.discover(source.url, cycle, signal);
      discoveredAt = now;
      for (const candidate of discovery.feeds) {
        if (candidate === source.feedUrl) continue;
        const poll = await pollFeed(source.name, candidate, http, logger, pollOptions);
        if (poll.error === null) {
          return { items: poll.items, feedUrl: candidate, discoveredAt };
        }
      }
      if (discovery.page === null) throw discovery.pageError;
      discovered = discovery.page;
    }

    const page = discovered ?? (await http.fetchText(source.url, { signal }));
    const result = extractItems(page.url, page.body, {
      ...settings.extraction,
      strategy: source.strategy,
      selector: source.selector,
      now,
    });
    logger.debug(
      { sourceName: source.name, mode: result.mode, itemCount: result.items.length },
      "page extracted",
    );
    return { items: result.items, feedUrl: null, discoveredAt };
  }

  private discover(
    pageUrl: string,
    cycle: DiscoveryCycle,
    signal: AbortSignal,
  ): Promise<Discovery> {
    const { http, settings } = this.deps;
    const key = tryNormalizeUrl(pageUrl, settings.normalize) ?? pageUrl;
    let pending = cycle.get(key);
    if (!pending) {
      pending = discoverPage(pageUrl, http, { signal, normalize: settings.normalize });
      cycle.set(key, pending);
    }
    return pending;
  }

  private canonicalize(
    sourceName: string,
    extracted: ReadonlyArray<ExtractedItem>,
  ): Array<Item> {
    const items: Array<Item> = [];
    for (const item of extracted) {
      const url = tryNormalizeUrl(item.url, this.deps.settings.normalize);
      if (url === null) {
        this.deps.logger.debug({ sourceName, url: item.url }, "dropping item with invalid URL");
        continue;
      }
      items.push({ ...item, url, sourceName });
    }
    return items;
  }
}
