export type ExtractionStrategy = "auto" | "listing" | "article";

export type RefreshStatus = "never" | "ok" | "error";

export type Source = {
  readonly name: string;
  readonly url: string;
  readonly feedUrl: string | null;
  readonly strategy: ExtractionStrategy;
  readonly selector: string | null;
  readonly category: string | null;
  readonly lastRefreshAt: Date | null;
  readonly lastStatus: RefreshStatus;
  readonly lastError: string | null;
  readonly itemCount: number;
  readonly discoveredAt: Date | null;
  readonly createdAt: Date;
};

/**
 * A stored feed entry. `url` is always the canonical form produced by
 * `normalizeUrl` and is the identity of the item within its feed.
 */
export type Item = {
  readonly url: string;
  readonly title: string;
  readonly publishedAt: Date;
  readonly summary: string;
  readonly sourceName: string;
};

/** An item as it comes out of the extractor or poller, before canonicalization. */
export type ExtractedItem = {
  readonly url: string;
  readonly title: string;
  readonly publishedAt: Date;
  readonly summary: string;
};

export type ExtractionMode = "listing" | "article" | "selector";

export type ExtractionResult = {
  readonly mode: ExtractionMode;
  readonly items: ReadonlyArray<ExtractedItem>;
};

export type RefreshState = "idle" | "fetching" | "updated" | "failed";

export type OpmlEntry = {
  readonly title: string;
  readonly url: string;
  readonly feedUrl: string | null;
  readonly category: string | null;
};
