// pattern: Functional Core
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { DuplicateEntryError, MalformedEntryError } from "../errors";
import { normalizeUrl, tryNormalizeUrl } from "./normalize";
import type { NormalizeOptions } from "./normalize";
import { escapeXml, feedPath } from "./rss";
import type { OpmlEntry, Source } from "./types";

export type RejectedEntry = {
  readonly entry: OpmlEntry;
  readonly reason: DuplicateEntryError | MalformedEntryError;
};

export type NewSource = {
  readonly name: string;
  readonly url: string;
  readonly feedUrl: string | null;
  readonly category: string | null;
};

export type OpmlImportResult = {
  readonly accepted: ReadonlyArray<NewSource>;
  readonly rejected: ReadonlyArray<RejectedEntry>;
};

export type ExportOptions = {
  readonly title?: string;
  /** Public base URL; leaves then point at the generated feeds. */
  readonly baseUrl?: string | null;
  readonly dateCreated?: Date;
};

const UNCATEGORIZED = "Uncategorized";
const MAX_NAME_LENGTH = 50;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  isArray: (name) => name === "outline",
});

function stringAttr(node: Record<string, unknown>, name: string): string | null {
  const value = node[`@_${name}`];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number") return String(value);
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function outlinesOf(node: Record<string, unknown>): Array<Record<string, unknown>> {
  const outlines = node["outline"];
  return Array.isArray(outlines) ? outlines.filter(isRecord) : [];
}

/**
 * Leaf entries of an OPML document, depth first. A leaf is an outline with
 * an `htmlUrl` or `xmlUrl`; the nearest enclosing outline's text is its
 * category, except the `Uncategorized` group written on export.
 *
 * @throws MalformedEntryError when the document is not OPML
 */
export function parseOpml(document: string): Array<OpmlEntry> {
  const validation = XMLValidator.validate(document.trim());
  if (validation !== true) {
    throw new MalformedEntryError(
      `OPML is not well-formed XML: ${validation.err.msg} (line ${validation.err.line})`,
    );
  }

  const parsed: unknown = parser.parse(document.trim());
  const opml = isRecord(parsed) ? parsed["opml"] : undefined;
  if (!isRecord(opml)) {
    throw new MalformedEntryError("document has no <opml> root element");
  }
  const body = opml["body"];
  if (!isRecord(body)) return [];

  const entries: Array<OpmlEntry> = [];
  const walk = (
    outlines: ReadonlyArray<Record<string, unknown>>,
    category: string | null,
  ): void => {
    for (const outline of outlines) {
      const text = stringAttr(outline, "text") ?? stringAttr(outline, "title");
      const htmlUrl = stringAttr(outline, "htmlUrl");
      const xmlUrl = stringAttr(outline, "xmlUrl");
      const children = outlinesOf(outline);

      if (htmlUrl !== null || xmlUrl !== null) {
        const url = htmlUrl ?? xmlUrl ?? "";
        entries.push({
          title: text ?? url,
          url,
          feedUrl: htmlUrl !== null ? xmlUrl : null,
          category,
        });
      }
      if (children.length > 0) {
        walk(children, text === UNCATEGORIZED ? null : (text ?? category));
      }
    }
  };
  walk(outlinesOf(body), null);

  return entries;
}

/** Lower-case, dash-separated, `[a-z0-9_-]` only, at most 50 characters. */
export function slugifyName(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[\s/]+/g, "-")
    .replace(/[^a-z0-9_-]/g, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, MAX_NAME_LENGTH);
  return slug === "" ? "source" : slug;
}

function uniqueName(base: string, taken: Set<string>): string {
  let name = base;
  for (let n = 2; taken.has(name); n++) {
    const suffix = `-${n}`;
    name = `${base.slice(0, MAX_NAME_LENGTH - suffix.length)}${suffix}`;
  }
  taken.add(name);
  return name;
}

/**
 * Splits an OPML document into new sources and rejected entries.
 *
 * Each entry's URL is normalized and compared against the registered
 * sources and the entries accepted so far. A duplicate or unparseable entry
 * is collected in `rejected`; it never aborts the batch.
 *
 * @throws MalformedEntryError when the document as a whole is not OPML
 */
export function importOpml(
  document: string,
  registered: ReadonlyArray<Pick<Source, "name" | "url">>,
  options?: NormalizeOptions,
): OpmlImportResult {
  const entries = parseOpml(document);

  const known = new Map<string, string>();
  const names = new Set<string>();
  for (const source of registered) {
    names.add(source.name);
    try {
      known.set(normalizeUrl(source.url, options), source.name);
    } catch {
      continue;
    }
  }

  const accepted: Array<NewSource> = [];
  const rejected: Array<RejectedEntry> = [];

  for (const entry of entries) {
    let canonical: string;
    try {
      canonical = normalizeUrl(entry.url, options);
    } catch (err) {
      rejected.push({
        entry,
        reason: new MalformedEntryError(`unparseable URL: ${entry.url}`, {
          cause: err,
        }),
      });
      continue;
    }

    const existing = known.get(canonical);
    if (existing !== undefined) {
      rejected.push({ entry, reason: new DuplicateEntryError(canonical, existing) });
      continue;
    }

    // a feed URL that is just the page again is no feed
    const feedCanonical =
      entry.feedUrl === null ? null : tryNormalizeUrl(entry.feedUrl, options);

    const name = uniqueName(slugifyName(entry.title), names);
    known.set(canonical, name);
    accepted.push({
      name,
      url: entry.url,
      feedUrl: feedCanonical !== null && feedCanonical !== canonical ? entry.feedUrl : null,
      category: entry.category,
    });
  }

  return { accepted, rejected };
}

function attrs(values: ReadonlyArray<readonly [string, string | null]>): string {
  return values
    .filter((pair): pair is readonly [string, string] => pair[1] !== null && pair[1] !== "")
    .map(([key, value]) => `${key}="${escapeXml(value)}"`)
    .join(" ");
}

function leafFeedUrl(source: Source, baseUrl: string | null): string | null {
  if (baseUrl) return `${baseUrl}${feedPath(source.name)}`;
  return source.feedUrl;
}

/**
 * OPML 2.0 document for the given sources, grouped by category in
 * first-seen order. Output depends only on the sources, their order and the
 * options.
 */
export function exportOpml(
  sources: ReadonlyArray<Source>,
  options?: ExportOptions,
): string {
  const baseUrl = options?.baseUrl ? options.baseUrl.replace(/\/+$/, "") : null;

  const byCategory = new Map<string, Array<Source>>();
  for (const source of sources) {
    const category = source.category ?? UNCATEGORIZED;
    const bucket = byCategory.get(category);
    if (bucket) bucket.push(source);
    else byCategory.set(category, [source]);
  }

  const body: Array<string> = [];
  for (const [category, members] of byCategory) {
    body.push(`    <outline ${attrs([["text", category], ["title", category]])}>`);
    for (const source of members) {
      const leaf = attrs([
        ["text", source.name],
        ["title", source.name],
        ["type", "rss"],
        ["xmlUrl", leafFeedUrl(source, baseUrl)],
        ["htmlUrl", source.url],
      ]);
      body.push(`      <outline ${leaf} />`);
    }
    body.push("    </outline>");
  }

  const head = [
    "  <head>",
    `    <title>${escapeXml(options?.title ?? "feedsmith sources")}</title>`,
    options?.dateCreated
      ? `    <dateCreated>${options.dateCreated.toUTCString()}</dateCreated>`
      : "",
    "  </head>",
  ].filter(Boolean);

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<opml version="2.0">',
    ...head,
    "  <body>",
    ...body,
    "  </body>",
    "</opml>",
    "",
  ].join("\n");
}
