// pattern: Functional Core
import * as cheerio from "cheerio";
import { isTag, isText } from "domhandler";
import type { AnyNode } from "domhandler";

export type HtmlText = {
  readonly kind: "text";
  readonly text: string;
};

export type HtmlElement = {
  readonly kind: "element";
  readonly tagName: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: ReadonlyArray<HtmlNode>;
};

export type HtmlNode = HtmlElement | HtmlText;

/** Tags whose content is never article text. */
export const BOILERPLATE_TAGS: ReadonlySet<string> = new Set([
  "nav",
  "footer",
  "aside",
  "header",
  "script",
  "style",
  "form",
  "noscript",
]);

const IGNORED_TAGS: ReadonlySet<string> = new Set([
  "script",
  "style",
  "noscript",
  "template",
]);

const BLOCK_TAGS: ReadonlySet<string> = new Set([
  "address", "article", "blockquote", "br", "dd", "div", "dl", "dt",
  "figcaption", "figure", "footer", "h1", "h2", "h3", "h4", "h5", "h6",
  "header", "hr", "li", "main", "nav", "ol", "p", "pre", "section", "table",
  "td", "th", "tr", "ul", "aside", "time",
]);

function convert(node: AnyNode): HtmlNode | null {
  if (isText(node)) {
    return { kind: "text", text: node.data };
  }
  if (isTag(node)) {
    const children: Array<HtmlNode> = [];
    for (const child of node.children) {
      const converted = convert(child);
      if (converted) children.push(converted);
    }
    return {
      kind: "element",
      tagName: node.name.toLowerCase(),
      attributes: { ...node.attribs },
      children,
    };
  }
  // comments, processing instructions and doctypes carry no content
  return null;
}

/**
 * Parses HTML into an explicit element/text tree rooted at `<html>`.
 * The parser is lenient: it always yields an `<html>` element with
 * `<head>` and `<body>`, even for plain text input.
 */
export function parseHtml(html: string): HtmlElement {
  const $ = cheerio.load(html);
  const root = $("html").get(0);
  const converted = root ? convert(root) : null;
  if (converted && converted.kind === "element") {
    return converted;
  }
  return { kind: "element", tagName: "html", attributes: {}, children: [] };
}

export function isElement(node: HtmlNode): node is HtmlElement {
  return node.kind === "element";
}

export function elementChildren(element: HtmlElement): Array<HtmlElement> {
  return element.children.filter(isElement);
}

/**
 * Depth-first, document-order walk over every element below (and including)
 * `root`. The visitor receives the chain of ancestors, nearest last.
 * Returning `false` skips the element's subtree.
 */
export function walkElements(
  root: HtmlElement,
  visit: (element: HtmlElement, ancestors: ReadonlyArray<HtmlElement>) => boolean | void,
): void {
  const ancestors: Array<HtmlElement> = [];
  const step = (element: HtmlElement): void => {
    if (visit(element, ancestors) === false) return;
    ancestors.push(element);
    for (const child of element.children) {
      if (isElement(child)) step(child);
    }
    ancestors.pop();
  };
  step(root);
}

export function findAll(
  root: HtmlElement,
  predicate: (element: HtmlElement) => boolean,
): Array<HtmlElement> {
  const found: Array<HtmlElement> = [];
  walkElements(root, (element) => {
    if (predicate(element)) found.push(element);
  });
  return found;
}

export function findFirst(
  root: HtmlElement,
  predicate: (element: HtmlElement) => boolean,
): HtmlElement | null {
  let found: HtmlElement | null = null;
  walkElements(root, (element) => {
    if (found) return false;
    if (predicate(element)) {
      found = element;
      return false;
    }
    return true;
  });
  return found;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export type TextOptions = {
  /** Subtrees with these tag names contribute no text. */
  readonly exclude?: ReadonlySet<string>;
};

/**
 * Whitespace-collapsed text content. Block boundaries become spaces so that
 * `<h1>A</h1><p>B</p>` reads "A B" rather than "AB".
 */
export function textContent(node: HtmlNode, options?: TextOptions): string {
  const exclude = options?.exclude ?? IGNORED_TAGS;
  const parts: Array<string> = [];
  const collect = (current: HtmlNode): void => {
    if (current.kind === "text") {
      parts.push(current.text);
      return;
    }
    if (exclude.has(current.tagName)) return;
    const block = BLOCK_TAGS.has(current.tagName);
    if (block) parts.push(" ");
    for (const child of current.children) collect(child);
    if (block) parts.push(" ");
  };
  collect(node);
  return collapseWhitespace(parts.join(""));
}

export function attribute(element: HtmlElement, name: string): string | null {
  const value = element.attributes[name];
  return value === undefined ? null : value;
}

/** Resolves `href` against `base`; null for unparseable or non-web targets. */
export function resolveHref(href: string, base: string): string | null {
  const trimmed = href.trim();
  if (trimmed === "" || trimmed.startsWith("#")) return null;
  try {
    const resolved = new URL(trimmed, base);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return null;
    }
    return resolved.href;
  } catch {
    return null;
  }
}
