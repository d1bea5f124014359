// pattern: Functional Core
import { tryNormalizeUrl } from "./normalize";
import type { NormalizeOptions } from "./normalize";
import type { Item } from "./types";

function compareItems(
  a: { readonly key: string; readonly item: Item },
  b: { readonly key: string; readonly item: Item },
): number {
  const byTime = b.item.publishedAt.getTime() - a.item.publishedAt.getTime();
  if (byTime !== 0) return byTime;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

/**
 * Merges stored and freshly extracted items into the next feed.
 *
 * Identity is the canonical URL. On a collision the stored item wins, so a
 * re-extracted article keeps its original title and timestamp. The result
 * is newest first (ties by canonical URL) and holds at most `maxRetained`
 * items. Items whose URL cannot be normalized are dropped.
 */
export function synthesizeFeed(
  existing: ReadonlyArray<Item>,
  incoming: ReadonlyArray<Item>,
  maxRetained: number,
  options?: NormalizeOptions,
): Array<Item> {
  const merged = new Map<string, Item>();

  for (const item of [...existing, ...incoming]) {
    const key = tryNormalizeUrl(item.url, options);
    if (key === null || merged.has(key)) continue;
    merged.set(key, item);
  }

  return [...merged.entries()]
    .map(([key, item]) => ({ key, item }))
    .sort(compareItems)
    .slice(0, Math.max(0, maxRetained))
    .map(({ item }) => item);
}
