import { describe, it, expect, afterEach, vi } from "vitest";
import { TRPCError } from "@trpc/server";
import { createTestCaller, createTestHarness } from "../../test-utils/db";
import { respondHtml, stubFetch } from "../../test-utils/http";
import { listingPage } from "../../test-utils/pages";

async function trpcCode(call: Promise<unknown>): Promise<string | null> {
  try {
    await call;
    return null;
  } catch (err) {
    return err instanceof TRPCError ? err.code : "not a TRPCError";
  }
}

describe("sources router", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should register, list and fetch sources", async () => {
    const caller = createTestCaller();

    await caller.sources.register({
      name: "blog",
      url: "https://example.com/blog",
      strategy: "listing",
      category: "Tech",
    });

    const list = await caller.sources.list();
    expect(list.map((s) => s.name)).toEqual(["blog"]);
    const source = await caller.sources.get({ name: "blog" });
    expect(source).toMatchObject({ strategy: "listing", category: "Tech" });
  });

  it("should map domain errors to tRPC codes", async () => {
    const caller = createTestCaller();
    await caller.sources.register({ name: "blog", url: "https://example.com/blog" });

    expect(await trpcCode(caller.sources.get({ name: "missing" }))).toBe("NOT_FOUND");
    expect(
      await trpcCode(caller.sources.register({ name: "blog", url: "https://other.example.com/" })),
    ).toBe("CONFLICT");
    expect(await trpcCode(caller.sources.register({ name: "bad", url: "http://" }))).toBe(
      "BAD_REQUEST",
    );
    expect(await trpcCode(caller.sources.refresh({ name: "missing" }))).toBe("NOT_FOUND");
  });

  it("should validate input", async () => {
    const caller = createTestCaller();
    expect(
      await trpcCode(caller.sources.register({ name: "", url: "https://example.com/" })),
    ).toBe("BAD_REQUEST");
  });

  it("should update and remove sources", async () => {
    const caller = createTestCaller();
    await caller.sources.register({ name: "blog", url: "https://example.com/blog" });

    const updated = await caller.sources.update({ name: "blog", selector: "article.post" });
    expect(updated.selector).toBe("article.post");

    expect(await caller.sources.remove({ name: "blog" })).toEqual({ removed: true });
    expect(await caller.sources.remove({ name: "blog" })).toEqual({ removed: false });
  });

  it("should refresh a source and expose its feed", async () => {
    const harness = createTestHarness();
    const caller = createTestCaller(harness);
    await caller.sources.register({ name: "blog", url: "https://example.com/blog" });
    stubFetch({ "https://example.com/blog": respondHtml(listingPage(5)) });

    const refreshed = await caller.sources.refresh({ name: "blog" });
    expect(refreshed.lastStatus).toBe("ok");

    const xml = await caller.feeds.get({ name: "blog" });
    expect(xml).toContain("      <link>https://example.com/posts/1</link>");
  });

  it("should preview extraction for an unregistered page", async () => {
    const caller = createTestCaller();
    stubFetch({ "https://example.com/blog": respondHtml(listingPage(5)) });

    const preview = await caller.sources.preview({ url: "https://example.com/blog" });

    expect(preview.mode).toBe("listing");
    expect(preview.items).toHaveLength(5);
  });

  it("should report a failed upstream fetch as BAD_GATEWAY in previews", async () => {
    const caller = createTestCaller();
    stubFetch({});

    expect(await trpcCode(caller.sources.preview({ url: "https://example.com/gone" }))).toBe(
      "BAD_GATEWAY",
    );
  });
});
