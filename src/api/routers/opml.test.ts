import { describe, it, expect } from "vitest";
import { TRPCError } from "@trpc/server";
import { createTestCaller } from "../../test-utils/db";

describe("opml router", () => {
  it("should import entries and export them again", async () => {
    const caller = createTestCaller();

    const summary = await caller.opml.import({
      document: `<opml version="2.0"><body>
        <outline text="Example Blog" htmlUrl="https://example.com/blog" />
      </body></opml>`,
    });
    expect(summary.accepted.map((s) => s.name)).toEqual(["example-blog"]);

    const xml = await caller.opml.export();
    expect(xml).toContain('text="example-blog"');
  });

  it("should reject a document that is not OPML", async () => {
    const caller = createTestCaller();

    await expect(caller.opml.import({ document: "<html></html>" })).rejects.toBeInstanceOf(
      TRPCError,
    );
    await expect(caller.opml.import({ document: "<html></html>" })).rejects.toMatchObject({
      code: "BAD_REQUEST",
    });
  });
});

describe("opml router rejections", () => {
  it("should report rejected entries with a code and message", async () => {
    const caller = createTestCaller();
    await caller.sources.register({ name: "blog", url: "https://example.com/blog" });

    const summary = await caller.opml.import({
      document: `<opml version="2.0"><body>
        <outline text="Blog again" htmlUrl="https://example.com/blog/" />
      </body></opml>`,
    });

    expect(summary.accepted).toEqual([]);
    expect(summary.rejected).toEqual([
      {
        entry: {
          title: "Blog again",
          url: "https://example.com/blog/",
          feedUrl: null,
          category: null,
        },
        code: "DUPLICATE_ENTRY",
        reason: "https://example.com/blog duplicates blog",
      },
    ]);
  });
});
