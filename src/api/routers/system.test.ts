import { describe, it, expect } from "vitest";
import { createTestCaller, createTestHarness, seedTestSource } from "../../test-utils/db";

describe("system router", () => {
  it("should return zero counts for an empty registry", async () => {
    const caller = createTestCaller();

    const result = await caller.system.status();

    expect(result).toEqual({
      lastRefreshAt: null,
      refreshCron: ["0 6 * * *"],
      sourceCount: 0,
      failingCount: 0,
      itemCount: 0,
    });
  });

  it("should summarise refresh state across sources", async () => {
    const harness = createTestHarness();
    const latest = new Date("2024-06-02T00:00:00Z");
    seedTestSource(harness.store, {
      name: "a",
      url: "https://a.example.com/",
      lastStatus: "ok",
      itemCount: 4,
      lastRefreshAt: new Date("2024-06-01T00:00:00Z"),
    });
    seedTestSource(harness.store, {
      name: "b",
      url: "https://b.example.com/",
      lastStatus: "error",
      lastError: "site unreachable",
      itemCount: 2,
      lastRefreshAt: latest,
    });

    const result = await createTestCaller(harness).system.status();

    expect(result.lastRefreshAt).toEqual(latest);
    expect(result.sourceCount).toBe(2);
    expect(result.failingCount).toBe(1);
    expect(result.itemCount).toBe(6);
  });
});
