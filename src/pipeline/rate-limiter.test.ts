import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { RateLimitExceeded } from "../errors";
import { OriginRateLimiter } from "./rate-limiter";

const URL_A = "https://a.example.com/page";
const URL_A2 = "https://a.example.com/other";
const URL_B = "https://b.example.com/page";

describe("OriginRateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("tryAcquire", () => {
    it("should refuse a second dispatch to the same origin within the interval", () => {
      const limiter = new OriginRateLimiter(1000);
      limiter.tryAcquire(URL_A);

      let error: unknown;
      try {
        limiter.tryAcquire(URL_A2);
      } catch (err) {
        error = err;
      }
      expect(error).toBeInstanceOf(RateLimitExceeded);
      expect(error).toMatchObject({ origin: "https://a.example.com", retryAfterMs: 1000 });

      vi.advanceTimersByTime(1000);
      expect(() => limiter.tryAcquire(URL_A)).not.toThrow();
    });

    it("should keep origins independent", () => {
      const limiter = new OriginRateLimiter(1000);
      limiter.tryAcquire(URL_A);
      expect(() => limiter.tryAcquire(URL_B)).not.toThrow();
    });
  });

  describe("acquire", () => {
    it("should space dispatches to one origin by the interval", async () => {
      const limiter = new OriginRateLimiter(1000);
      const dispatched: Array<string> = [];

      void limiter.acquire(URL_A).then(() => dispatched.push("first"));
      void limiter.acquire(URL_A).then(() => dispatched.push("second"));
      void limiter.acquire(URL_A).then(() => dispatched.push("third"));

      await vi.advanceTimersByTimeAsync(0);
      expect(dispatched).toEqual(["first"]);
      expect(limiter.pending(URL_A)).toBe(2);

      await vi.advanceTimersByTimeAsync(999);
      expect(dispatched).toEqual(["first"]);

      await vi.advanceTimersByTimeAsync(1);
      expect(dispatched).toEqual(["first", "second"]);

      await vi.advanceTimersByTimeAsync(1000);
      expect(dispatched).toEqual(["first", "second", "third"]);
      expect(limiter.pending(URL_A)).toBe(0);
    });

    it("should not delay other origins", async () => {
      const limiter = new OriginRateLimiter(1000);
      const dispatched: Array<string> = [];

      void limiter.acquire(URL_A).then(() => dispatched.push("a1"));
      void limiter.acquire(URL_A).then(() => dispatched.push("a2"));
      void limiter.acquire(URL_B).then(() => dispatched.push("b1"));

      await vi.advanceTimersByTimeAsync(0);
      expect(dispatched).toEqual(["a1", "b1"]);
    });

    it("should drop a cancelled waiter without consuming a token", async () => {
      const limiter = new OriginRateLimiter(1000);
      const controller = new AbortController();
      const dispatched: Array<string> = [];

      void limiter.acquire(URL_A).then(() => dispatched.push("first"));
      const cancelled = limiter.acquire(URL_A, controller.signal);
      const rejection = expect(cancelled).rejects.toThrow("gave up");
      void limiter.acquire(URL_A).then(() => dispatched.push("third"));

      await vi.advanceTimersByTimeAsync(500);
      controller.abort(new Error("gave up"));
      await rejection;
      expect(limiter.pending(URL_A)).toBe(1);

      await vi.advanceTimersByTimeAsync(500);
      expect(dispatched).toEqual(["first", "third"]);
    });

    it("should reject at once when the signal is already aborted", async () => {
      const limiter = new OriginRateLimiter(1000);
      const controller = new AbortController();
      controller.abort(new Error("too late"));

      await expect(limiter.acquire(URL_A, controller.signal)).rejects.toThrow("too late");
      expect(() => limiter.tryAcquire(URL_A)).not.toThrow();
    });

    it("should reject queued waiters on close", async () => {
      const limiter = new OriginRateLimiter(1000);
      await limiter.acquire(URL_A);
      const waiting = limiter.acquire(URL_A);
      const rejection = expect(waiting).rejects.toThrow("rate limiter closed");

      limiter.close();
      await rejection;
      expect(limiter.pending(URL_A)).toBe(0);
    });
  });
});
