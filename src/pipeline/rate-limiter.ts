import { RateLimitExceeded } from "../errors";
import { originOf } from "./normalize";

type Waiter = {
  readonly resolve: () => void;
  readonly reject: (reason: unknown) => void;
  readonly cleanup: () => void;
};

type Lane = {
  lastDispatchAt: number | null;
  readonly queue: Array<Waiter>;
  timer: ReturnType<typeof setTimeout> | null;
};

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("aborted");
}

/**
 * Per-origin request budget: at most one dispatch every `intervalMs` to the
 * same origin, shared by every worker holding this instance.
 *
 * Waiters are served first-in first-out. A token is consumed only when a
 * waiter is dispatched, so a waiter cancelled while queued leaves the
 * budget untouched.
 */
export class OriginRateLimiter {
  private readonly lanes = new Map<string, Lane>();

  constructor(private readonly intervalMs: number) {}

  /**
   * Takes the origin's token now or throws `RateLimitExceeded` carrying the
   * remaining wait.
   */
  tryAcquire(url: string): void {
    this.take(originOf(url));
  }

  /** Resolves once a request to `url`'s origin may be dispatched. */
  acquire(url: string, signal?: AbortSignal): Promise<void> {
    const origin = originOf(url);
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    const lane = this.lane(origin);
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = lane.queue.indexOf(waiter);
        if (index !== -1) lane.queue.splice(index, 1);
        if (signal) reject(abortReason(signal));
        if (lane.queue.length === 0 && lane.timer) {
          clearTimeout(lane.timer);
          lane.timer = null;
        }
      };
      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      lane.queue.push(waiter);
      this.pump(origin, lane);
    });
  }

  /** Number of callers waiting on `url`'s origin. */
  pending(url: string): number {
    return this.lanes.get(originOf(url))?.queue.length ?? 0;
  }

  /** Rejects every queued waiter and clears pending timers. */
  close(reason: unknown = new Error("rate limiter closed")): void {
    for (const lane of this.lanes.values()) {
      if (lane.timer) clearTimeout(lane.timer);
      lane.timer = null;
      for (const waiter of lane.queue.splice(0)) {
        waiter.cleanup();
        waiter.reject(reason);
      }
    }
  }

  private lane(origin: string): Lane {
    let lane = this.lanes.get(origin);
    if (!lane) {
      lane = { lastDispatchAt: null, queue: [], timer: null };
      this.lanes.set(origin, lane);
    }
    return lane;
  }

  private take(origin: string): void {
    const lane = this.lane(origin);
    const now = Date.now();
    if (lane.lastDispatchAt !== null) {
      const wait = lane.lastDispatchAt + this.intervalMs - now;
      if (wait > 0) throw new RateLimitExceeded(origin, wait);
    }
    lane.lastDispatchAt = now;
  }

  private pump(origin: string, lane: Lane): void {
    if (lane.timer) return;
    const next = lane.queue[0];
    if (!next) return;

    try {
      this.take(origin);
    } catch (err) {
      if (!(err instanceof RateLimitExceeded)) throw err;
      lane.timer = setTimeout(() => {
        lane.timer = null;
        this.pump(origin, lane);
      }, err.retryAfterMs);
      return;
    }

    lane.queue.shift();
    next.cleanup();
    next.resolve();
    this.pump(origin, lane);
  }
}
