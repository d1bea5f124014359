import { vi } from "vitest";

export type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * Replaces the global `fetch` with a router over exact URLs. Unrouted URLs
 * answer 404. Returns the mock for call assertions.
 */
export function stubFetch(routes: Readonly<Record<string, Route>>) {
  const fetchMock = vi.fn(
    async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const route = routes[requestUrl(input)];
      if (!route) {
        return new Response("not found", { status: 404, statusText: "Not Found" });
      }
      return route(init);
    },
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** URLs requested through a `stubFetch` mock, in call order. */
export function requestedUrls(fetchMock: ReturnType<typeof stubFetch>): Array<string> {
  return fetchMock.mock.calls.map(([input]) => requestUrl(input));
}

export function respondHtml(body: string): Route {
  return () =>
    new Response(body, {
      status: 200,
      headers: { "content-type": "text/html; charset=utf-8" },
    });
}

export function respondXml(body: string): Route {
  return () =>
    new Response(body, {
      status: 200,
      headers: { "content-type": "application/rss+xml" },
    });
}

export function respondStatus(status: number, statusText: string): Route {
  return () => new Response(statusText, { status, statusText });
}

/** Never answers; rejects with the abort reason once the request signal fires. */
export const hang: Route = (init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

export type GatedRoute = {
  readonly route: Route;
  /** Lets every pending and later request through. */
  readonly release: () => void;
  /** Requests currently waiting at the gate. */
  readonly waiting: () => number;
  /** Most requests ever waiting at once. */
  readonly peak: () => number;
};

/** Holds requests until `release` is called, then answers with `route`. */
export function gated(route: Route): GatedRoute {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  let waiting = 0;
  let peak = 0;

  return {
    route: async (init) => {
      waiting++;
      peak = Math.max(peak, waiting);
      await gate;
      waiting--;
      return route(init);
    },
    release,
    waiting: () => waiting,
    peak: () => peak,
  };
}
