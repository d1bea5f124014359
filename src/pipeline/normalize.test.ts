import { describe, it, expect } from "vitest";
import { InvalidURLError } from "../errors";
import {
  ensureScheme,
  isSameUrl,
  normalizeUrl,
  originOf,
  tryNormalizeUrl,
} from "./normalize";

describe("normalizeUrl", () => {
  it("should lower-case scheme and host and drop the default port", () => {
    expect(normalizeUrl("HTTP://Example.COM:80/Path")).toBe("http://example.com/Path");
    expect(normalizeUrl("https://example.com:443/a")).toBe("https://example.com/a");
  });

  it("should keep a non-default port", () => {
    expect(normalizeUrl("https://example.com:8443/a")).toBe("https://example.com:8443/a");
  });

  it("should drop tracking parameters and sort the rest by key", () => {
    expect(
      normalizeUrl("https://example.com/a?utm_source=x&b=2&fbclid=abc&a=1"),
    ).toBe("https://example.com/a?a=1&b=2");
  });

  it("should match tracking parameters case-insensitively", () => {
    expect(normalizeUrl("https://example.com/a?UTM_Campaign=spring&GCLID=1")).toBe(
      "https://example.com/a",
    );
  });

  it("should keep the relative order of repeated keys", () => {
    expect(normalizeUrl("https://example.com/?b=2&a=1&a=0")).toBe(
      "https://example.com/?a=1&a=0&b=2",
    );
  });

  it("should strip trailing slashes except on the root path", () => {
    expect(normalizeUrl("https://example.com/blog/")).toBe("https://example.com/blog");
    expect(normalizeUrl("https://example.com/blog//")).toBe("https://example.com/blog");
    expect(normalizeUrl("https://example.com")).toBe("https://example.com/");
    expect(normalizeUrl("https://example.com/")).toBe("https://example.com/");
  });

  it("should drop the fragment and an empty query", () => {
    expect(normalizeUrl("https://example.com/a?#section")).toBe("https://example.com/a");
  });

  it("should honour a custom tracking list", () => {
    expect(
      normalizeUrl("https://example.com/p?ref=home&utm_source=x", {
        trackingParams: ["ref"],
      }),
    ).toBe("https://example.com/p?utm_source=x");
  });

  it("should be idempotent", () => {
    const inputs = [
      "HTTP://Example.com:80/a/b/?z=1&utm_medium=m&y=2#x",
      "https://example.com",
      "https://example.com/search?q=hello+world",
    ];
    for (const input of inputs) {
      const once = normalizeUrl(input);
      expect(normalizeUrl(once)).toBe(once);
    }
  });

  it("should throw InvalidURLError for unparseable input", () => {
    expect(() => normalizeUrl("not a url")).toThrow(InvalidURLError);
    expect(() => normalizeUrl("/relative/path")).toThrow(InvalidURLError);
  });
});

describe("isSameUrl", () => {
  it("should treat URLs with the same canonical form as equal", () => {
    expect(
      isSameUrl("https://Example.com/a/?utm_source=x", "https://example.com/a#top"),
    ).toBe(true);
    expect(isSameUrl("https://example.com/a", "https://example.com/b")).toBe(false);
  });
});

describe("tryNormalizeUrl", () => {
  it("should return null instead of throwing", () => {
    expect(tryNormalizeUrl("::")).toBeNull();
    expect(tryNormalizeUrl("https://example.com/a/")).toBe("https://example.com/a");
  });
});

describe("ensureScheme", () => {
  it("should prefix https:// to bare hosts only", () => {
    expect(ensureScheme("example.com/blog")).toBe("https://example.com/blog");
    expect(ensureScheme("  http://example.com ")).toBe("http://example.com");
  });
});

describe("originOf", () => {
  it("should return scheme, host and explicit port", () => {
    expect(originOf("https://Example.com:8443/x?y=1")).toBe("https://example.com:8443");
    expect(originOf("http://example.com/a")).toBe("http://example.com");
  });

  it("should throw InvalidURLError for unparseable input", () => {
    expect(() => originOf("nope")).toThrow(InvalidURLError);
  });
});
