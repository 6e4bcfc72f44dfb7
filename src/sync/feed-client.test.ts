import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { createFeedClient, feedUrlFor } from "./feed-client";
import { createRateLimiter } from "./rate-limiter";
import type { RateLimiter } from "./rate-limiter";
import { createResponseCache } from "./response-cache";
import { FetchError, SyncCancelledError } from "./errors";
import type { FeedPage } from "./types";
import type { UpstreamConfig } from "../config";

const upstream: UpstreamConfig = {
  baseUrl: "https://rss.example.com",
  timeoutMs: 5000,
  pageSize: 2,
  retry: { attempts: 0, backoffMs: 1 },
};

function okResponse(body: unknown) {
  return {
    ok: true,
    status: 200,
    statusText: "OK",
    json: vi.fn().mockResolvedValue(body),
  };
}

function errorResponse(status: number, statusText: string) {
  return { ok: false, status, statusText, json: vi.fn() };
}

function jsonFeed(items: Array<Record<string, unknown>>, extra: Record<string, unknown> = {}) {
  return { version: "https://jsonfeed.org/version/1.1", title: "Feed", items, ...extra };
}

describe("createFeedClient", () => {
  const logger = pino({ level: "silent" });
  let rateLimiter: RateLimiter;
  let acquire: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
    acquire = vi.fn().mockResolvedValue(undefined);
    rateLimiter = { acquire, pending: () => 0 };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function client(options: { cacheEnabled?: boolean; upstream?: Partial<UpstreamConfig> } = {}) {
    return createFeedClient({
      upstream: { ...upstream, ...options.upstream },
      rateLimiter,
      cache: createResponseCache<FeedPage>({ ttlMs: 60_000, enabled: options.cacheEnabled ?? false }),
      logger,
    });
  }

  describe("fetchPage", () => {
    it("should request the paged feed url with sync headers", async () => {
      const mockFetch = vi.fn().mockResolvedValue(okResponse(jsonFeed([])));
      vi.stubGlobal("fetch", mockFetch);

      await client().fetchPage({ feedId: "MP_1" }, null);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0]!;
      expect(url).toBe("https://rss.example.com/feeds/MP_1.json?limit=2&page=1");
      expect(init.headers).toEqual({
        "User-Agent": "feedsync/0.1 (article sync)",
        Accept: "application/feed+json, application/json",
      });
    });

    it("should send a bearer token when one is configured", async () => {
      const mockFetch = vi.fn().mockResolvedValue(okResponse(jsonFeed([])));
      vi.stubGlobal("fetch", mockFetch);

      await client({ upstream: { authToken: "test-secret" } }).fetchPage({ feedId: "MP_1" }, null);

      const [, init] = mockFetch.mock.calls[0]!;
      expect(init.headers["Authorization"]).toBe("Bearer test-secret");
    });

    it("should use the cursor as the page number", async () => {
      const mockFetch = vi.fn().mockResolvedValue(okResponse(jsonFeed([])));
      vi.stubGlobal("fetch", mockFetch);

      await client().fetchPage({ feedId: "MP_1" }, "3");

      expect(mockFetch.mock.calls[0]![0]).toBe(
        "https://rss.example.com/feeds/MP_1.json?limit=2&page=3",
      );
    });

    it("should report a next cursor when the page is full", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(okResponse(jsonFeed([{ id: "a" }, { id: "b" }]))),
      );

      const page = await client().fetchPage({ feedId: "MP_1" }, null);

      expect(page.hasMore).toBe(true);
      expect(page.nextCursor).toBe("2");
      expect(page.items.map((item) => item.guid)).toEqual(["a", "b"]);
    });

    it("should report exhaustion when the page is short", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(okResponse(jsonFeed([{ id: "a" }]))));

      const page = await client().fetchPage({ feedId: "MP_1" }, "2");

      expect(page.hasMore).toBe(false);
      expect(page.nextCursor).toBeNull();
    });

    it("should map JSON Feed items onto raw articles", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(
          okResponse(
            jsonFeed([
              {
                id: 42,
                url: "https://mp.example.com/s/42",
                title: "Hello",
                content_html: "<p>Hi</p>",
                image: "https://img.example.com/cover.jpg",
                date_published: "2024-03-01T08:00:00Z",
                authors: [{ name: "Alice" }, { name: "Bob" }],
              },
              {
                url: "https://mp.example.com/s/43",
                content_text: "plain",
                date_modified: "2024-03-02T08:00:00Z",
                author: { name: "Carol" },
              },
            ]),
          ),
        ),
      );

      const page = await client().fetchPage({ feedId: "MP_1" }, null);

      expect(page.items).toEqual([
        {
          guid: "42",
          title: "Hello",
          author: "Alice, Bob",
          link: "https://mp.example.com/s/42",
          publishedAt: "2024-03-01T08:00:00Z",
          htmlBody: "<p>Hi</p>",
          coverImageUrl: "https://img.example.com/cover.jpg",
        },
        {
          guid: "https://mp.example.com/s/43",
          title: "",
          author: "Carol",
          link: "https://mp.example.com/s/43",
          publishedAt: "2024-03-02T08:00:00Z",
          htmlBody: "plain",
          coverImageUrl: null,
        },
      ]);
    });

    it("should serve a repeated read from cache with one upstream call", async () => {
      const mockFetch = vi.fn().mockResolvedValue(okResponse(jsonFeed([{ id: "a" }])));
      vi.stubGlobal("fetch", mockFetch);
      const feedClient = client({ cacheEnabled: true });

      const first = await feedClient.fetchPage({ feedId: "MP_1" }, null);
      const second = await feedClient.fetchPage({ feedId: "MP_1" }, null);

      expect(second).toBe(first);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(acquire).toHaveBeenCalledTimes(2);
    });

    it("should throw a retryable FetchError on a 5xx response", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(errorResponse(503, "Service Unavailable")));

      const error = await client()
        .fetchPage({ feedId: "MP_1" }, "2")
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.message).toBe("HTTP 503: Service Unavailable");
        expect(error.status).toBe(503);
        expect(error.retryable).toBe(true);
        expect(error.feedId).toBe("MP_1");
        expect(error.cursor).toBe("2");
      }
    });

    it("should release the body of a failed response", async () => {
      const cancel = vi.fn().mockResolvedValue(undefined);
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue({ ...errorResponse(500, "Internal Server Error"), body: { cancel } }),
      );

      await expect(client().fetchPage({ feedId: "MP_1" }, null)).rejects.toBeInstanceOf(FetchError);
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it("should not mark a 404 as retryable", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(errorResponse(404, "Not Found")));

      const error = await client()
        .fetchPage({ feedId: "MP_1" }, null)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.retryable).toBe(false);
      }
    });

    it("should wrap network failures in FetchError", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

      await expect(client().fetchPage({ feedId: "MP_1" }, null)).rejects.toThrow(
        "request failed: fetch failed",
      );
    });

    it("should reject a payload without items as malformed", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(okResponse({ title: "x" })));

      await expect(client().fetchPage({ feedId: "MP_1" }, null)).rejects.toThrow(
        /^malformed payload: items: /,
      );
    });

    it("should reject a body that is not JSON as malformed", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        statusText: "OK",
        json: vi.fn().mockRejectedValue(new SyntaxError("Unexpected token <")),
      }));

      await expect(client().fetchPage({ feedId: "MP_1" }, null)).rejects.toThrow(
        "malformed payload: Unexpected token <",
      );
    });

    it("should reject an item with neither id nor url", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(okResponse(jsonFeed([{ id: "a" }, { title: "orphan" }]))),
      );

      await expect(client().fetchPage({ feedId: "MP_1" }, null)).rejects.toThrow(
        "malformed payload: item 1 has neither id nor url",
      );
    });

    it("should reject a cursor that is not a page number", async () => {
      const mockFetch = vi.fn();
      vi.stubGlobal("fetch", mockFetch);

      await expect(client().fetchPage({ feedId: "MP_1" }, "abc")).rejects.toThrow(
        'invalid page cursor "abc"',
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should retry retryable failures and take a limiter slot per retry", async () => {
      const mockFetch = vi
        .fn()
        .mockResolvedValueOnce(errorResponse(502, "Bad Gateway"))
        .mockResolvedValueOnce(okResponse(jsonFeed([{ id: "a" }])));
      vi.stubGlobal("fetch", mockFetch);

      const page = await client({ upstream: { retry: { attempts: 2, backoffMs: 1 } } }).fetchPage(
        { feedId: "MP_1" },
        null,
      );

      expect(page.items).toHaveLength(1);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(acquire).toHaveBeenCalledTimes(2);
    });

    it("should give up after the configured number of retries", async () => {
      const mockFetch = vi.fn().mockResolvedValue(errorResponse(500, "Internal Server Error"));
      vi.stubGlobal("fetch", mockFetch);

      await expect(
        client({ upstream: { retry: { attempts: 1, backoffMs: 1 } } }).fetchPage(
          { feedId: "MP_1" },
          null,
        ),
      ).rejects.toThrow("HTTP 500: Internal Server Error");
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it("should raise SyncCancelledError when the caller aborts before the request", async () => {
      const mockFetch = vi.fn();
      vi.stubGlobal("fetch", mockFetch);
      rateLimiter = createRateLimiter({ maxRequests: 10, windowMs: 1000 });
      const controller = new AbortController();
      controller.abort();

      await expect(
        client().fetchPage({ feedId: "MP_1" }, null, controller.signal),
      ).rejects.toBeInstanceOf(SyncCancelledError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe("fetchFeedInfo", () => {
    it("should return feed metadata", async () => {
      const mockFetch = vi.fn().mockResolvedValue(
        okResponse(
          jsonFeed([], {
            title: "Morning Notes",
            description: "Daily notes",
            icon: "https://img.example.com/icon.png",
          }),
        ),
      );
      vi.stubGlobal("fetch", mockFetch);

      const info = await client().fetchFeedInfo("MP_1");

      expect(mockFetch.mock.calls[0]![0]).toBe("https://rss.example.com/feeds/MP_1.json?limit=1");
      expect(info).toEqual({
        title: "Morning Notes",
        description: "Daily notes",
        avatarUrl: "https://img.example.com/icon.png",
      });
    });
  });
});

describe("checkConnection", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function client() {
    return createFeedClient({
      upstream,
      rateLimiter: { acquire: vi.fn().mockResolvedValue(undefined), pending: () => 0 },
      cache: createResponseCache<FeedPage>({ ttlMs: 60_000, enabled: false }),
      logger: pino({ level: "silent" }),
    });
  }

  it("should request the base url and resolve on a 2xx status", async () => {
    const mockFetch = vi.fn().mockResolvedValue(okResponse({}));
    vi.stubGlobal("fetch", mockFetch);

    await expect(client().checkConnection()).resolves.toBeUndefined();
    expect(mockFetch.mock.calls[0]![0]).toBe("https://rss.example.com");
  });

  it("should reject with FetchError when the upstream answers an error status", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(errorResponse(502, "Bad Gateway")));

    await expect(client().checkConnection()).rejects.toThrow("HTTP 502: Bad Gateway");
  });
});

describe("feedUrlFor", () => {
  it("should join base url and feed id with or without a trailing slash", () => {
    expect(feedUrlFor("https://rss.example.com", "MP_1")).toBe(
      "https://rss.example.com/feeds/MP_1.json",
    );
    expect(feedUrlFor("https://rss.example.com/", "MP_1")).toBe(
      "https://rss.example.com/feeds/MP_1.json",
    );
  });
});
