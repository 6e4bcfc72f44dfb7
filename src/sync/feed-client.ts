import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import type { Logger } from "pino";
import type { UpstreamConfig } from "../config";
import { FetchError, SyncCancelledError, errorMessage } from "./errors";
import type { RateLimiter } from "./rate-limiter";
import { pageCacheKey } from "./response-cache";
import type { ResponseCache } from "./response-cache";
import type { FeedInfo, FeedPage, RawArticle } from "./types";

const USER_AGENT = "feedsync/0.1 (article sync)";

// JSON Feed 1.1 subset served by the upstream.
const personSchema = z.object({ name: z.string().nullish() });

const jsonFeedItemSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  url: z.string().nullish(),
  external_url: z.string().nullish(),
  title: z.string().nullish(),
  content_html: z.string().nullish(),
  content_text: z.string().nullish(),
  summary: z.string().nullish(),
  image: z.string().nullish(),
  banner_image: z.string().nullish(),
  date_published: z.string().nullish(),
  date_modified: z.string().nullish(),
  author: personSchema.nullish(),
  authors: z.array(personSchema).nullish(),
});

const jsonFeedSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  icon: z.string().nullish(),
  favicon: z.string().nullish(),
  items: z.array(jsonFeedItemSchema),
});

type JsonFeedItem = z.infer<typeof jsonFeedItemSchema>;

export type FeedClient = {
  readonly fetchPage: (
    account: { readonly feedId: string },
    cursor: string | null,
    signal?: AbortSignal,
  ) => Promise<FeedPage>;
  readonly fetchFeedInfo: (feedId: string, signal?: AbortSignal) => Promise<FeedInfo>;
  /** Resolves when `upstream.baseUrl` answers with a 2xx status. */
  readonly checkConnection: (signal?: AbortSignal) => Promise<void>;
};

export type FeedClientDeps = {
  readonly upstream: UpstreamConfig;
  readonly rateLimiter: RateLimiter;
  readonly cache: ResponseCache<FeedPage>;
  readonly logger: Logger;
};

type RequestContext = {
  readonly feedId: string;
  readonly cursor: string | null;
};

// Requests that are not about one feed.
const SERVER_CONTEXT: RequestContext = { feedId: "*", cursor: null };

/** Public URL of an account's feed on the upstream. */
export function feedUrlFor(baseUrl: string, feedId: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return new URL(`feeds/${encodeURIComponent(feedId)}.json`, base).toString();
}

function pageNumber(ctx: RequestContext): number {
  if (ctx.cursor === null) return 1;
  const page = Number(ctx.cursor);
  if (!Number.isInteger(page) || page < 1) {
    throw new FetchError(`invalid page cursor "${ctx.cursor}"`, ctx);
  }
  return page;
}

function authorOf(item: JsonFeedItem): string | null {
  const names = (item.authors ?? [])
    .map((a) => a.name ?? "")
    .filter((name) => name.length > 0);
  if (names.length > 0) return names.join(", ");
  return item.author?.name ?? null;
}

function toRawArticle(item: JsonFeedItem, index: number, ctx: RequestContext): RawArticle {
  const guid = item.id !== undefined && item.id !== null ? String(item.id) : item.url;
  if (!guid) {
    throw new FetchError(`malformed payload: item ${index} has neither id nor url`, ctx);
  }

  return {
    guid,
    title: item.title ?? "",
    author: authorOf(item),
    link: item.url ?? item.external_url ?? "",
    publishedAt: item.date_published ?? item.date_modified ?? null,
    htmlBody: item.content_html ?? item.content_text ?? item.summary ?? "",
    coverImageUrl: item.image ?? item.banner_image ?? null,
  };
}

/**
 * Creates the upstream client. Every request waits on the shared rate
 * limiter; page reads are served from the response cache when possible.
 * @param deps - Upstream settings plus the process-wide limiter, cache and logger
 * @returns A FeedClient whose failures surface as `FetchError` or `SyncCancelledError`
 */
export function createFeedClient(deps: FeedClientDeps): FeedClient {
  const { upstream, rateLimiter, cache, logger } = deps;

  const headers: Record<string, string> = {
    "User-Agent": USER_AGENT,
    Accept: "application/feed+json, application/json",
  };
  if (upstream.authToken) {
    headers["Authorization"] = `Bearer ${upstream.authToken}`;
  }

  async function send(
    url: string,
    ctx: RequestContext,
    signal: AbortSignal | undefined,
  ): Promise<Response> {
    const timeout = AbortSignal.timeout(upstream.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(url, { signal: combined, headers });
    } catch (err) {
      if (signal?.aborted) throw new SyncCancelledError();
      const message = timeout.aborted
        ? `request timed out after ${upstream.timeoutMs}ms`
        : `request failed: ${errorMessage(err)}`;
      throw new FetchError(message, { ...ctx, retryable: true, cause: err });
    }

    if (!response.ok) {
      const status = response.status;
      await response.body?.cancel();
      throw new FetchError(`HTTP ${status}: ${response.statusText}`, {
        ...ctx,
        status,
        retryable: status === 429 || status >= 500,
      });
    }
    return response;
  }

  async function requestOnce(
    url: string,
    ctx: RequestContext,
    signal: AbortSignal | undefined,
  ): Promise<z.infer<typeof jsonFeedSchema>> {
    const response = await send(url, ctx, signal);

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (signal?.aborted) throw new SyncCancelledError();
      throw new FetchError(`malformed payload: ${errorMessage(err)}`, { ...ctx, cause: err });
    }

    const parsed = jsonFeedSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new FetchError(`malformed payload: ${issues}`, ctx);
    }
    return parsed.data;
  }

  // The first attempt's limiter slot is taken by the caller.
  async function request(
    url: string,
    ctx: RequestContext,
    signal: AbortSignal | undefined,
  ): Promise<z.infer<typeof jsonFeedSchema>> {
    const { attempts, backoffMs } = upstream.retry;

    for (let attempt = 0; ; attempt++) {
      try {
        return await requestOnce(url, ctx, signal);
      } catch (err) {
        if (!(err instanceof FetchError) || !err.retryable || attempt >= attempts) {
          throw err;
        }
        const delay = backoffMs * 2 ** attempt;
        logger.warn(
          { feedId: ctx.feedId, cursor: ctx.cursor, attempt: attempt + 1, delay, error: err.message },
          "upstream request failed, retrying",
        );
        try {
          await sleep(delay, undefined, { signal });
        } catch {
          throw new SyncCancelledError();
        }
        await rateLimiter.acquire(signal);
      }
    }
  }

  async function fetchPage(
    account: { readonly feedId: string },
    cursor: string | null,
    signal?: AbortSignal,
  ): Promise<FeedPage> {
    const ctx: RequestContext = { feedId: account.feedId, cursor };
    const page = pageNumber(ctx);

    await rateLimiter.acquire(signal);

    const key = pageCacheKey(account.feedId, cursor);
    const cached = cache.get(key);
    if (cached) {
      logger.debug({ feedId: account.feedId, cursor }, "page served from cache");
      return cached;
    }

    const url = new URL(feedUrlFor(upstream.baseUrl, account.feedId));
    url.searchParams.set("limit", String(upstream.pageSize));
    url.searchParams.set("page", String(page));

    const feed = await request(url.toString(), ctx, signal);
    const items = feed.items.map((item, index) => toRawArticle(item, index, ctx));
    const hasMore = items.length >= upstream.pageSize;

    const result: FeedPage = {
      items,
      nextCursor: hasMore ? String(page + 1) : null,
      hasMore,
    };

    cache.put(key, result);
    logger.debug(
      { feedId: account.feedId, cursor, itemCount: items.length, hasMore },
      "page fetched",
    );
    return result;
  }

  async function fetchFeedInfo(feedId: string, signal?: AbortSignal): Promise<FeedInfo> {
    const ctx: RequestContext = { feedId, cursor: null };
    await rateLimiter.acquire(signal);

    const url = new URL(feedUrlFor(upstream.baseUrl, feedId));
    url.searchParams.set("limit", "1");

    const feed = await request(url.toString(), ctx, signal);
    return {
      title: feed.title ?? null,
      description: feed.description ?? null,
      avatarUrl: feed.icon ?? feed.favicon ?? null,
    };
  }

  async function checkConnection(signal?: AbortSignal): Promise<void> {
    await rateLimiter.acquire(signal);
    const response = await send(upstream.baseUrl, SERVER_CONTEXT, signal);
    await response.body?.cancel();
    logger.info({ baseUrl: upstream.baseUrl, status: response.status }, "upstream reachable");
  }

  return { fetchPage, fetchFeedInfo, checkConnection };
}
