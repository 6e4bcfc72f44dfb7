// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import {
  createFeedClient,
  createRateLimiter,
  createResponseCache,
  createSyncEngine,
} from "./sync";
import type { FeedClient, FeedPage, RateLimiter, ResponseCache, SyncEngine } from "./sync";

export type AppServices = {
  readonly rateLimiter: RateLimiter;
  readonly cache: ResponseCache<FeedPage>;
  readonly feedClient: FeedClient;
  readonly engine: SyncEngine;
};

/**
 * Builds the shared sync components once per process. The rate limiter and
 * response cache are owned here and handed to the feed client explicitly.
 */
export function createServices(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
  shutdownSignal?: AbortSignal,
): AppServices {
  const rateLimiter = createRateLimiter(config.rateLimit);
  const cache = createResponseCache<FeedPage>({
    ttlMs: config.cache.ttlSeconds * 1000,
    enabled: config.cache.enabled,
  });
  const feedClient = createFeedClient({
    upstream: config.upstream,
    rateLimiter,
    cache,
    logger,
  });
  const engine = createSyncEngine({ db, feedClient, config, logger, shutdownSignal });

  return { rateLimiter, cache, feedClient, engine };
}
