export { createRateLimiter } from "./rate-limiter";
export { createResponseCache, pageCacheKey } from "./response-cache";
export { createFeedClient, feedUrlFor } from "./feed-client";
export { normalizeArticle } from "./normalizer";
export { mergeArticles } from "./merge";
export { createSyncEngine } from "./orchestrator";
export * from "./errors";
export type { RateLimiter } from "./rate-limiter";
export type { ResponseCache } from "./response-cache";
export type { FeedClient } from "./feed-client";
export type { SyncEngine, SyncOptions, RegisterResult } from "./orchestrator";
export type {
  AccountRef,
  AccountSyncResult,
  FeedPage,
  MergeOutcome,
  NormalizedArticle,
  RawArticle,
  SyncAllResult,
  SyncRunOutcome,
} from "./types";
