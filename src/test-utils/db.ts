import pino from "pino";
import { applyMigrations, createDatabase } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { accounts, articles } from "../db/schema";
import type { Account } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import { createSyncEngine } from "../sync/orchestrator";
import type { SyncEngine } from "../sync/orchestrator";
import type { FeedClient } from "../sync/feed-client";
import type { FeedInfo, FeedPage, RawArticle } from "../sync/types";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 * @returns A new AppDatabase instance with schema initialized.
 */
export function createTestDatabase(): AppDatabase {
  const { db, sqlite } = createDatabase(":memory:");
  applyMigrations(sqlite, "./migrations");
  return db;
}

/**
 * Seeds a test account into the database with optional field overrides.
 * @returns The inserted account row.
 */
export function seedTestAccount(
  db: AppDatabase,
  overrides?: Partial<typeof accounts.$inferInsert>,
): Account {
  return db
    .insert(accounts)
    .values({
      feedId: "MP_WXS_TEST",
      name: "Test Account",
      feedUrl: "https://rss.example.com/feeds/MP_WXS_TEST.json",
      ...overrides,
    })
    .returning()
    .get();
}

/**
 * Seeds a test article for `accountId` with optional field overrides.
 * @returns The ID of the inserted article.
 */
export function seedTestArticle(
  db: AppDatabase,
  accountId: number,
  overrides?: Partial<typeof articles.$inferInsert>,
): number {
  const result = db
    .insert(articles)
    .values({
      accountId,
      guid: `guid-${Date.now()}-${Math.random()}`,
      title: "Test Article",
      url: "https://example.com/article",
      contentHtml: "<p>Body text</p>",
      content: "Body text",
      summary: "Body text",
      images: [],
      wordCount: 2,
      readingTimeMinutes: 1,
      ...overrides,
    })
    .returning({ id: articles.id })
    .get();

  return result.id;
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    upstream: {
      baseUrl: "https://rss.example.com",
      timeoutMs: 5000,
      pageSize: 2,
      retry: { attempts: 0, backoffMs: 10 },
    },
    rateLimit: { maxRequests: 100, windowMs: 1000 },
    cache: { enabled: false, ttlSeconds: 60 },
    sync: { concurrency: 2, maxPagesPerRun: 50, staleRunMinutes: 60 },
    accounts: [],
    export: { directory: "./exports" },
    server: { port: 3000 },
    ...overrides,
  };
}

/** Builds an upstream item with sensible defaults. */
export function rawArticle(guid: string, overrides?: Partial<RawArticle>): RawArticle {
  return {
    guid,
    title: `Article ${guid}`,
    author: "Writer",
    link: `https://example.com/${guid}`,
    publishedAt: "2024-03-01T08:00:00.000Z",
    htmlBody: `<p>Body of ${guid}</p>`,
    coverImageUrl: null,
    ...overrides,
  };
}

/** A `FeedPage` whose cursor points at the next page unless it is the last. */
export function feedPage(
  items: ReadonlyArray<RawArticle>,
  nextCursor: string | null,
): FeedPage {
  return { items, nextCursor, hasMore: nextCursor !== null };
}

export type FakeFeedClient = FeedClient & {
  /** Cursors requested so far, per feed id, in call order. */
  readonly calls: Map<string, Array<string | null>>;
};

export type FakeFeedClientOptions = {
  /** Error `checkConnection` rejects with; it resolves when absent. */
  readonly connectionError?: Error;
};

type PageStep = FeedPage | Error | ((signal: AbortSignal | undefined) => Promise<FeedPage>);

/**
 * In-process upstream stand-in. `pages[feedId][n]` answers the n-th page
 * request for that feed (cursor `null` is index 0, cursor "2" index 1, and
 * so on); an `Error` entry is thrown instead.
 */
export function createFakeFeedClient(
  pages: Record<string, ReadonlyArray<PageStep>>,
  info: Record<string, FeedInfo> = {},
  options: FakeFeedClientOptions = {},
): FakeFeedClient {
  const calls = new Map<string, Array<string | null>>();

  return {
    calls,
    fetchPage: async (account, cursor, signal) => {
      const seen = calls.get(account.feedId) ?? [];
      seen.push(cursor);
      calls.set(account.feedId, seen);

      const index = cursor === null ? 0 : Number(cursor) - 1;
      const step = pages[account.feedId]?.[index];
      if (step === undefined) return feedPage([], null);
      if (step instanceof Error) throw step;
      if (typeof step === "function") return step(signal);
      return step;
    },
    fetchFeedInfo: async (feedId) => {
      return (
        info[feedId] ?? { title: null, description: null, avatarUrl: null }
      );
    },
    checkConnection: async () => {
      if (options.connectionError) throw options.connectionError;
    },
  };
}

/** A sync engine over the given fake upstream with a silent logger. */
export function createTestEngine(
  db: AppDatabase,
  feedClient: FeedClient,
  configOverrides?: Partial<AppConfig>,
): SyncEngine {
  return createSyncEngine({
    db,
    feedClient,
    config: createTestConfig(configOverrides),
    logger: pino({ level: "silent" }),
  });
}

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 * Sync procedures run against `feedClient`, which defaults to an empty upstream.
 */
export function createTestCaller(
  db: AppDatabase,
  options: { readonly feedClient?: FeedClient; readonly config?: Partial<AppConfig> } = {},
) {
  const createCaller = createCallerFactory(appRouter);
  const config = createTestConfig(options.config);
  const logger = pino({ level: "silent" });
  const engine = createSyncEngine({
    db,
    feedClient: options.feedClient ?? createFakeFeedClient({}),
    config,
    logger,
  });

  return createCaller({ db, config, logger, engine });
}
