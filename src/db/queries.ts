import { and, asc, count, desc, eq, gte, lte, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AppDatabase } from "./index";
import { accounts, articles, syncRuns } from "./schema";
import type { Account, Article, SyncRun } from "./schema";

export function findAccountByFeedId(db: AppDatabase, feedId: string): Account | undefined {
  return db.select().from(accounts).where(eq(accounts.feedId, feedId)).get();
}

export function listAccounts(db: AppDatabase, activeOnly = false): Array<Account> {
  const query = db.select().from(accounts);
  return (activeOnly ? query.where(eq(accounts.active, true)) : query)
    .orderBy(asc(accounts.id))
    .all();
}

export type AccountSummary = Account & { readonly articleCount: number };

/** `listAccounts` with the number of stored articles per account. */
export function listAccountSummaries(
  db: AppDatabase,
  activeOnly = false,
): Array<AccountSummary> {
  const counts = new Map(
    db
      .select({ accountId: articles.accountId, total: count() })
      .from(articles)
      .groupBy(articles.accountId)
      .all()
      .map((row) => [row.accountId, row.total]),
  );

  return listAccounts(db, activeOnly).map((account) => ({
    ...account,
    articleCount: counts.get(account.id) ?? 0,
  }));
}

/** Deactivation is the only way an account leaves the sync set. */
export function setAccountActive(
  db: AppDatabase,
  feedId: string,
  active: boolean,
): Account | undefined {
  return db
    .update(accounts)
    .set({ active, updatedAt: new Date() })
    .where(eq(accounts.feedId, feedId))
    .returning()
    .get();
}

export type ArticleFilter = {
  readonly accountId?: number;
  readonly isRead?: boolean;
  readonly isFavorite?: boolean;
  readonly publishedFrom?: Date;
  readonly publishedTo?: Date;
  readonly sortBy?: "publishedAt" | "createdAt";
  readonly order?: "asc" | "desc";
  readonly limit?: number;
  readonly offset?: number;
};

export function listArticles(db: AppDatabase, filter: ArticleFilter = {}): Array<Article> {
  const conditions: Array<SQL> = [];
  if (filter.accountId !== undefined) {
    conditions.push(eq(articles.accountId, filter.accountId));
  }
  if (filter.isRead !== undefined) {
    conditions.push(eq(articles.isRead, filter.isRead));
  }
  if (filter.isFavorite !== undefined) {
    conditions.push(eq(articles.isFavorite, filter.isFavorite));
  }
  if (filter.publishedFrom !== undefined) {
    conditions.push(gte(articles.publishedAt, filter.publishedFrom));
  }
  if (filter.publishedTo !== undefined) {
    conditions.push(lte(articles.publishedAt, filter.publishedTo));
  }

  const column = filter.sortBy === "createdAt" ? articles.createdAt : articles.publishedAt;
  const direction = filter.order === "asc" ? asc : desc;

  const baseQuery = db.select().from(articles);
  const queryWithWhere =
    conditions.length > 0 ? baseQuery.where(and(...conditions)) : baseQuery;

  return queryWithWhere
    .orderBy(direction(column), direction(articles.id))
    .limit(filter.limit ?? 50)
    .offset(filter.offset ?? 0)
    .all();
}

export function getArticle(db: AppDatabase, id: number): Article | undefined {
  return db.select().from(articles).where(eq(articles.id, id)).get();
}

/**
 * Read/favorite flags belong to the reader; this is the only writer.
 * `updated_at` tracks upstream content, so it is left alone.
 */
export function setArticleFlags(
  db: AppDatabase,
  id: number,
  flags: { readonly isRead?: boolean; readonly isFavorite?: boolean },
): Article | undefined {
  if (flags.isRead === undefined && flags.isFavorite === undefined) {
    return getArticle(db, id);
  }
  return db
    .update(articles)
    .set(flags)
    .where(eq(articles.id, id))
    .returning()
    .get();
}

export function listSyncRuns(
  db: AppDatabase,
  options: { readonly accountId?: number; readonly limit?: number } = {},
): Array<SyncRun> {
  const baseQuery = db.select().from(syncRuns);
  const queryWithWhere =
    options.accountId !== undefined
      ? baseQuery.where(eq(syncRuns.accountId, options.accountId))
      : baseQuery;

  return queryWithWhere
    .orderBy(desc(syncRuns.startedAt), desc(syncRuns.id))
    .limit(options.limit ?? 20)
    .all();
}

export function latestSyncRun(db: AppDatabase, accountId?: number): SyncRun | undefined {
  return listSyncRuns(db, { accountId, limit: 1 })[0];
}

export type StoreStats = {
  readonly accounts: number;
  readonly activeAccounts: number;
  readonly articles: number;
  readonly unread: number;
  readonly favorites: number;
  readonly lastSyncAt: Date | null;
};

export function getStats(db: AppDatabase): StoreStats {
  const accountCounts = db
    .select({
      total: count(),
      active: sql<number>`coalesce(sum(case when ${accounts.active} then 1 else 0 end), 0)`,
    })
    .from(accounts)
    .get();

  const articleCounts = db
    .select({
      total: count(),
      unread: sql<number>`coalesce(sum(case when ${articles.isRead} then 0 else 1 end), 0)`,
      favorites: sql<number>`coalesce(sum(case when ${articles.isFavorite} then 1 else 0 end), 0)`,
    })
    .from(articles)
    .get();

  const lastRun = latestSyncRun(db);

  return {
    accounts: accountCounts?.total ?? 0,
    activeAccounts: accountCounts?.active ?? 0,
    articles: articleCounts?.total ?? 0,
    unread: articleCounts?.unread ?? 0,
    favorites: articleCounts?.favorites ?? 0,
    lastSyncAt: lastRun?.completedAt ?? lastRun?.startedAt ?? null,
  };
}
