import { and, eq } from "drizzle-orm";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import { articles } from "../db/schema";
import type { Article, NewArticle } from "../db/schema";
import { MergeConflictError } from "./errors";
import type { AccountRef, MergeDecision, MergeOutcome, NormalizedArticle } from "./types";

// Drizzle's transaction handle exposes the same query builder as the database.
type Queryable = Pick<AppDatabase, "select" | "insert" | "update">;

function findExisting(db: Queryable, accountId: number, guid: string): Article | undefined {
  return db
    .select()
    .from(articles)
    .where(and(eq(articles.accountId, accountId), eq(articles.guid, guid)))
    .get();
}

function sameList(a: ReadonlyArray<string>, b: ReadonlyArray<string>): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Fields whose change marks a stored article as updated. Title, author and
 * URL follow along on update but do not trigger one.
 */
export function hasContentChanged(existing: Article, record: NormalizedArticle): boolean {
  return (
    existing.content !== record.content ||
    existing.summary !== record.summary ||
    (existing.publishedAt?.getTime() ?? null) !== (record.publishedAt?.getTime() ?? null) ||
    existing.coverImage !== record.coverImage ||
    !sameList(existing.images, record.images)
  );
}

function mutableFields(record: NormalizedArticle, now: Date) {
  return {
    title: record.title,
    author: record.author,
    url: record.url,
    contentHtml: record.contentHtml,
    content: record.content,
    summary: record.summary,
    images: [...record.images],
    coverImage: record.coverImage,
    publishedAt: record.publishedAt,
    wordCount: record.wordCount,
    readingTimeMinutes: record.readingTimeMinutes,
    updatedAt: now,
  } satisfies Partial<NewArticle>;
}

function updateIfChanged(
  db: Queryable,
  existing: Article,
  record: NormalizedArticle,
  now: Date,
): MergeDecision {
  if (!hasContentChanged(existing, record)) return "unchanged";

  // is_read, is_favorite and created_at are never written by sync.
  db.update(articles)
    .set(mutableFields(record, now))
    .where(eq(articles.id, existing.id))
    .run();
  return "updated";
}

/**
 * Inserts the record, or, when the unique `(account_id, guid)` index reports
 * that another writer got there first, falls through to the update path.
 */
export function insertOrUpdate(
  db: Queryable,
  accountId: number,
  record: NormalizedArticle,
  now: Date,
): MergeDecision {
  const inserted = db
    .insert(articles)
    .values({
      accountId,
      guid: record.guid,
      ...mutableFields(record, now),
      createdAt: now,
    })
    .onConflictDoNothing({ target: [articles.accountId, articles.guid] })
    .returning({ id: articles.id })
    .get();

  if (inserted) return "new";

  const winner = findExisting(db, accountId, record.guid);
  if (!winner) {
    throw new Error("insert conflicted but no existing row was found");
  }
  return updateIfChanged(db, winner, record, now);
}

/**
 * Applies one merge decision atomically: readers see either the old row or
 * the fully updated one.
 */
export function mergeRecord(
  db: AppDatabase,
  account: AccountRef,
  record: NormalizedArticle,
  now: Date = new Date(),
): MergeDecision {
  try {
    return db.transaction((tx) => {
      const existing = findExisting(tx, account.id, record.guid);
      if (!existing) return insertOrUpdate(tx, account.id, record, now);
      return updateIfChanged(tx, existing, record, now);
    });
  } catch (err) {
    throw new MergeConflictError(account.feedId, record.guid, err);
  }
}

/**
 * Reconciles normalized records against the store for one account.
 * Absent guids are inserted, changed ones updated, the rest left alone;
 * nothing is ever deleted.
 * @param account - Owner of every record in the batch
 * @param records - Normalized articles in feed order; a repeated guid sees the earlier write
 * @returns Per-decision counts and the decision taken for each record
 */
export function mergeArticles(
  db: AppDatabase,
  account: AccountRef,
  records: ReadonlyArray<NormalizedArticle>,
  logger: Logger,
): MergeOutcome {
  let newCount = 0;
  let updatedCount = 0;
  let unchangedCount = 0;
  const decisions: Array<{ guid: string; decision: MergeDecision }> = [];

  for (const record of records) {
    const decision = mergeRecord(db, account, record);
    decisions.push({ guid: record.guid, decision });

    switch (decision) {
      case "new":
        newCount++;
        break;
      case "updated":
        updatedCount++;
        break;
      case "unchanged":
        unchangedCount++;
        break;
    }
  }

  logger.debug(
    { feedId: account.feedId, newCount, updatedCount, unchangedCount },
    "merge complete",
  );
  return { newCount, updatedCount, unchangedCount, decisions };
}
