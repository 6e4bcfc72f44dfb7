// pattern: Imperative Shell
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { and, desc, eq, gte, lte } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { accounts, articles } from "../db/schema";

export type ExportFormat = "json" | "csv";

export type ExportRow = {
  readonly id: number;
  readonly feedId: string;
  readonly title: string;
  readonly author: string | null;
  readonly url: string;
  readonly content: string;
  readonly summary: string;
  readonly publishedAt: Date | null;
  readonly wordCount: number;
  readonly createdAt: Date;
};

export type ExportSelection = {
  readonly feedId?: string;
  readonly since?: Date;
  readonly until?: Date;
  readonly limit?: number;
};

const DEFAULT_EXPORT_LIMIT = 1000;

/** Newest-published first, optionally scoped to one account and a date range. */
export function selectArticlesForExport(
  db: AppDatabase,
  selection: ExportSelection = {},
): Array<ExportRow> {
  const conditions: Array<SQL> = [];
  if (selection.feedId !== undefined) conditions.push(eq(accounts.feedId, selection.feedId));
  if (selection.since !== undefined) conditions.push(gte(articles.publishedAt, selection.since));
  if (selection.until !== undefined) conditions.push(lte(articles.publishedAt, selection.until));

  const baseQuery = db
    .select({
      id: articles.id,
      feedId: accounts.feedId,
      title: articles.title,
      author: articles.author,
      url: articles.url,
      content: articles.content,
      summary: articles.summary,
      publishedAt: articles.publishedAt,
      wordCount: articles.wordCount,
      createdAt: articles.createdAt,
    })
    .from(articles)
    .innerJoin(accounts, eq(articles.accountId, accounts.id));

  const queryWithWhere =
    conditions.length > 0 ? baseQuery.where(and(...conditions)) : baseQuery;

  return queryWithWhere
    .orderBy(desc(articles.publishedAt), desc(articles.id))
    .limit(selection.limit ?? DEFAULT_EXPORT_LIMIT)
    .all();
}

export function renderJson(rows: ReadonlyArray<ExportRow>): string {
  const data = rows.map((row) => ({
    id: row.id,
    feed_id: row.feedId,
    title: row.title,
    author: row.author,
    url: row.url,
    content: row.content,
    summary: row.summary,
    published_at: row.publishedAt?.toISOString() ?? null,
    word_count: row.wordCount,
    created_at: row.createdAt.toISOString(),
  }));
  return `${JSON.stringify(data, null, 2)}\n`;
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv(rows: ReadonlyArray<ExportRow>): string {
  const header = ["ID", "Title", "Author", "URL", "Published", "Word Count"];
  const lines = rows.map((row) =>
    [
      row.id,
      row.title,
      row.author ?? "",
      row.url,
      row.publishedAt?.toISOString() ?? "",
      row.wordCount,
    ]
      .map(csvField)
      .join(","),
  );
  return [header.join(","), ...lines].map((line) => `${line}\r\n`).join("");
}

function datestamp(now: Date): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}${m}${d}`;
}

export function defaultExportFilename(
  format: ExportFormat,
  feedId: string | undefined,
  now: Date,
): string {
  return `${feedId ?? "all_articles"}_${datestamp(now)}.${format}`;
}

export type ExportOptions = ExportSelection & {
  readonly format: ExportFormat;
  readonly directory: string;
  readonly output?: string;
  readonly now?: Date;
};

export type ExportResult = {
  readonly count: number;
  readonly path: string | null;
};

/**
 * Writes the selected articles to `output`, or to a dated file under
 * `directory`. Writes nothing when the selection is empty.
 * @param options - Format, optional feed filter and destination
 * @returns Number of exported articles and the written path, or `null` when nothing was written
 */
export function exportArticles(db: AppDatabase, options: ExportOptions): ExportResult {
  const rows = selectArticlesForExport(db, options);
  if (rows.length === 0) return { count: 0, path: null };

  const path =
    options.output ??
    join(options.directory, defaultExportFilename(options.format, options.feedId, options.now ?? new Date()));

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, options.format === "json" ? renderJson(rows) : renderCsv(rows), "utf-8");
  return { count: rows.length, path };
}
