import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Enumerations ----------

export const SYNC_MODES = ["incremental", "full"] as const;
export type SyncMode = (typeof SYNC_MODES)[number];

export const SYNC_STATUSES = ["running", "success", "partial", "failed"] as const;
export type SyncStatus = (typeof SYNC_STATUSES)[number];
export type TerminalSyncStatus = Exclude<SyncStatus, "running">;

// ---------- Tables ----------

export const accounts = sqliteTable("accounts", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  feedId: text("feed_id").notNull().unique(),
  name: text("name").notNull(),
  description: text("description"),
  avatarUrl: text("avatar_url"),
  feedUrl: text("feed_url").notNull(),
  active: integer("active", { mode: "boolean" }).notNull().default(true),
  lastSyncedAt: integer("last_synced_at", { mode: "timestamp" }),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
  updatedAt: integer("updated_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export const articles = sqliteTable(
  "articles",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    accountId: integer("account_id")
      .notNull()
      .references(() => accounts.id),
    guid: text("guid").notNull(),
    title: text("title").notNull(),
    author: text("author"),
    url: text("url").notNull(),
    contentHtml: text("content_html").notNull(),
    content: text("content").notNull(),
    summary: text("summary").notNull(),
    images: text("images", { mode: "json" }).$type<Array<string>>().notNull(),
    coverImage: text("cover_image"),
    publishedAt: integer("published_at", { mode: "timestamp_ms" }),
    wordCount: integer("word_count").notNull().default(0),
    readingTimeMinutes: integer("reading_time_minutes").notNull().default(1),
    isRead: integer("is_read", { mode: "boolean" }).notNull().default(false),
    isFavorite: integer("is_favorite", { mode: "boolean" }).notNull().default(false),
    createdAt: integer("created_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
    updatedAt: integer("updated_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    accountGuidIdx: uniqueIndex("articles_account_guid_idx").on(
      table.accountId,
      table.guid,
    ),
    publishedAtIdx: index("articles_published_at_idx").on(table.publishedAt),
  }),
);

export const syncRuns = sqliteTable(
  "sync_runs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    accountId: integer("account_id")
      .notNull()
      .references(() => accounts.id),
    mode: text("mode", { enum: SYNC_MODES }).notNull(),
    status: text("status", { enum: SYNC_STATUSES }).notNull().default("running"),
    fetchedCount: integer("fetched_count").notNull().default(0),
    newCount: integer("new_count").notNull().default(0),
    updatedCount: integer("updated_count").notNull().default(0),
    unchangedCount: integer("unchanged_count").notNull().default(0),
    pagesFetched: integer("pages_fetched").notNull().default(0),
    errorMessage: text("error_message"),
    startedAt: integer("started_at", { mode: "timestamp_ms" }).notNull(),
    completedAt: integer("completed_at", { mode: "timestamp_ms" }),
    durationMs: integer("duration_ms"),
  },
  (table) => ({
    accountIdIdx: index("sync_runs_account_id_idx").on(table.accountId),
    statusIdx: index("sync_runs_status_idx").on(table.status),
  }),
);

export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
export type Article = typeof articles.$inferSelect;
export type NewArticle = typeof articles.$inferInsert;
export type SyncRun = typeof syncRuns.$inferSelect;
