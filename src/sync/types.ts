import type { SyncMode, TerminalSyncStatus } from "../db/schema";

/** One upstream item after payload validation, before normalization. */
export type RawArticle = {
  readonly guid: string;
  readonly title: string;
  readonly author: string | null;
  readonly link: string;
  readonly publishedAt: string | null;
  readonly htmlBody: string;
  readonly coverImageUrl: string | null;
};

export type FeedPage = {
  readonly items: ReadonlyArray<RawArticle>;
  /** `null` together with `hasMore: false` means the feed is exhausted. */
  readonly nextCursor: string | null;
  readonly hasMore: boolean;
};

export type FeedInfo = {
  readonly title: string | null;
  readonly description: string | null;
  readonly avatarUrl: string | null;
};

/** The slice of an account row the sync path reads. */
export type AccountRef = {
  readonly id: number;
  readonly feedId: string;
  readonly name: string;
};

export type NormalizedArticle = {
  readonly guid: string;
  readonly title: string;
  readonly author: string | null;
  readonly url: string;
  readonly contentHtml: string;
  readonly content: string;
  readonly summary: string;
  readonly images: ReadonlyArray<string>;
  readonly coverImage: string | null;
  readonly publishedAt: Date | null;
  readonly wordCount: number;
  readonly readingTimeMinutes: number;
};

export type MergeDecision = "new" | "updated" | "unchanged";

export type MergeOutcome = {
  readonly newCount: number;
  readonly updatedCount: number;
  readonly unchangedCount: number;
  readonly decisions: ReadonlyArray<{ readonly guid: string; readonly decision: MergeDecision }>;
};

export type SyncRunOutcome = {
  readonly runId: number;
  readonly feedId: string;
  readonly accountName: string;
  readonly mode: SyncMode;
  readonly status: TerminalSyncStatus;
  readonly pagesFetched: number;
  readonly fetchedCount: number;
  readonly newCount: number;
  readonly updatedCount: number;
  readonly unchangedCount: number;
  readonly error: string | null;
  readonly stopReason: StopReason;
};

export type StopReason =
  | "exhausted"
  | "caught_up"
  | "page_cap"
  | "cancelled"
  | "fetch_error"
  | "error";

export type AccountSyncResult =
  | { readonly feedId: string; readonly success: true; readonly outcome: SyncRunOutcome }
  | { readonly feedId: string; readonly success: false; readonly error: string };

export type SyncAllResult = {
  readonly totalAccounts: number;
  readonly totalNew: number;
  readonly totalUpdated: number;
  readonly failedAccounts: number;
  readonly results: ReadonlyArray<AccountSyncResult>;
};
