// pattern: Imperative Shell
import { and, eq, gt, lte } from "drizzle-orm";
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { accounts, syncRuns } from "../db/schema";
import type { Account, SyncMode, TerminalSyncStatus } from "../db/schema";
import { findAccountByFeedId, listAccounts } from "../db/queries";
import {
  AccountExistsError,
  AccountNotFoundError,
  FetchError,
  SyncCancelledError,
  SyncInProgressError,
  errorMessage,
} from "./errors";
import { feedUrlFor } from "./feed-client";
import type { FeedClient } from "./feed-client";
import { mergeArticles } from "./merge";
import { normalizeArticle } from "./normalizer";
import type {
  AccountRef,
  AccountSyncResult,
  FeedPage,
  MergeOutcome,
  StopReason,
  SyncAllResult,
  SyncRunOutcome,
} from "./types";

export type SyncEngineDeps = {
  readonly db: AppDatabase;
  readonly feedClient: FeedClient;
  readonly config: Pick<AppConfig, "sync" | "upstream">;
  readonly logger: Logger;
  /** Process-wide cancellation; aborting it cancels every run, present and future. */
  readonly shutdownSignal?: AbortSignal;
};

export type SyncOptions = {
  readonly mode?: SyncMode;
  readonly signal?: AbortSignal;
};

export type RegisterOptions = {
  readonly name?: string;
  readonly initialSync?: boolean;
  readonly signal?: AbortSignal;
};

export type RegisterResult = {
  readonly account: Account;
  readonly initialSync: SyncRunOutcome | null;
};

export type SyncEngine = {
  readonly syncAccount: (feedId: string, options?: SyncOptions) => Promise<SyncRunOutcome>;
  readonly syncAll: (options?: SyncOptions) => Promise<SyncAllResult>;
  readonly registerAccount: (feedId: string, options?: RegisterOptions) => Promise<RegisterResult>;
  readonly refreshAccountMetadata: (feedId: string, signal?: AbortSignal) => Promise<Account>;
  /** Rejects with `FetchError` when the upstream cannot be reached. */
  readonly checkUpstream: (signal?: AbortSignal) => Promise<void>;
  readonly isRunning: (feedId: string) => boolean;
  /** Resolves once every run in flight has reached a terminal status. */
  readonly whenIdle: () => Promise<void>;
};

export const ABANDONED_RUN_MESSAGE = "abandoned: no terminal status recorded";

type RunProgress = {
  pagesFetched: number;
  fetchedCount: number;
  newCount: number;
  updatedCount: number;
  unchangedCount: number;
};

/**
 * Decides whether paging stops after a merged page. `null` means fetch the
 * next cursor. Incremental runs stop at the first page whose items were all
 * already stored unchanged, which assumes newest-first feed order.
 */
export function stopAfterPage(input: {
  readonly mode: SyncMode;
  readonly page: FeedPage;
  readonly outcome: MergeOutcome;
  readonly pagesFetched: number;
  readonly maxPages: number;
}): StopReason | null {
  const { mode, page, outcome, pagesFetched, maxPages } = input;
  const itemCount = page.items.length;

  if (mode === "incremental" && itemCount > 0 && outcome.unchangedCount === itemCount) {
    return "caught_up";
  }
  if (itemCount === 0 || !page.hasMore || page.nextCursor === null) return "exhausted";
  if (pagesFetched >= maxPages) return "page_cap";
  return null;
}

export function terminalStatus(reason: StopReason, pagesFetched: number): TerminalSyncStatus {
  switch (reason) {
    case "exhausted":
    case "caught_up":
    case "page_cap":
      return "success";
    case "cancelled":
      return "partial";
    case "fetch_error":
      return pagesFetched > 0 ? "partial" : "failed";
    case "error":
      return "failed";
    default: {
      const _exhaustive: never = reason;
      throw new Error(`unknown stop reason: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Creates the sync engine. One instance owns the per-account run guard, so
 * a process should construct exactly one and pass it where needed.
 * @param deps - Store, upstream client, sync settings, logger and an optional shutdown signal
 * @returns The SyncEngine operations bound to those dependencies
 */
export function createSyncEngine(deps: SyncEngineDeps): SyncEngine {
  const { db, feedClient, config, logger, shutdownSignal } = deps;
  const activeRuns = new Map<string, Promise<SyncRunOutcome>>();

  function runSignal(signal: AbortSignal | undefined): AbortSignal | undefined {
    if (!shutdownSignal) return signal;
    if (!signal) return shutdownSignal;
    return AbortSignal.any([signal, shutdownSignal]);
  }

  /**
   * Inserts the `running` row, refusing when the store already holds a
   * fresh `running` row for the account (another process). Rows older than
   * `staleRunMinutes` are closed as `failed` first.
   */
  function openRun(account: Account, mode: SyncMode, startedAt: Date): number {
    const staleBefore = new Date(startedAt.getTime() - config.sync.staleRunMinutes * 60_000);

    return db.transaction(
      (tx) => {
        const running = tx
          .select({ id: syncRuns.id })
          .from(syncRuns)
          .where(
            and(
              eq(syncRuns.accountId, account.id),
              eq(syncRuns.status, "running"),
              gt(syncRuns.startedAt, staleBefore),
            ),
          )
          .get();

        if (running) throw new SyncInProgressError(account.feedId);

        const abandoned = tx
          .update(syncRuns)
          .set({ status: "failed", errorMessage: ABANDONED_RUN_MESSAGE, completedAt: startedAt })
          .where(
            and(
              eq(syncRuns.accountId, account.id),
              eq(syncRuns.status, "running"),
              lte(syncRuns.startedAt, staleBefore),
            ),
          )
          .returning({ id: syncRuns.id })
          .all();
        if (abandoned.length > 0) {
          logger.warn(
            { feedId: account.feedId, runIds: abandoned.map((r) => r.id) },
            "closed abandoned sync runs",
          );
        }

        return tx
          .insert(syncRuns)
          .values({ accountId: account.id, mode, status: "running", startedAt })
          .returning({ id: syncRuns.id })
          .get().id;
      },
      { behavior: "immediate" },
    );
  }

  function closeRun(
    runId: number,
    status: TerminalSyncStatus,
    progress: RunProgress,
    error: string | null,
    startedAt: Date,
  ): void {
    const completedAt = new Date();
    db.update(syncRuns)
      .set({
        status,
        ...progress,
        errorMessage: error,
        completedAt,
        durationMs: completedAt.getTime() - startedAt.getTime(),
      })
      .where(and(eq(syncRuns.id, runId), eq(syncRuns.status, "running")))
      .run();
  }

  async function runPages(
    account: AccountRef,
    mode: SyncMode,
    signal: AbortSignal | undefined,
  ): Promise<{ progress: RunProgress; reason: StopReason; error: string | null }> {
    const progress: RunProgress = {
      pagesFetched: 0,
      fetchedCount: 0,
      newCount: 0,
      updatedCount: 0,
      unchangedCount: 0,
    };
    let cursor: string | null = null;

    try {
      for (;;) {
        if (signal?.aborted) {
          return { progress, reason: "cancelled", error: null };
        }

        const page = await feedClient.fetchPage(account, cursor, signal);
        const records = page.items.map((item) =>
          normalizeArticle(item, { fallbackAuthor: account.name }),
        );
        const outcome = mergeArticles(db, account, records, logger);

        progress.pagesFetched++;
        progress.fetchedCount += page.items.length;
        progress.newCount += outcome.newCount;
        progress.updatedCount += outcome.updatedCount;
        progress.unchangedCount += outcome.unchangedCount;

        const reason = stopAfterPage({
          mode,
          page,
          outcome,
          pagesFetched: progress.pagesFetched,
          maxPages: config.sync.maxPagesPerRun,
        });
        if (reason) {
          if (reason === "page_cap") {
            logger.warn(
              { feedId: account.feedId, maxPages: config.sync.maxPagesPerRun },
              "page cap reached, stopping",
            );
          }
          return { progress, reason, error: null };
        }
        cursor = page.nextCursor;
      }
    } catch (err) {
      if (err instanceof SyncCancelledError) {
        return { progress, reason: "cancelled", error: null };
      }
      if (err instanceof FetchError) {
        return { progress, reason: "fetch_error", error: err.message };
      }
      return { progress, reason: "error", error: errorMessage(err) };
    }
  }

  async function executeRun(
    account: Account,
    mode: SyncMode,
    signal: AbortSignal | undefined,
  ): Promise<SyncRunOutcome> {
    const startedAt = new Date();
    const runId = openRun(account, mode, startedAt);
    logger.info({ feedId: account.feedId, runId, mode }, "sync started");

    const { progress, reason, error } = await runPages(account, mode, signal);
    const status = terminalStatus(reason, progress.pagesFetched);
    closeRun(runId, status, progress, error, startedAt);

    if (status !== "failed") {
      db.update(accounts)
        .set({ lastSyncedAt: new Date() })
        .where(eq(accounts.id, account.id))
        .run();
    }

    const outcome: SyncRunOutcome = {
      runId,
      feedId: account.feedId,
      accountName: account.name,
      mode,
      status,
      ...progress,
      error,
      stopReason: reason,
    };

    if (status === "success") {
      logger.info({ ...outcome }, "sync finished");
    } else {
      logger.warn({ ...outcome }, "sync finished with errors");
    }
    return outcome;
  }

  async function syncAccount(feedId: string, options: SyncOptions = {}): Promise<SyncRunOutcome> {
    const account = findAccountByFeedId(db, feedId);
    if (!account) throw new AccountNotFoundError(feedId);
    if (activeRuns.has(feedId)) throw new SyncInProgressError(feedId);

    const run = executeRun(account, options.mode ?? "incremental", runSignal(options.signal));
    activeRuns.set(feedId, run);
    try {
      return await run;
    } finally {
      activeRuns.delete(feedId);
    }
  }

  async function syncAll(options: SyncOptions = {}): Promise<SyncAllResult> {
    const targets = listAccounts(db, true);
    if (targets.length === 0) {
      logger.warn("no active accounts to sync");
    }

    const limit = pLimit(config.sync.concurrency);
    const results = await Promise.all(
      targets.map((account) =>
        limit(async (): Promise<AccountSyncResult> => {
          try {
            const outcome = await syncAccount(account.feedId, options);
            return { feedId: account.feedId, success: true, outcome };
          } catch (err) {
            const message = errorMessage(err);
            logger.error({ feedId: account.feedId, error: message }, "account sync rejected");
            return { feedId: account.feedId, success: false, error: message };
          }
        }),
      ),
    );

    const outcomes = results.flatMap((r) => (r.success ? [r.outcome] : []));
    const summary: SyncAllResult = {
      totalAccounts: targets.length,
      totalNew: outcomes.reduce((sum, o) => sum + o.newCount, 0),
      totalUpdated: outcomes.reduce((sum, o) => sum + o.updatedCount, 0),
      failedAccounts: results.filter((r) => !r.success || r.outcome.status === "failed").length,
      results,
    };

    logger.info(
      {
        totalAccounts: summary.totalAccounts,
        totalNew: summary.totalNew,
        totalUpdated: summary.totalUpdated,
        failedAccounts: summary.failedAccounts,
      },
      "sync all complete",
    );
    return summary;
  }

  async function registerAccount(
    feedId: string,
    options: RegisterOptions = {},
  ): Promise<RegisterResult> {
    if (findAccountByFeedId(db, feedId)) throw new AccountExistsError(feedId);

    const info = await feedClient.fetchFeedInfo(feedId, runSignal(options.signal));
    // A concurrent registration may have won while the metadata was fetched.
    const account = db
      .insert(accounts)
      .values({
        feedId,
        name: options.name ?? info.title ?? feedId,
        description: info.description,
        avatarUrl: info.avatarUrl,
        feedUrl: feedUrlFor(config.upstream.baseUrl, feedId),
      })
      .onConflictDoNothing({ target: accounts.feedId })
      .returning()
      .get();
    if (!account) throw new AccountExistsError(feedId);

    logger.info({ feedId, name: account.name }, "account registered");

    if (options.initialSync === false) {
      return { account, initialSync: null };
    }

    const initialSync = await syncAccount(feedId, { mode: "full", signal: options.signal });
    return { account, initialSync };
  }

  async function refreshAccountMetadata(feedId: string, signal?: AbortSignal): Promise<Account> {
    const existing = findAccountByFeedId(db, feedId);
    if (!existing) throw new AccountNotFoundError(feedId);

    const info = await feedClient.fetchFeedInfo(feedId, runSignal(signal));
    const updated = db
      .update(accounts)
      .set({
        name: info.title ?? existing.name,
        description: info.description ?? existing.description,
        avatarUrl: info.avatarUrl ?? existing.avatarUrl,
        updatedAt: new Date(),
      })
      .where(eq(accounts.id, existing.id))
      .returning()
      .get();

    logger.info({ feedId, name: updated.name }, "account metadata refreshed");
    return updated;
  }

  return {
    syncAccount,
    syncAll,
    registerAccount,
    refreshAccountMetadata,
    checkUpstream: (signal) => feedClient.checkConnection(runSignal(signal)),
    isRunning: (feedId) => activeRuns.has(feedId),
    whenIdle: async () => {
      await Promise.allSettled([...activeRuns.values()]);
    },
  };
}
