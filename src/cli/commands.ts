// pattern: Imperative Shell
import { parseArgs } from "node:util";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import {
  findAccountByFeedId,
  getStats,
  latestSyncRun,
  listAccountSummaries,
  listArticles,
  listSyncRuns,
} from "../db/queries";
import { exportArticles } from "../export";
import type { ExportFormat } from "../export";
import { FetchError, errorMessage, isUsageError } from "../sync/errors";
import type { SyncEngine, SyncRunOutcome } from "../sync";

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_USAGE = 2;

export type CliContext = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly engine: SyncEngine;
  readonly logger: Logger;
  readonly out: (line: string) => void;
  readonly signal?: AbortSignal;
  readonly now?: () => Date;
};

export const USAGE = `usage: feedsync <command> [options]

commands:
  add --feed-id <id> [--name <name>] [--no-sync]   register an account
  sync (--feed-id <id> | --all) [--full]           run a sync
  refresh --feed-id <id>                           refresh account metadata
  accounts                                         list accounts
  articles [--feed-id <id>] [--limit <n>]          list recent articles
  runs [--feed-id <id>] [--limit <n>]              show sync history
  stats                                            store statistics
  test                                             check that the upstream is reachable
  export [--format json|csv] [--feed-id <id>] [--output <path>]`;

class UsageError extends Error {
  override readonly name = "UsageError";
}

const options = {
  "feed-id": { type: "string" },
  name: { type: "string" },
  "no-sync": { type: "boolean", default: false },
  all: { type: "boolean", default: false },
  full: { type: "boolean", default: false },
  limit: { type: "string" },
  format: { type: "string", default: "json" },
  output: { type: "string" },
  help: { type: "boolean", short: "h", default: false },
} as const;

function parseCommandLine(argv: ReadonlyArray<string>) {
  return parseArgs({ args: [...argv], options, allowPositionals: true, strict: true });
}

type ParsedArgs = ReturnType<typeof parseCommandLine>;
type Flags = ParsedArgs["values"];

function parseLimit(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`--limit must be a positive integer, got "${raw}"`);
  }
  return value;
}

function requireFeedId(flags: Flags): string {
  const feedId = flags["feed-id"];
  if (!feedId) throw new UsageError("--feed-id is required");
  return feedId;
}

function formatDate(value: Date | null | undefined): string {
  return value ? value.toISOString() : "-";
}

export function formatOutcome(outcome: SyncRunOutcome): string {
  const counts =
    `fetched=${outcome.fetchedCount} new=${outcome.newCount} ` +
    `updated=${outcome.updatedCount} unchanged=${outcome.unchangedCount} ` +
    `pages=${outcome.pagesFetched}`;
  const error = outcome.error ? ` error="${outcome.error}"` : "";
  return `${outcome.feedId} [${outcome.mode}] ${outcome.status}: ${counts}${error}`;
}

async function addCommand(ctx: CliContext, flags: Flags): Promise<number> {
  const feedId = requireFeedId(flags);
  const result = await ctx.engine.registerAccount(feedId, {
    name: flags.name,
    initialSync: !flags["no-sync"],
    signal: ctx.signal,
  });

  ctx.out(`added ${result.account.feedId} (${result.account.name})`);
  if (result.initialSync) {
    ctx.out(formatOutcome(result.initialSync));
    return result.initialSync.status === "failed" ? EXIT_RUN_FAILED : EXIT_OK;
  }
  return EXIT_OK;
}

async function syncCommand(ctx: CliContext, flags: Flags): Promise<number> {
  const mode = flags.full ? "full" : "incremental";

  if (flags.all) {
    const summary = await ctx.engine.syncAll({ mode, signal: ctx.signal });
    for (const result of summary.results) {
      ctx.out(result.success ? formatOutcome(result.outcome) : `${result.feedId} rejected: ${result.error}`);
    }
    ctx.out(
      `synced ${summary.totalAccounts} accounts: new=${summary.totalNew} ` +
        `updated=${summary.totalUpdated} failed=${summary.failedAccounts}`,
    );
    return summary.failedAccounts > 0 ? EXIT_RUN_FAILED : EXIT_OK;
  }

  if (!flags["feed-id"]) throw new UsageError("sync needs --feed-id <id> or --all");
  const outcome = await ctx.engine.syncAccount(flags["feed-id"], { mode, signal: ctx.signal });
  ctx.out(formatOutcome(outcome));
  return outcome.status === "failed" ? EXIT_RUN_FAILED : EXIT_OK;
}

async function refreshCommand(ctx: CliContext, flags: Flags): Promise<number> {
  const account = await ctx.engine.refreshAccountMetadata(requireFeedId(flags), ctx.signal);
  ctx.out(`refreshed ${account.feedId} (${account.name})`);
  return EXIT_OK;
}

function accountsCommand(ctx: CliContext): number {
  const rows = listAccountSummaries(ctx.db);
  if (rows.length === 0) {
    ctx.out("no accounts");
    return EXIT_OK;
  }
  for (const account of rows) {
    const lastRun = latestSyncRun(ctx.db, account.id);
    const state = account.active ? "active" : "inactive";
    const run = lastRun ? `${lastRun.status} at ${formatDate(lastRun.startedAt)}` : "never synced";
    ctx.out(
      `${account.feedId}\t${account.name}\t${state}\t${account.articleCount} articles\t${run}`,
    );
  }
  return EXIT_OK;
}

function articlesCommand(ctx: CliContext, flags: Flags): number {
  const limit = parseLimit(flags.limit, 20);
  let accountId: number | undefined;
  if (flags["feed-id"]) {
    const account = findAccountByFeedId(ctx.db, flags["feed-id"]);
    if (!account) throw new UsageError(`account not found: ${flags["feed-id"]}`);
    accountId = account.id;
  }

  const rows = listArticles(ctx.db, { accountId, limit });
  if (rows.length === 0) {
    ctx.out("no articles");
    return EXIT_OK;
  }
  for (const article of rows) {
    ctx.out(`${article.id}\t${formatDate(article.publishedAt)}\t${article.title}\t${article.url}`);
  }
  return EXIT_OK;
}

function runsCommand(ctx: CliContext, flags: Flags): number {
  const limit = parseLimit(flags.limit, 20);
  let accountId: number | undefined;
  if (flags["feed-id"]) {
    const account = findAccountByFeedId(ctx.db, flags["feed-id"]);
    if (!account) throw new UsageError(`account not found: ${flags["feed-id"]}`);
    accountId = account.id;
  }

  for (const run of listSyncRuns(ctx.db, { accountId, limit })) {
    const error = run.errorMessage ? `\t${run.errorMessage}` : "";
    ctx.out(
      `${run.id}\t${formatDate(run.startedAt)}\t${run.mode}\t${run.status}\t` +
        `new=${run.newCount} updated=${run.updatedCount} unchanged=${run.unchangedCount}${error}`,
    );
  }
  return EXIT_OK;
}

function statsCommand(ctx: CliContext): number {
  const stats = getStats(ctx.db);
  ctx.out(`accounts: ${stats.accounts} (${stats.activeAccounts} active)`);
  ctx.out(`articles: ${stats.articles} (${stats.unread} unread, ${stats.favorites} favorites)`);
  ctx.out(`last sync: ${formatDate(stats.lastSyncAt)}`);
  return EXIT_OK;
}

async function testCommand(ctx: CliContext): Promise<number> {
  try {
    await ctx.engine.checkUpstream(ctx.signal);
  } catch (err) {
    if (!(err instanceof FetchError)) throw err;
    ctx.out(`upstream ${ctx.config.upstream.baseUrl} unreachable: ${err.message}`);
    return EXIT_RUN_FAILED;
  }
  ctx.out(`upstream ${ctx.config.upstream.baseUrl} reachable`);
  return EXIT_OK;
}

function isExportFormat(value: string): value is ExportFormat {
  return value === "json" || value === "csv";
}

function exportCommand(ctx: CliContext, flags: Flags): number {
  const format = flags.format ?? "json";
  if (!isExportFormat(format)) throw new UsageError(`unsupported export format "${format}"`);

  const feedId = flags["feed-id"];
  if (feedId && !findAccountByFeedId(ctx.db, feedId)) {
    throw new UsageError(`account not found: ${feedId}`);
  }

  const result = exportArticles(ctx.db, {
    format,
    feedId,
    output: flags.output,
    directory: ctx.config.export.directory,
    now: ctx.now?.(),
  });

  ctx.out(result.path ? `exported ${result.count} articles to ${result.path}` : "no articles to export");
  return EXIT_OK;
}

/**
 * Runs one CLI invocation and returns the process exit code. Usage errors
 * print a single line and exit 2; runs ending `failed` exit 1.
 */
export async function runCli(argv: ReadonlyArray<string>, ctx: CliContext): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    ctx.out(`error: ${errorMessage(err)}`);
    ctx.out(USAGE);
    return EXIT_USAGE;
  }

  const [command] = parsed.positionals;
  const flags = parsed.values;
  if (!command || flags.help) {
    ctx.out(USAGE);
    return command ? EXIT_OK : EXIT_USAGE;
  }

  try {
    switch (command) {
      case "add":
        return await addCommand(ctx, flags);
      case "sync":
        return await syncCommand(ctx, flags);
      case "refresh":
        return await refreshCommand(ctx, flags);
      case "accounts":
        return accountsCommand(ctx);
      case "articles":
        return articlesCommand(ctx, flags);
      case "runs":
        return runsCommand(ctx, flags);
      case "stats":
        return statsCommand(ctx);
      case "export":
        return exportCommand(ctx, flags);
      case "test":
        return await testCommand(ctx);
      default:
        throw new UsageError(`unknown command "${command}"`);
    }
  } catch (err) {
    if (err instanceof UsageError || isUsageError(err)) {
      ctx.out(`error: ${err.message}`);
      return EXIT_USAGE;
    }
    const message = errorMessage(err);
    ctx.logger.error({ command, error: message }, "command failed");
    ctx.out(`error: ${message}`);
    return EXIT_RUN_FAILED;
  }
}
