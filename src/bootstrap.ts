// pattern: Imperative Shell
import { resolve } from "node:path";
import type { Logger } from "pino";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { applyMigrations, createDatabase } from "./db";
import type { AppDatabase } from "./db";
import { seedDatabase } from "./seed";
import { createServices } from "./services";
import type { AppServices } from "./services";

export const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
export const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feedsync.db";
export const MIGRATIONS_PATH = process.env["MIGRATIONS_PATH"] ?? "./migrations";

export type AppRuntime = AppServices & {
  readonly config: AppConfig;
  readonly db: AppDatabase;
  readonly closeDb: () => void;
};

/**
 * Loads configuration, opens and migrates the store, seeds configured
 * accounts and builds the sync services. Throws on configuration errors;
 * callers decide how to report them.
 */
export function bootstrap(logger: Logger, shutdownSignal?: AbortSignal): AppRuntime {
  const config = loadConfig(resolve(CONFIG_PATH));
  logger.info(
    { upstream: config.upstream.baseUrl, concurrency: config.sync.concurrency },
    "config loaded",
  );

  const { db, sqlite, close } = createDatabase(resolve(DATABASE_URL));
  const applied = applyMigrations(sqlite, resolve(MIGRATIONS_PATH));
  if (applied.length > 0) {
    logger.info({ migrations: applied }, "database migrations applied");
  }

  seedDatabase(db, config, logger);

  return { config, db, closeDb: close, ...createServices(db, config, logger, shutdownSignal) };
}
