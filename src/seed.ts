import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { accounts } from "./db/schema";
import { feedUrlFor } from "./sync/feed-client";

/**
 * Seeds accounts listed in configuration into an empty store.
 *
 * Skipped entirely once any account exists, so the store stays the source of
 * truth after the first run. Seeded accounts use their feed id as the name
 * until a metadata refresh fills in the upstream title.
 */
export function seedDatabase(
  db: AppDatabase,
  config: Pick<AppConfig, "accounts" | "upstream">,
  logger: Logger,
): number {
  const existing = db.select({ id: accounts.id }).from(accounts).limit(1).all();

  if (existing.length > 0) {
    logger.info("accounts already exist, skipping seed");
    return 0;
  }

  if (config.accounts.length === 0) {
    return 0;
  }

  logger.info({ accountCount: config.accounts.length }, "seeding accounts from config");

  db.transaction((tx) => {
    for (const account of config.accounts) {
      tx.insert(accounts)
        .values({
          feedId: account.feedId,
          name: account.name ?? account.feedId,
          feedUrl: feedUrlFor(config.upstream.baseUrl, account.feedId),
          active: account.active,
        })
        .onConflictDoNothing({ target: accounts.feedId })
        .run();
    }
  });

  return config.accounts.length;
}
