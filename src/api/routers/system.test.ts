import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestDatabase,
  seedTestAccount,
  seedTestArticle,
  createTestCaller,
} from "../../test-utils/db";
import type { AppDatabase } from "../../db";

describe("system router", () => {
  let db: AppDatabase;

  beforeEach(() => {
    db = createTestDatabase();
  });

  it("should report empty store statistics", async () => {
    const caller = createTestCaller(db);

    const status = await caller.system.status();
    expect(status).toEqual({
      accounts: 0,
      activeAccounts: 0,
      articles: 0,
      unread: 0,
      favorites: 0,
      lastSyncAt: null,
      upstream: "https://rss.example.com",
      concurrency: 2,
      rateLimit: { maxRequests: 100, windowMs: 1000 },
    });
  });

  it("should count accounts and article flags", async () => {
    const active = seedTestAccount(db, { feedId: "MP_WXS_A" });
    seedTestAccount(db, { feedId: "MP_WXS_B", active: false });
    seedTestArticle(db, active.id, { isRead: true });
    seedTestArticle(db, active.id, { isFavorite: true });
    seedTestArticle(db, active.id);
    const caller = createTestCaller(db);

    const status = await caller.system.status();
    expect(status).toMatchObject({
      accounts: 2,
      activeAccounts: 1,
      articles: 3,
      unread: 2,
      favorites: 1,
    });
  });
});
