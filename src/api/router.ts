// pattern: Imperative Shell
import { router } from "./trpc";
import { accountsRouter } from "./routers/accounts";
import { articlesRouter } from "./routers/articles";
import { syncRunsRouter } from "./routers/sync-runs";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: accounts and their sync runs, articles, and store stats.
 */
export const appRouter = router({
  accounts: accountsRouter,
  articles: articlesRouter,
  syncRuns: syncRunsRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
