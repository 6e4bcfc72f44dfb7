// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { findAccountByFeedId, latestSyncRun, listSyncRuns } from "../../db/queries";

/**
 * tRPC router over the append-only sync history.
 */
export const syncRunsRouter = router({
  list: publicProcedure
    .input(
      z
        .object({
          feedId: z.string().min(1).optional(),
          limit: z.number().int().positive().max(200).default(20),
        })
        .default({}),
    )
    .query(({ ctx, input }) => {
      if (input.feedId === undefined) return listSyncRuns(ctx.db, { limit: input.limit });

      const account = findAccountByFeedId(ctx.db, input.feedId);
      if (!account) return [];
      return listSyncRuns(ctx.db, { accountId: account.id, limit: input.limit });
    }),

  latest: publicProcedure
    .input(z.object({ feedId: z.string().min(1) }))
    .query(({ ctx, input }) => {
      const account = findAccountByFeedId(ctx.db, input.feedId);
      if (!account) return null;
      return latestSyncRun(ctx.db, account.id) ?? null;
    }),
});
