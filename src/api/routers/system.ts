// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";
import { getStats } from "../../db/queries";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    return {
      ...getStats(ctx.db),
      upstream: ctx.config.upstream.baseUrl,
      concurrency: ctx.config.sync.concurrency,
      rateLimit: ctx.config.rateLimit,
    };
  }),
});
