// pattern: Imperative Shell
import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { router, publicProcedure } from "../trpc";
import {
  findAccountByFeedId,
  latestSyncRun,
  listAccountSummaries,
  setAccountActive,
} from "../../db/queries";
import { SYNC_MODES } from "../../db/schema";

const feedIdInput = z.object({ feedId: z.string().min(1) });

/**
 * tRPC router for tracked accounts: registration, activation, metadata
 * refresh and on-demand sync runs.
 */
export const accountsRouter = router({
  list: publicProcedure
    .input(z.object({ activeOnly: z.boolean().default(false) }).default({}))
    .query(({ ctx, input }) => {
      return listAccountSummaries(ctx.db, input.activeOnly).map((account) => ({
        ...account,
        lastRun: latestSyncRun(ctx.db, account.id) ?? null,
      }));
    }),

  get: publicProcedure.input(feedIdInput).query(({ ctx, input }) => {
    return findAccountByFeedId(ctx.db, input.feedId) ?? null;
  }),

  register: publicProcedure
    .input(
      z.object({
        feedId: z.string().min(1),
        name: z.string().min(1).optional(),
        initialSync: z.boolean().default(true),
      }),
    )
    .mutation(({ ctx, input }) => {
      return ctx.engine.registerAccount(input.feedId, {
        name: input.name,
        initialSync: input.initialSync,
      });
    }),

  setActive: publicProcedure
    .input(z.object({ feedId: z.string().min(1), active: z.boolean() }))
    .mutation(({ ctx, input }) => {
      const updated = setAccountActive(ctx.db, input.feedId, input.active);
      if (!updated) {
        throw new TRPCError({ code: "NOT_FOUND", message: `account not found: ${input.feedId}` });
      }
      return updated;
    }),

  refresh: publicProcedure.input(feedIdInput).mutation(({ ctx, input }) => {
    return ctx.engine.refreshAccountMetadata(input.feedId);
  }),

  sync: publicProcedure
    .input(
      z.object({
        feedId: z.string().min(1),
        mode: z.enum(SYNC_MODES).default("incremental"),
      }),
    )
    .mutation(({ ctx, input }) => {
      return ctx.engine.syncAccount(input.feedId, { mode: input.mode });
    }),

  syncAll: publicProcedure
    .input(z.object({ mode: z.enum(SYNC_MODES).default("incremental") }).default({}))
    .mutation(({ ctx, input }) => {
      return ctx.engine.syncAll({ mode: input.mode });
    }),
});
