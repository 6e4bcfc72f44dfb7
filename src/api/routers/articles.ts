// pattern: Imperative Shell
import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { router, publicProcedure } from "../trpc";
import { findAccountByFeedId, getArticle, listArticles, setArticleFlags } from "../../db/queries";

/**
 * tRPC router for reading articles and toggling the reader's flags.
 */
export const articlesRouter = router({
  list: publicProcedure
    .input(
      z.object({
        feedId: z.string().min(1).optional(),
        isRead: z.boolean().optional(),
        isFavorite: z.boolean().optional(),
        publishedFrom: z.coerce.date().optional(),
        publishedTo: z.coerce.date().optional(),
        sortBy: z.enum(["publishedAt", "createdAt"]).default("publishedAt"),
        order: z.enum(["asc", "desc"]).default("desc"),
        limit: z.number().int().positive().max(500).default(50),
        offset: z.number().int().nonnegative().default(0),
      }),
    )
    .query(({ ctx, input }) => {
      const { feedId, ...filter } = input;
      if (feedId === undefined) return listArticles(ctx.db, filter);

      const account = findAccountByFeedId(ctx.db, feedId);
      if (!account) return [];
      return listArticles(ctx.db, { ...filter, accountId: account.id });
    }),

  getById: publicProcedure
    .input(z.object({ id: z.number().int() }))
    .query(({ ctx, input }) => {
      return getArticle(ctx.db, input.id) ?? null;
    }),

  setFlags: publicProcedure
    .input(
      z.object({
        id: z.number().int(),
        isRead: z.boolean().optional(),
        isFavorite: z.boolean().optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const { id, ...flags } = input;
      const updated = setArticleFlags(ctx.db, id, flags);
      if (!updated) {
        throw new TRPCError({ code: "NOT_FOUND", message: `article not found: ${id}` });
      }
      return updated;
    }),
});
