import { initTRPC, TRPCError } from "@trpc/server";
import type { AppContext } from "./context";
import {
  AccountExistsError,
  AccountNotFoundError,
  FetchError,
  SyncInProgressError,
} from "../sync/errors";

const t = initTRPC.context<AppContext>().create();

export const router = t.router;
export const createCallerFactory = t.createCallerFactory;

/**
 * Maps engine errors onto tRPC codes so callers get a status and a single
 * message rather than an internal error.
 */
const engineErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (result.ok) return result;

  const cause = result.error.cause;
  if (cause instanceof AccountNotFoundError) {
    throw new TRPCError({ code: "NOT_FOUND", message: cause.message, cause });
  }
  if (cause instanceof AccountExistsError || cause instanceof SyncInProgressError) {
    throw new TRPCError({ code: "CONFLICT", message: cause.message, cause });
  }
  if (cause instanceof FetchError) {
    throw new TRPCError({ code: "BAD_GATEWAY", message: cause.message, cause });
  }
  return result;
});

/**
 * Public procedure factory for queries and mutations.
 */
export const publicProcedure = t.procedure.use(engineErrors);
