// pattern: Functional Core
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { Logger } from "pino";
import type { SyncEngine } from "../sync";

/**
 * tRPC context type passed to all procedures.
 * Carries the store, configuration, logger and the process's single sync
 * engine, so API-triggered runs share the same rate limiter, cache and
 * per-account run guard as every other caller.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly engine: SyncEngine;
};
