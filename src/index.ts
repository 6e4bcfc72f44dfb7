import { createLogger } from "./logger";
import { bootstrap } from "./bootstrap";
import type { AppRuntime } from "./bootstrap";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

async function main(): Promise<void> {
  const logger = createLogger({ component: "server" });

  logger.info("feedsync api starting");
  const abortController = new AbortController();

  let runtime: AppRuntime;
  try {
    runtime = bootstrap(logger, abortController.signal);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  const { config, db, engine, closeDb } = runtime;

  const app = createApiServer({ db, config, logger, engine });
  const server = app.listen(config.server.port, () => {
    logger.info({ port: config.server.port }, "api server listening");
  });

  registerShutdownHandlers({
    abortController,
    drain: engine.whenIdle,
    resources: [
      {
        name: "http server",
        close: () =>
          new Promise<void>((resolve, reject) => {
            server.close((err) => (err ? reject(err) : resolve()));
          }),
      },
      { name: "database", close: closeDb },
    ],
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
