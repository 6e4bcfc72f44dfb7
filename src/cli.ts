import pino from "pino";
import { createLogger } from "./logger";
import { bootstrap } from "./bootstrap";
import type { AppRuntime } from "./bootstrap";
import { runCli } from "./cli/commands";

async function main(): Promise<number> {
  // Diagnostics go to stderr; command output owns stdout.
  const logger = createLogger({
    component: "cli",
    level: process.env["LOG_LEVEL"] ?? "warn",
    destination: pino.destination(2),
  });

  let runtime: AppRuntime;
  try {
    runtime = bootstrap(logger);
  } catch (err) {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const abortController = new AbortController();
  const cancel = () => abortController.abort();
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  try {
    return await runCli(process.argv.slice(2), {
      db: runtime.db,
      config: runtime.config,
      engine: runtime.engine,
      logger,
      out: (line) => console.log(line),
      signal: abortController.signal,
    });
  } finally {
    runtime.closeDb();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("fatal error:", err);
    process.exitCode = 1;
  });
