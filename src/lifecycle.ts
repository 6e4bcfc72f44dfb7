// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents something that can be closed during shutdown (HTTP server,
 * database handle).
 */
export type Closable = {
  readonly name: string;
  readonly close: () => void | Promise<void>;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  /** Aborted first so in-flight sync runs end `partial` instead of `running`. */
  readonly abortController: AbortController;
  /** Awaited after the abort, before any resource is closed. */
  readonly drain: () => Promise<void>;
  readonly resources: ReadonlyArray<Closable>;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
};

export type ShutdownHandle = {
  readonly shutdown: (signal: string) => Promise<void>;
  readonly unregister: () => void;
};

/**
 * Registers SIGTERM and SIGINT handlers for graceful shutdown.
 *
 * - Ignores repeated signals once shutdown has begun
 * - Aborts the shared signal and waits for in-flight work to drain
 * - Closes resources in the given order
 * - A failing close is logged and the remaining ones still run
 *
 * @returns The shutdown function, for callers that need to trigger it
 *   directly, and a way to remove the signal handlers again
 */
export function registerShutdownHandlers(deps: ShutdownDeps): ShutdownHandle {
  let shuttingDown = false;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");
    deps.abortController.abort();
    await deps.drain();

    for (const resource of deps.resources) {
      try {
        await resource.close();
        deps.logger.info({ resource: resource.name }, "resource closed");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ resource: resource.name, error: message }, "error closing resource");
      }
    }

    deps.logger.info("shutdown complete");
    exit(0);
  };

  const handle = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "shutdown failed");
      exit(1);
    });
  };

  process.on("SIGTERM", handle);
  process.on("SIGINT", handle);

  return {
    shutdown,
    unregister: () => {
      process.removeListener("SIGTERM", handle);
      process.removeListener("SIGINT", handle);
    },
  };
}
