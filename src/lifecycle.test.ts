import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import pino from "pino";
import { registerShutdownHandlers } from "./lifecycle";
import type { ShutdownDeps, ShutdownHandle } from "./lifecycle";

describe("registerShutdownHandlers", () => {
  let exit: Mock<(code: number) => void>;
  let handles: Array<ShutdownHandle>;

  beforeEach(() => {
    exit = vi.fn<(code: number) => void>();
    handles = [];
  });

  afterEach(() => {
    for (const handle of handles) handle.unregister();
  });

  function register(shutdownDeps: ShutdownDeps): ShutdownHandle {
    const handle = registerShutdownHandlers(shutdownDeps);
    handles.push(handle);
    return handle;
  }

  function deps(overrides: Partial<ShutdownDeps> = {}): ShutdownDeps {
    return {
      abortController: new AbortController(),
      drain: vi.fn().mockResolvedValue(undefined),
      resources: [],
      logger: pino({ level: "silent" }),
      exit,
      ...overrides,
    };
  }

  it("should register SIGTERM and SIGINT handlers on process", () => {
    const sigterm = process.listenerCount("SIGTERM");
    const sigint = process.listenerCount("SIGINT");

    const handle = register(deps());

    expect(process.listenerCount("SIGTERM")).toBe(sigterm + 1);
    expect(process.listenerCount("SIGINT")).toBe(sigint + 1);

    handle.unregister();
    expect(process.listenerCount("SIGTERM")).toBe(sigterm);
    expect(process.listenerCount("SIGINT")).toBe(sigint);
  });

  it("should abort, drain, then close resources in order", async () => {
    const callOrder: Array<string> = [];
    const abortController = new AbortController();
    abortController.signal.addEventListener("abort", () => callOrder.push("abort"));

    const { shutdown } = register(
      deps({
        abortController,
        drain: async () => {
          callOrder.push("drain");
        },
        resources: [
          { name: "http server", close: () => void callOrder.push("http server") },
          { name: "database", close: () => void callOrder.push("database") },
        ],
      }),
    );

    await shutdown("SIGTERM");

    expect(callOrder).toEqual(["abort", "drain", "http server", "database"]);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should keep closing resources after one fails", async () => {
    const closeDb = vi.fn();
    const { shutdown } = register(
      deps({
        resources: [
          {
            name: "http server",
            close: () => {
              throw new Error("already closed");
            },
          },
          { name: "database", close: closeDb },
        ],
      }),
    );

    await shutdown("SIGINT");

    expect(closeDb).toHaveBeenCalled();
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should ignore repeated signals", async () => {
    const drain = vi.fn().mockResolvedValue(undefined);
    const { shutdown } = register(deps({ drain }));

    await shutdown("SIGTERM");
    await shutdown("SIGTERM");

    expect(drain).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });
});
