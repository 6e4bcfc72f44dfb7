import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createRateLimiter } from "./rate-limiter";
import { SyncCancelledError } from "./errors";

describe("createRateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should grant up to maxRequests immediately", async () => {
    const limiter = createRateLimiter({ maxRequests: 3, windowMs: 1000 });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.pending()).toBe(0);
  });

  it("should hold the next caller until the oldest grant leaves the window", async () => {
    const limiter = createRateLimiter({ maxRequests: 2, windowMs: 1000 });
    await limiter.acquire();
    await limiter.acquire();

    let granted = false;
    const third = limiter.acquire().then(() => {
      granted = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(granted).toBe(false);
    expect(limiter.pending()).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    await third;
    expect(granted).toBe(true);
    expect(limiter.pending()).toBe(0);
  });

  it("should serve waiters in arrival order", async () => {
    const limiter = createRateLimiter({ maxRequests: 1, windowMs: 100 });
    const order: Array<string> = [];

    const all = Promise.all(
      ["a", "b", "c"].map((name) => limiter.acquire().then(() => order.push(name))),
    );

    await vi.advanceTimersByTimeAsync(250);
    await all;

    expect(order).toEqual(["a", "b", "c"]);
  });

  it("should never grant more than maxRequests within any window", async () => {
    const limiter = createRateLimiter({ maxRequests: 2, windowMs: 1000 });
    const grantTimes: Array<number> = [];

    const all = Promise.all(
      Array.from({ length: 5 }, () => limiter.acquire().then(() => grantTimes.push(Date.now()))),
    );
    await vi.advanceTimersByTimeAsync(3000);
    await all;

    const start = new Date("2024-01-01T00:00:00.000Z").getTime();
    expect(grantTimes.map((t) => t - start)).toEqual([0, 0, 1000, 1000, 2000]);
  });

  it("should reject a queued waiter with SyncCancelledError when its signal aborts", async () => {
    const limiter = createRateLimiter({ maxRequests: 1, windowMs: 1000 });
    await limiter.acquire();

    const controller = new AbortController();
    const waiting = limiter.acquire(controller.signal);
    expect(limiter.pending()).toBe(1);

    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(SyncCancelledError);
    expect(limiter.pending()).toBe(0);
  });

  it("should let later waiters proceed after an earlier one is cancelled", async () => {
    const limiter = createRateLimiter({ maxRequests: 1, windowMs: 1000 });
    await limiter.acquire();

    const controller = new AbortController();
    const cancelled = limiter.acquire(controller.signal);
    const next = limiter.acquire();

    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(SyncCancelledError);

    await vi.advanceTimersByTimeAsync(1000);
    await expect(next).resolves.toBeUndefined();
  });

  it("should reject immediately when the signal is already aborted", async () => {
    const limiter = createRateLimiter({ maxRequests: 1, windowMs: 1000 });
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toThrow(
      "rate limiter wait cancelled",
    );
    expect(limiter.pending()).toBe(0);
  });

  it("should reject invalid options", () => {
    expect(() => createRateLimiter({ maxRequests: 0, windowMs: 1000 })).toThrow();
    expect(() => createRateLimiter({ maxRequests: 1, windowMs: 0 })).toThrow();
  });
});
