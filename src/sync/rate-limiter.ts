// pattern: Imperative Shell
import { SyncCancelledError } from "./errors";

export type RateLimiterOptions = {
  readonly maxRequests: number;
  readonly windowMs: number;
};

export type RateLimiter = {
  /**
   * Resolves once one more outbound call fits inside the rolling window.
   * Rejects only with `SyncCancelledError` when `signal` aborts first.
   */
  readonly acquire: (signal?: AbortSignal) => Promise<void>;
  /** Number of callers currently queued. */
  readonly pending: () => number;
};

type Waiter = {
  readonly resolve: () => void;
  readonly reject: (err: unknown) => void;
  readonly signal: AbortSignal | undefined;
  onAbort: () => void;
};

/**
 * Sliding-window limiter: at most `maxRequests` grants within any
 * `windowMs` span. Waiters are served strictly in arrival order; a single
 * timer wakes the queue when the oldest grant leaves the window.
 */
export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const { maxRequests, windowMs } = options;
  if (maxRequests < 1 || windowMs < 1) {
    throw new Error("rate limiter needs maxRequests >= 1 and windowMs >= 1");
  }

  const granted: Array<number> = [];
  const queue: Array<Waiter> = [];
  let timer: ReturnType<typeof setTimeout> | null = null;

  const prune = (now: number): void => {
    let oldest = granted[0];
    while (oldest !== undefined && now - oldest >= windowMs) {
      granted.shift();
      oldest = granted[0];
    }
  };

  const drain = (): void => {
    timer = null;
    const now = Date.now();
    prune(now);

    while (queue.length > 0 && granted.length < maxRequests) {
      const waiter = queue.shift();
      if (!waiter) break;
      waiter.signal?.removeEventListener("abort", waiter.onAbort);
      granted.push(now);
      waiter.resolve();
    }

    if (queue.length > 0) {
      const oldest = granted[0] ?? now;
      timer = setTimeout(drain, Math.max(0, oldest + windowMs - now));
    }
  };

  const acquire = (signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) {
      return Promise.reject(new SyncCancelledError("rate limiter wait cancelled"));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal, onAbort: () => {} };

      waiter.onAbort = () => {
        const position = queue.indexOf(waiter);
        if (position !== -1) queue.splice(position, 1);
        if (queue.length === 0 && timer !== null) {
          clearTimeout(timer);
          timer = null;
        }
        waiter.reject(new SyncCancelledError("rate limiter wait cancelled"));
      };

      signal?.addEventListener("abort", waiter.onAbort, { once: true });
      queue.push(waiter);

      if (timer === null) drain();
    });
  };

  return {
    acquire,
    pending: () => queue.length,
  };
}
