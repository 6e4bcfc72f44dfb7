// pattern: Imperative Shell

export type ResponseCacheOptions = {
  readonly ttlMs: number;
  readonly enabled?: boolean;
  readonly now?: () => number;
};

export type ResponseCache<T> = {
  readonly get: (key: string) => T | undefined;
  readonly put: (key: string, value: T, ttlMs?: number) => void;
};

type Entry<T> = {
  readonly value: T;
  readonly expiresAt: number;
};

/**
 * In-memory TTL cache for upstream read results. Entries expire `ttlMs`
 * after insertion and are evicted when next looked up. A disabled cache
 * stores nothing and always misses.
 */
export function createResponseCache<T>(options: ResponseCacheOptions): ResponseCache<T> {
  const entries = new Map<string, Entry<T>>();
  const now = options.now ?? Date.now;
  const enabled = options.enabled ?? true;

  return {
    get: (key) => {
      const entry = entries.get(key);
      if (!entry) return undefined;
      if (now() >= entry.expiresAt) {
        entries.delete(key);
        return undefined;
      }
      return entry.value;
    },
    put: (key, value, ttlMs) => {
      if (!enabled) return;
      entries.set(key, { value, expiresAt: now() + (ttlMs ?? options.ttlMs) });
    },
  };
}

/** Cache key for one upstream page: `feedId` plus the page cursor. */
export function pageCacheKey(feedId: string, cursor: string | null): string {
  return `page:${feedId}:${cursor ?? "first"}`;
}
