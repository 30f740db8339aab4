import type { JsonValue } from "@tool-agents/types";

export interface CacheEntry {
  result: JsonValue;
  /** Monotonic milliseconds */
  cachedAt: number;
}

/**
 * Content-addressed result cache with lazy TTL expiry.
 *
 * Expired entries read as misses but stay in the map until they are
 * overwritten or the cache is cleared. There is no background sweep.
 */
export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly ttlMs: number) {}

  get(key: string, now: number): JsonValue | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    const age = now - entry.cachedAt;
    if (age >= this.ttlMs) {
      return undefined;
    }

    return entry.result;
  }

  put(key: string, result: JsonValue, now: number): void {
    this.entries.set(key, { result, cachedAt: now });
  }

  clear(): void {
    this.entries.clear();
  }

  /** Stored entries, expired ones included */
  get size(): number {
    return this.entries.size;
  }
}
