import type { JsonValue } from "../json/value.js";
import type { FilterAction, RedactionCounts } from "./types.js";

/** Portion of a filter result worth replaying on a cache hit. */
export interface CachedFilterOutcome {
  readonly message: JsonValue;
  readonly actionsTaken: readonly FilterAction[];
  readonly redactionCounts: RedactionCounts;
}

interface CacheEntry {
  readonly storedAt: number;
  readonly expiresAt: number;
  readonly value: CachedFilterOutcome;
}

export interface CacheInsertOptions {
  readonly ttlMs: number;
  readonly maxEntries: number;
}

/** Share of the entries dropped when the cache grows past its capacity. */
const EVICTION_RATIO = 0.1;

/**
 * TTL cache of pipeline outcomes keyed by content hash. Map insertion order
 * doubles as age order, so eviction drops from the head. Values are cloned on
 * the way in and out; callers can mutate what they receive.
 */
export class FilterResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CachedFilterOutcome | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.value);
  }

  set(key: string, value: CachedFilterOutcome, options: CacheInsertOptions): void {
    const storedAt = this.now();
    this.entries.delete(key);
    this.entries.set(key, { storedAt, expiresAt: storedAt + options.ttlMs, value: structuredClone(value) });
    if (this.entries.size > options.maxEntries) {
      this.evictOldest(Math.max(1, Math.ceil(options.maxEntries * EVICTION_RATIO)));
    }
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOldest(count: number): void {
    let remaining = count;
    for (const key of this.entries.keys()) {
      if (remaining <= 0) {
        break;
      }
      this.entries.delete(key);
      remaining -= 1;
    }
  }
}
