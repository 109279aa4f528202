import type { ClockPort } from "../../core/ports/outboundPorts";
import { SystemClock } from "../system/systemPorts";

export type ResponseCacheOptions = {
  defaultTtlMs: number;
  maxEntries: number;
};

type CacheEntry<V> = {
  value: V;
  createdAtMs: number;
  ttlMs: number;
};

export type ResponseCacheSnapshot = {
  name: string;
  size: number;
  maxEntries: number;
  defaultTtlMs: number;
};

/**
 * Memoizes provider results with per-entry TTL and least-recently-used eviction.
 * Map insertion order doubles as recency order: reads re-insert the entry at the tail.
 */
export class ResponseCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    readonly name: string,
    private readonly options: ResponseCacheOptions,
    private readonly clock: ClockPort = new SystemClock(),
  ) {
    if (!(options.defaultTtlMs > 0)) {
      throw new RangeError(
        `defaultTtlMs must be positive, got ${options.defaultTtlMs}.`,
      );
    }

    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new RangeError(
        `maxEntries must be a positive integer, got ${options.maxEntries}.`,
      );
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.isExpired(entry, this.nowMs())) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: V, ttlMs: number = this.options.defaultTtlMs): void {
    this.entries.delete(key);
    this.entries.set(key, { value, createdAtMs: this.nowMs(), ttlMs });

    if (this.entries.size > this.options.maxEntries) {
      this.sweepExpired();
    }

    while (this.entries.size > this.options.maxEntries) {
      const leastRecent = this.entries.keys().next();
      if (leastRecent.done) {
        break;
      }
      this.entries.delete(leastRecent.value);
    }
  }

  /**
   * Drops every expired entry and reports how many were removed.
   */
  sweepExpired(): number {
    const now = this.nowMs();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }

    return removed;
  }

  snapshot(): ResponseCacheSnapshot {
    return {
      name: this.name,
      size: this.entries.size,
      maxEntries: this.options.maxEntries,
      defaultTtlMs: this.options.defaultTtlMs,
    };
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.createdAtMs >= entry.ttlMs;
  }

  private nowMs(): number {
    return this.clock.now().getTime();
  }
}
