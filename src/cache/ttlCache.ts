import { logger } from '../util/logger.js';

/** Milliseconds since the epoch, injectable for tests. */
export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  fetchedAt: number;
}

export interface TtlCacheOptions {
  ttlSeconds: number;
  clock?: Clock;
  /** Label used in debug logs. */
  name?: string;
}

/**
 * Keyed cache whose entries expire a fixed number of seconds after they were
 * fetched. Expired or absent entries are replaced wholesale by the result of
 * the caller's fetch function; a failed fetch leaves the old entry in place.
 *
 * Concurrent lookups for the same key share one in-flight fetch.
 */
export class TtlCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly inFlight = new Map<K, Promise<V>>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly name: string;

  constructor(options: TtlCacheOptions) {
    if (!(options.ttlSeconds >= 0)) {
      throw new RangeError(`ttlSeconds must be a non-negative number, got ${options.ttlSeconds}`);
    }
    this.ttlMs = options.ttlSeconds * 1000;
    this.clock = options.clock ?? Date.now;
    this.name = options.name ?? 'cache';
  }

  async getOrFetch(key: K, fetch: () => Promise<V>): Promise<V> {
    const entry = this.entries.get(key);
    if (entry && this.clock() - entry.fetchedAt < this.ttlMs) {
      logger.debug(`${this.name}: hit for ${String(key)}`);
      return entry.value;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    logger.debug(`${this.name}: ${entry ? 'expired' : 'miss'} for ${String(key)}, fetching`);
    const startedAt = this.clock();
    const request = (async () => {
      try {
        const value = await fetch();
        this.entries.set(key, { value, fetchedAt: startedAt });
        return value;
      } finally {
        this.inFlight.delete(key);
      }
    })();

    this.inFlight.set(key, request);
    return request;
  }
}
