import { CacheEntry } from '../../models';
import { Clock, systemClock } from '../../utils/clock';
import { logger } from '../../utils/logger';

export interface SessionCacheStats {
  size: number;
  hits: number;
  misses: number;
  fetches: number;
  inFlight: number;
}

interface InFlightFetch<T> {
  promise: Promise<T>;
  generation: number;
}

/**
 * TTL cache for expensive per-key lookups.
 *
 * Each key carries its own TTL. A miss starts one fetch which every concurrent
 * reader of that key awaits. Entries are frozen and swapped whole, so a reader
 * sees either the previous value or the new one. Failed fetches propagate to
 * every waiting reader and are not stored.
 */
export class SessionCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();
  private inFlight: Map<string, InFlightFetch<T>> = new Map();
  private generations: Map<string, number> = new Map();
  private hits = 0;
  private misses = 0;
  private fetches = 0;

  constructor(
    private readonly name: string,
    private readonly clock: Clock = systemClock
  ) {}

  async getOrFetch(key: string, ttlMs: number, fetch: () => Promise<T>): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && this.isFresh(entry)) {
      this.hits++;
      return entry.value;
    }

    this.misses++;
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending.promise;
    }

    return this.startFetch(key, ttlMs, fetch);
  }

  /**
   * Fresh cached value, without fetching.
   */
  peek(key: string): T | undefined {
    const entry = this.entries.get(key);
    return entry && this.isFresh(entry) ? entry.value : undefined;
  }

  /**
   * Like peek, but a fresh value counts as a hit.
   */
  lookup(key: string): T | undefined {
    const value = this.peek(key);
    if (value !== undefined) {
      this.hits++;
    }
    return value;
  }

  getEntry(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  invalidate(key: string): void {
    this.entries.delete(key);
    this.inFlight.delete(key);
    this.bumpGeneration(key);
    logger.debug('Cache entry invalidated', { cache: this.name, key });
  }

  clear(): void {
    for (const key of new Set([...this.entries.keys(), ...this.inFlight.keys()])) {
      this.bumpGeneration(key);
    }
    this.entries.clear();
    this.inFlight.clear();
  }

  /**
   * Drops expired entries. Returns how many were removed.
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Forgets every key not in `keys`, fresh or not. Returns how many entries
   * were removed.
   */
  retain(keys: Iterable<string>): number {
    const keep = new Set(keys);
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (!keep.has(key)) {
        this.invalidate(key);
        removed++;
      }
    }
    return removed;
  }

  stats(): SessionCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      fetches: this.fetches,
      inFlight: this.inFlight.size,
    };
  }

  private startFetch(key: string, ttlMs: number, fetch: () => Promise<T>): Promise<T> {
    const generation = this.generations.get(key) ?? 0;
    this.fetches++;

    const promise = (async () => {
      try {
        // Deferred so the in-flight slot is registered before fetch runs.
        const value = await Promise.resolve().then(fetch);
        if ((this.generations.get(key) ?? 0) === generation) {
          const entry: CacheEntry<T> = Object.freeze({
            key,
            value,
            fetchedAt: this.clock.now(),
            ttlMs,
          });
          this.entries.set(key, entry);
        }
        return value;
      } catch (error) {
        logger.debug('Cache fetch failed', { cache: this.name, key, error });
        throw error;
      } finally {
        if (this.inFlight.get(key)?.generation === generation) {
          this.inFlight.delete(key);
        }
      }
    })();

    this.inFlight.set(key, { promise, generation });
    return promise;
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.clock.now() - entry.fetchedAt < entry.ttlMs;
  }

  private bumpGeneration(key: string): void {
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
  }
}
