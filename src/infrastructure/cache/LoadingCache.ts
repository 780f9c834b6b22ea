/**
 * Loading Cache
 *
 * Per-process, load-on-miss cache with LRU eviction and absolute
 * write-time expiry, whichever triggers first.
 *
 * Features:
 * - LRU eviction when max entries exceeded
 * - Entries expire a fixed time after they were written; reads never extend them
 * - Concurrent misses on one key share a single loader call
 * - Failed loads are reported as a LoadResult and never stored
 * - Periodic sweep of expired entries
 * - Hit/miss statistics and Prometheus counters
 */

import type { Logger } from 'pino';
import { EntityNotFoundError } from '../../errors.js';
import { recordCacheEviction, recordCacheLoad, recordCacheLookup } from '../metrics.js';
import type {
  CacheEntry,
  CacheLoader,
  CacheStats,
  LoadFailureReason,
  LoadingCacheConfig,
  LoadResult,
} from './types.js';
import { DEFAULT_LOADING_CACHE_CONFIG } from './types.js';

export class LoadingCache<T> {
  readonly name: string;
  private cache: Map<string, CacheEntry<T>> = new Map();
  private inflight: Map<string, Promise<LoadResult<T>>> = new Map();
  private readonly loader: CacheLoader<T>;
  private readonly log: Logger;
  private readonly config: LoadingCacheConfig;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  // Bumped by invalidateAll() so loads started earlier are not stored afterwards
  private generation = 0;

  // Statistics
  private hits = 0;
  private misses = 0;
  private loadSuccesses = 0;
  private loadFailures = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(
    name: string,
    loader: CacheLoader<T>,
    logger: Logger,
    config: Partial<LoadingCacheConfig> = {}
  ) {
    this.name = name;
    this.loader = loader;
    this.log = logger.child({ component: 'LoadingCache', cache: name });
    this.config = { ...DEFAULT_LOADING_CACHE_CONFIG, ...config };

    if (!Number.isInteger(this.config.maxEntries) || this.config.maxEntries <= 0) {
      throw new RangeError(`LoadingCache(${name}): maxEntries must be a positive integer`);
    }
    if (!Number.isFinite(this.config.ttlMs) || this.config.ttlMs <= 0) {
      throw new RangeError(`LoadingCache(${name}): ttlMs must be > 0`);
    }

    this.startCleanup();

    this.log.debug(
      {
        maxEntries: this.config.maxEntries,
        ttlMs: this.config.ttlMs,
        cleanupIntervalMs: this.config.cleanupIntervalMs,
      },
      'Loading cache initialized'
    );
  }

  /**
   * Get a value, loading it on a miss
   */
  async get(key: string): Promise<LoadResult<T>> {
    const entry = this.lookup(key);
    if (entry) {
      return { ok: true, value: entry.value, cached: true };
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.log.debug({ key }, 'Joining in-flight load');
      return pending;
    }

    const load: Promise<LoadResult<T>> = this.load(key, this.generation).finally(() => {
      if (this.inflight.get(key) === load) {
        this.inflight.delete(key);
      }
    });
    this.inflight.set(key, load);
    return load;
  }

  /**
   * Get a value only if it is resident and unexpired
   */
  getIfPresent(key: string): T | undefined {
    return this.lookup(key)?.value;
  }

  /**
   * Remove a single key
   */
  invalidate(key: string): boolean {
    return this.cache.delete(key);
  }

  /**
   * Remove every entry and discard loads still in flight
   */
  invalidateAll(): void {
    const size = this.cache.size;
    this.cache.clear();
    this.inflight.clear();
    this.generation++;
    this.log.debug({ entriesCleared: size }, 'Loading cache invalidated');
  }

  /**
   * Remove expired entries from the cache
   */
  cleanUp(): number {
    const now = Date.now();
    let removed = 0;

    this.cache.forEach((entry, key) => {
      if (this.isExpired(entry, now)) {
        this.cache.delete(key);
        removed++;
      }
    });

    if (removed > 0) {
      this.countExpirations(removed);
      this.log.debug({ entriesRemoved: removed }, 'Loading cache cleanup completed');
    }
    return removed;
  }

  /**
   * Get the current number of resident entries
   */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Get cache statistics
   */
  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      loadSuccesses: this.loadSuccesses,
      loadFailures: this.loadFailures,
      evictions: this.evictions,
      expirations: this.expirations,
      size: this.cache.size,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  /**
   * Stop the cleanup interval and drop all entries
   */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.invalidateAll();
    this.log.debug('Loading cache destroyed');
  }

  /**
   * Resident, unexpired entry for a key. Refreshes its LRU position.
   */
  private lookup(key: string): CacheEntry<T> | undefined {
    const entry = this.cache.get(key);

    if (entry && this.isExpired(entry, Date.now())) {
      this.cache.delete(key);
      this.countExpirations(1);
      this.log.debug({ key, ageMs: Date.now() - entry.timestamp }, 'Cache entry expired');
    } else if (entry) {
      // Move to end of Map for LRU tracking (most recently used)
      this.cache.delete(key);
      this.cache.set(key, entry);
      this.countLookup(true);
      return entry;
    }

    this.countLookup(false);
    return undefined;
  }

  private async load(key: string, generation: number): Promise<LoadResult<T>> {
    const start = Date.now();

    try {
      const value = await this.loader(key);
      recordCacheLoad(this.name, 'success', (Date.now() - start) / 1000);
      if (this.config.enableStats) {
        this.loadSuccesses++;
      }

      if (generation === this.generation) {
        this.store(key, value);
      }
      return { ok: true, value, cached: false };
    } catch (error) {
      const reason: LoadFailureReason =
        error instanceof EntityNotFoundError ? 'not_found' : 'load_failed';
      recordCacheLoad(
        this.name,
        reason === 'not_found' ? 'not_found' : 'error',
        (Date.now() - start) / 1000
      );
      if (this.config.enableStats) {
        this.loadFailures++;
      }

      if (reason === 'not_found') {
        this.log.debug({ key }, 'Cache load found no entity');
      } else {
        this.log.warn({ err: error, key }, 'Cache load failed');
      }
      return { ok: false, reason, error };
    }
  }

  private store(key: string, value: T): void {
    if (this.cache.size >= this.config.maxEntries && !this.cache.has(key)) {
      this.evictLRU();
    }
    this.cache.set(key, { value, timestamp: Date.now() });
  }

  /**
   * Evict the least recently used entry (first item in Map)
   */
  private evictLRU(): void {
    const firstKey = this.cache.keys().next().value;
    if (firstKey !== undefined) {
      this.cache.delete(firstKey);
      if (this.config.enableStats) {
        this.evictions++;
      }
      recordCacheEviction(this.name, 'capacity');
      this.log.debug({ key: firstKey }, 'Cache LRU eviction');
    }
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return now - entry.timestamp >= this.config.ttlMs;
  }

  private countLookup(hit: boolean): void {
    recordCacheLookup(this.name, hit);
    if (!this.config.enableStats) {
      return;
    }
    if (hit) {
      this.hits++;
    } else {
      this.misses++;
    }
  }

  private countExpirations(count: number): void {
    recordCacheEviction(this.name, 'expired', count);
    if (this.config.enableStats) {
      this.expirations += count;
    }
  }

  /**
   * Start the cleanup interval
   */
  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanUp();
    }, this.config.cleanupIntervalMs);

    // Don't block process exit
    if (this.cleanupInterval.unref) {
      this.cleanupInterval.unref();
    }
  }
}
