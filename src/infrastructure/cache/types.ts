/**
 * Loading Cache Types
 *
 * Type definitions for the bounded, time-expiring, load-on-miss cache.
 */

/**
 * Cache entry with write-time metadata
 */
export interface CacheEntry<T> {
  value: T;
  /** Write time (epoch ms); expiry is absolute from here, reads do not extend it */
  timestamp: number;
}

/**
 * Cache hit/miss statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  loadSuccesses: number;
  loadFailures: number;
  evictions: number;
  expirations: number;
  size: number;
  hitRate: number;
}

/**
 * Loads the value for a key on a cache miss
 */
export type CacheLoader<T> = (key: string) => Promise<T>;

/**
 * Why a load produced no value
 */
export type LoadFailureReason = 'not_found' | 'load_failed';

/**
 * Outcome of a cache read. Failures are returned, not thrown, so callers
 * decide how to translate them.
 */
export type LoadResult<T> =
  | { ok: true; value: T; cached: boolean }
  | { ok: false; reason: LoadFailureReason; error: unknown };

/**
 * Configuration for a loading cache
 */
export interface LoadingCacheConfig {
  /** Maximum entries before LRU eviction (default: 100) */
  maxEntries: number;
  /** Write-time TTL in milliseconds (default: 120000 - 2 minutes) */
  ttlMs: number;
  /** Expired-entry sweep interval in milliseconds (default: 30000) */
  cleanupIntervalMs: number;
  /** Enable statistics tracking (default: true) */
  enableStats: boolean;
}

export const DEFAULT_LOADING_CACHE_CONFIG: LoadingCacheConfig = {
  maxEntries: 100,
  ttlMs: 120_000, // 2 minutes
  cleanupIntervalMs: 30_000,
  enableStats: true,
};
