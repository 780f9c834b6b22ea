/**
 * Loading Cache Module
 *
 * Bounded, time-expiring, load-on-miss cache used by the entity lookups.
 */

// Types
export type {
  CacheEntry,
  CacheStats,
  CacheLoader,
  LoadFailureReason,
  LoadResult,
  LoadingCacheConfig,
} from './types.js';

export { DEFAULT_LOADING_CACHE_CONFIG } from './types.js';

// Cache implementation
export { LoadingCache } from './LoadingCache.js';
