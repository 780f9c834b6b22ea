/**
 * Catalog Insights
 *
 * Entity lookup caching for tags, classifications, glossaries and glossary
 * terms, and data insight post-processing of search aggregations.
 */

export { loadConfig, getConfig, resetConfig, type Config } from './config.js';
export {
  CatalogError,
  CacheNotInitializedError,
  ConfigValidationError,
  DateParseError,
  EntityNotFoundError,
  ErrorCodes,
  InvalidArgumentError,
  entityNotFoundMessage,
  isCatalogError,
  type ErrorCode,
} from './errors.js';
export { createLogger, logger } from './utils/logger.js';
export * as FullyQualifiedName from './utils/fqn.js';
export { registry as metricsRegistry, getMetrics } from './infrastructure/metrics.js';

export * from './infrastructure/cache/index.js';
export * from './types/entities.js';
export {
  Fields,
  type EntityRepository,
  type LookupRepositories,
  type RequestContext,
} from './repositories/EntityRepository.js';
export {
  EntityLookupCache,
  DEFAULT_MAX_ENTRIES,
  getSharedLookupCache,
  initializeSharedLookupCache,
  lookupCacheOptionsFromConfig,
  resetSharedLookupCache,
  type EntityLookupCacheOptions,
  type EntityLookupCacheStats,
} from './services/EntityLookupCache.js';
export * from './insights/index.js';
