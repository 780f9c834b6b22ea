/**
 * Catalog Insights Metrics
 *
 * Prometheus-compatible metrics for lookup caches and insight aggregation.
 */

import { Counter, Histogram, Registry } from 'prom-client';

// Create a dedicated registry
export const registry = new Registry();

// ==============================================================================
// Lookup Cache Metrics
// ==============================================================================

export const cacheLookupsTotal = new Counter({
  name: 'catalog_cache_lookups_total',
  help: 'Total lookup cache reads',
  labelNames: ['cache', 'result'] as const,
  registers: [registry],
});

export const cacheLoadsTotal = new Counter({
  name: 'catalog_cache_loads_total',
  help: 'Total loader invocations on cache miss',
  labelNames: ['cache', 'status'] as const,
  registers: [registry],
});

export const cacheLoadDuration = new Histogram({
  name: 'catalog_cache_load_duration_seconds',
  help: 'Loader duration in seconds',
  labelNames: ['cache'] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [registry],
});

export const cacheEvictionsTotal = new Counter({
  name: 'catalog_cache_evictions_total',
  help: 'Total cache entries removed by capacity or expiry',
  labelNames: ['cache', 'cause'] as const,
  registers: [registry],
});

// ==============================================================================
// Data Insight Metrics
// ==============================================================================

export const insightRecordsTotal = new Counter({
  name: 'catalog_insight_records_total',
  help: 'Total records emitted by data insight aggregators',
  labelNames: ['chart_type'] as const,
  registers: [registry],
});

// ==============================================================================
// Helper Functions
// ==============================================================================

export type LoadStatus = 'success' | 'not_found' | 'error';
export type EvictionCause = 'capacity' | 'expired';

export function recordCacheLookup(cache: string, hit: boolean): void {
  cacheLookupsTotal.inc({ cache, result: hit ? 'hit' : 'miss' });
}

export function recordCacheLoad(cache: string, status: LoadStatus, durationSeconds: number): void {
  cacheLoadsTotal.inc({ cache, status });
  cacheLoadDuration.observe({ cache }, durationSeconds);
}

export function recordCacheEviction(cache: string, cause: EvictionCause, count = 1): void {
  cacheEvictionsTotal.inc({ cache, cause }, count);
}

export function recordInsightRecords(chartType: string, count: number): void {
  insightRecordsTotal.inc({ chart_type: chartType }, count);
}

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}
