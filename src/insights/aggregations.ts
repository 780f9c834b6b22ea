/**
 * Search Aggregation Model
 *
 * Typed, read-only view over the `aggregations` section of a search-engine
 * response. Bucket aggregations (date histograms, terms) keep the engine's
 * bucket order; single-value metrics (sum, avg, ...) expose their value.
 *
 * Names returned with `typed_keys` (e.g. `sum#entityCount`) are stored
 * under their plain name.
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface AggregationBucket {
  readonly key: string | number;
  /** Display key; the engine's `key_as_string`, else the stringified key */
  readonly keyAsString: string;
  readonly docCount: number;
  readonly aggregations: Aggregations;
}

export interface BucketAggregation {
  readonly name: string;
  readonly buckets: readonly AggregationBucket[];
}

/**
 * Named sub-aggregations of a response or of a bucket
 */
export class Aggregations {
  private readonly bucketAggregations: ReadonlyMap<string, BucketAggregation>;
  private readonly metrics: ReadonlyMap<string, number>;

  constructor(
    bucketAggregations: ReadonlyMap<string, BucketAggregation>,
    metrics: ReadonlyMap<string, number>
  ) {
    this.bucketAggregations = bucketAggregations;
    this.metrics = metrics;
  }

  getBuckets(name: string): BucketAggregation {
    const aggregation = this.bucketAggregations.get(name);
    if (!aggregation) {
      throw new InvalidArgumentError(`Missing bucket aggregation ${name}`);
    }
    return aggregation;
  }

  /**
   * Value of a single-value metric. A null engine value (no documents)
   * reads as NaN.
   */
  getValue(name: string): number {
    const value = this.metrics.get(name);
    if (value === undefined) {
      throw new InvalidArgumentError(`Missing metric aggregation ${name}`);
    }
    return value;
  }
}

// --------------------------------------------------------------------------
// Parsing
// --------------------------------------------------------------------------

const rawContainerSchema = z.record(z.unknown());

const rawBucketAggregationSchema = z.object({
  buckets: z.array(z.unknown()),
});

const rawMetricSchema = z.object({
  value: z.number().nullable(),
});

const rawBucketSchema = z
  .object({
    key: z.union([z.string(), z.number()]),
    key_as_string: z.string().optional(),
    doc_count: z.number().int().nonnegative(),
  })
  .passthrough();

const searchResponseSchema = z.object({
  aggregations: rawContainerSchema,
});

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

function stripTypedKey(name: string): string {
  const separator = name.indexOf('#');
  return separator >= 0 ? name.slice(separator + 1) : name;
}

function parseBucket(raw: unknown, path: string): AggregationBucket {
  const result = rawBucketSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid aggregation bucket at ${path}`, formatIssues(result.error));
  }

  const { key, key_as_string: keyAsString, doc_count: docCount, ...subAggregations } = result.data;
  return {
    key,
    keyAsString: keyAsString ?? String(key),
    docCount,
    aggregations: parseAggregations(subAggregations, path),
  };
}

/**
 * Parse an engine `aggregations` object. Entries that are neither bucket
 * aggregations nor single-value metrics (top_hits, stats, ...) are skipped.
 */
export function parseAggregations(raw: unknown, path = 'aggregations'): Aggregations {
  const container = rawContainerSchema.safeParse(raw);
  if (!container.success) {
    throw new InvalidArgumentError(`Invalid aggregations at ${path}`, formatIssues(container.error));
  }

  const bucketAggregations = new Map<string, BucketAggregation>();
  const metrics = new Map<string, number>();

  for (const [rawName, value] of Object.entries(container.data)) {
    const name = stripTypedKey(rawName);

    const bucketAggregation = rawBucketAggregationSchema.safeParse(value);
    if (bucketAggregation.success) {
      bucketAggregations.set(name, {
        name,
        buckets: bucketAggregation.data.buckets.map((bucket, i) =>
          parseBucket(bucket, `${path}.${name}.buckets[${i}]`)
        ),
      });
      continue;
    }

    const metric = rawMetricSchema.safeParse(value);
    if (metric.success) {
      metrics.set(name, metric.data.value ?? NaN);
    }
  }

  return new Aggregations(bucketAggregations, metrics);
}

/**
 * Parse the aggregations of a full search response body
 */
export function parseSearchResponseAggregations(response: unknown): Aggregations {
  const result = searchResponseSchema.safeParse(response);
  if (!result.success) {
    throw new InvalidArgumentError('Search response has no aggregations', formatIssues(result.error));
  }
  return parseAggregations(result.data.aggregations);
}
