/**
 * Walks a `timestamp` date histogram whose buckets hold `serviceName` terms
 * buckets, and emits one record per (time bucket, service bucket) pair in
 * the engine's order. Nothing is merged or re-sorted.
 */

import type { Logger } from 'pino';
import type { Aggregations } from './aggregations.js';
import {
  DataInsightAggregator,
  ENTITY_COUNT,
  SERVICE_NAME,
  TIMESTAMP,
  convertDateTimeStringToTimestamp,
} from './DataInsightAggregator.js';
import type { DataInsightChartType } from './types.js';

export interface ServiceBucketValues {
  timestamp: number;
  serviceName: string;
  entityCount: number;
  /** Sum of the aggregator's numerator metric */
  count: number;
}

export abstract class ServiceFractionAggregator<T> extends DataInsightAggregator<T> {
  /** Name of the sum metric divided by entityCount */
  protected abstract readonly numeratorMetric: string;

  protected constructor(aggregations: Aggregations, chartType: DataInsightChartType, logger: Logger) {
    super(aggregations, chartType, logger);
  }

  aggregate(): T[] {
    const timestampBuckets = this.aggregations.getBuckets(TIMESTAMP);
    const data: T[] = [];

    for (const timestampBucket of timestampBuckets.buckets) {
      const timestamp = convertDateTimeStringToTimestamp(timestampBucket.keyAsString);
      const servicesBuckets = timestampBucket.aggregations.getBuckets(SERVICE_NAME);

      for (const serviceBucket of servicesBuckets.buckets) {
        data.push(
          this.buildRecord({
            timestamp,
            serviceName: serviceBucket.keyAsString,
            entityCount: serviceBucket.aggregations.getValue(ENTITY_COUNT),
            count: serviceBucket.aggregations.getValue(this.numeratorMetric),
          })
        );
      }
    }

    return data;
  }

  protected abstract buildRecord(values: ServiceBucketValues): T;
}
