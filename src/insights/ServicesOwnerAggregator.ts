import type { Logger } from 'pino';
import type { Aggregations } from './aggregations.js';
import { HAS_OWNER_FRACTION } from './DataInsightAggregator.js';
import { ServiceFractionAggregator, type ServiceBucketValues } from './ServiceFractionAggregator.js';
import { DataInsightChartType, type PercentageOfServicesWithOwner } from './types.js';

/**
 * Fraction of each service's entities that have an owner, per time bucket.
 *
 * The division is not guarded: a service bucket with entityCount 0 yields
 * NaN (0/0) or Infinity, and later buckets are still processed.
 */
export class ServicesOwnerAggregator extends ServiceFractionAggregator<PercentageOfServicesWithOwner> {
  protected readonly numeratorMetric = HAS_OWNER_FRACTION;

  constructor(aggregations: Aggregations, logger: Logger) {
    super(aggregations, DataInsightChartType.PERCENTAGE_OF_SERVICES_WITH_OWNER, logger);
  }

  protected buildRecord(values: ServiceBucketValues): PercentageOfServicesWithOwner {
    return Object.freeze({
      timestamp: values.timestamp,
      serviceName: values.serviceName,
      entityCount: values.entityCount,
      hasOwnerCount: values.count,
      hasOwnerFraction: values.count / values.entityCount,
    });
  }
}
