import type { Logger } from 'pino';
import type { Aggregations } from './aggregations.js';
import { COMPLETED_DESCRIPTION_FRACTION } from './DataInsightAggregator.js';
import { ServiceFractionAggregator, type ServiceBucketValues } from './ServiceFractionAggregator.js';
import { DataInsightChartType, type PercentageOfServicesWithDescription } from './types.js';

/**
 * Fraction of each service's entities with a description, per time bucket
 */
export class ServicesDescriptionAggregator extends ServiceFractionAggregator<PercentageOfServicesWithDescription> {
  protected readonly numeratorMetric = COMPLETED_DESCRIPTION_FRACTION;

  constructor(aggregations: Aggregations, logger: Logger) {
    super(aggregations, DataInsightChartType.PERCENTAGE_OF_SERVICES_WITH_DESCRIPTION, logger);
  }

  protected buildRecord(values: ServiceBucketValues): PercentageOfServicesWithDescription {
    return Object.freeze({
      timestamp: values.timestamp,
      serviceName: values.serviceName,
      entityCount: values.entityCount,
      completedDescriptionCount: values.count,
      completedDescriptionFraction: values.count / values.entityCount,
    });
  }
}
