/**
 * Data Insight Module
 *
 * Post-processing of search-engine aggregations into chart results.
 */

import type { Logger } from 'pino';
import { InvalidArgumentError } from '../errors.js';
import type { Aggregations } from './aggregations.js';
import { ServicesDescriptionAggregator } from './ServicesDescriptionAggregator.js';
import { ServicesOwnerAggregator } from './ServicesOwnerAggregator.js';
import { DataInsightChartType } from './types.js';

export type {
  DataInsightChartResult,
  PercentageOfServicesWithDescription,
  PercentageOfServicesWithOwner,
} from './types.js';
export { DataInsightChartType } from './types.js';

export type { AggregationBucket, BucketAggregation } from './aggregations.js';
export { Aggregations, parseAggregations, parseSearchResponseAggregations } from './aggregations.js';

export {
  DataInsightAggregator,
  DATE_TIME_PATTERN,
  convertDateTimeStringToTimestamp,
} from './DataInsightAggregator.js';
export { ServiceFractionAggregator, type ServiceBucketValues } from './ServiceFractionAggregator.js';
export { ServicesOwnerAggregator } from './ServicesOwnerAggregator.js';
export { ServicesDescriptionAggregator } from './ServicesDescriptionAggregator.js';

/**
 * Aggregator for a per-service chart type
 */
export function createServiceAggregator(
  chartType: string,
  aggregations: Aggregations,
  logger: Logger
): ServicesOwnerAggregator | ServicesDescriptionAggregator {
  switch (chartType) {
    case DataInsightChartType.PERCENTAGE_OF_SERVICES_WITH_OWNER:
      return new ServicesOwnerAggregator(aggregations, logger);
    case DataInsightChartType.PERCENTAGE_OF_SERVICES_WITH_DESCRIPTION:
      return new ServicesDescriptionAggregator(aggregations, logger);
    default:
      throw new InvalidArgumentError(`Unsupported data insight chart type ${chartType}`);
  }
}
