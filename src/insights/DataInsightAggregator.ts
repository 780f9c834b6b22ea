/**
 * Data Insight Aggregator
 *
 * Base class for the post-processors that turn a search-engine aggregation
 * result into a chart payload. Aggregators hold no state between calls;
 * every process() walks the aggregations again.
 */

import type { Logger } from 'pino';
import { DateParseError } from '../errors.js';
import { recordInsightRecords } from '../infrastructure/metrics.js';
import type { Aggregations } from './aggregations.js';
import type { DataInsightChartResult, DataInsightChartType } from './types.js';

// Aggregation names shared with the query builders
export const TIMESTAMP = 'timestamp';
export const SERVICE_NAME = 'serviceName';
export const ENTITY_COUNT = 'entityCount';
export const HAS_OWNER_FRACTION = 'hasOwnerFraction';
export const COMPLETED_DESCRIPTION_FRACTION = 'completedDescriptionFraction';

export const DATE_TIME_PATTERN = "yyyy-MM-dd'T'HH:mm:ss.SSS'Z'";
const DATE_TIME_REGEX = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{3})Z$/;

/**
 * Parse a histogram display key (UTC) into epoch milliseconds.
 * Out-of-range fields (month 13, Feb 30, hour 24) are rejected.
 */
export function convertDateTimeStringToTimestamp(dateTimeString: string): number {
  const match = DATE_TIME_REGEX.exec(dateTimeString);
  if (!match) {
    throw new DateParseError(dateTimeString, DATE_TIME_PATTERN);
  }

  const field = (group: number): number => Number(match[group]);
  const year = field(1);
  const month = field(2);
  const day = field(3);
  const hour = field(4);
  const minute = field(5);
  const second = field(6);
  const millis = field(7);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new DateParseError(dateTimeString, DATE_TIME_PATTERN);
  }

  return date.getTime();
}

export abstract class DataInsightAggregator<T> {
  readonly chartType: DataInsightChartType;
  protected readonly aggregations: Aggregations;
  protected readonly log: Logger;

  protected constructor(aggregations: Aggregations, chartType: DataInsightChartType, logger: Logger) {
    this.aggregations = aggregations;
    this.chartType = chartType;
    this.log = logger.child({ component: 'DataInsightAggregator', chartType });
  }

  /**
   * Aggregate and wrap the records in a chart result
   */
  process(): DataInsightChartResult<T> {
    const data = this.aggregate();
    recordInsightRecords(this.chartType, data.length);
    this.log.debug({ records: data.length }, 'Data insight aggregation processed');
    return { chartType: this.chartType, data };
  }

  abstract aggregate(): T[];
}
