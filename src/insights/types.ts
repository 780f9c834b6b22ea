/**
 * Data insight chart payloads
 */

export const DataInsightChartType = {
  PERCENTAGE_OF_SERVICES_WITH_OWNER: 'PercentageOfServicesWithOwner',
  PERCENTAGE_OF_SERVICES_WITH_DESCRIPTION: 'PercentageOfServicesWithDescription',
} as const;

export type DataInsightChartType = (typeof DataInsightChartType)[keyof typeof DataInsightChartType];

/**
 * Share of a service's entities that have an owner, for one time bucket
 */
export interface PercentageOfServicesWithOwner {
  readonly timestamp: number;
  readonly serviceName: string;
  readonly entityCount: number;
  readonly hasOwnerCount: number;
  /** hasOwnerCount / entityCount, unguarded: NaN or Infinity when entityCount is 0 */
  readonly hasOwnerFraction: number;
}

/**
 * Share of a service's entities that have a description, for one time bucket
 */
export interface PercentageOfServicesWithDescription {
  readonly timestamp: number;
  readonly serviceName: string;
  readonly entityCount: number;
  readonly completedDescriptionCount: number;
  readonly completedDescriptionFraction: number;
}

/**
 * Envelope handed to the presentation layer
 */
export interface DataInsightChartResult<T> {
  readonly chartType: DataInsightChartType;
  readonly data: readonly T[];
}
