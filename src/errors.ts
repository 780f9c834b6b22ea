/**
 * Catalog Error Hierarchy
 *
 * Every failure surfaced by the lookup cache and the insight aggregators
 * extends CatalogError and carries a stable error code.
 *
 * @module errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - ENTITY_*: Entity lookup errors (1xxx)
 * - ARGUMENT_*: Caller input errors (2xxx)
 * - AGGREGATION_*: Search aggregation errors (3xxx)
 * - CACHE_*: Cache lifecycle errors (4xxx)
 * - CONFIG_*: Configuration errors (5xxx)
 */
export const ErrorCodes = {
  ENTITY_NOT_FOUND: 'E1001',

  ARGUMENT_INVALID: 'E2001',

  AGGREGATION_DATE_PARSE: 'E3001',

  CACHE_NOT_INITIALIZED: 'E4001',

  CONFIG_VALIDATION_ERROR: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all catalog errors
 */
export class CatalogError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Whether retrying the same call may succeed */
  readonly recoverable: boolean;

  /** Additional details about the error */
  readonly details?: string[];

  constructor(
    message: string,
    options: {
      code: ErrorCode;
      recoverable?: boolean;
      details?: string[];
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'CatalogError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? false;
    this.details = options.details;
  }

  /**
   * Format error for JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Entity Errors
// ============================================================================

export function entityNotFoundMessage(entityType: string, name: string): string {
  return `${entityType} instance for ${name} not found`;
}

/**
 * A lookup by name produced no entity. Backend failures during the lookup are
 * reported the same way; the original failure is kept as `cause`.
 */
export class EntityNotFoundError extends CatalogError {
  readonly entityType: string;
  readonly entityName: string;

  constructor(entityType: string, entityName: string, cause?: unknown) {
    super(entityNotFoundMessage(entityType, entityName), {
      code: ErrorCodes.ENTITY_NOT_FOUND,
      // A backend failure may clear up; a missing entity will not.
      recoverable: cause !== undefined && !(cause instanceof EntityNotFoundError),
      cause,
    });
    this.name = 'EntityNotFoundError';
    this.entityType = entityType;
    this.entityName = entityName;
  }
}

// ============================================================================
// Argument Errors
// ============================================================================

export class InvalidArgumentError extends CatalogError {
  constructor(message: string, details?: string[]) {
    super(message, { code: ErrorCodes.ARGUMENT_INVALID, details });
    this.name = 'InvalidArgumentError';
  }
}

// ============================================================================
// Aggregation Errors
// ============================================================================

/**
 * A histogram bucket key did not match the expected date-time pattern
 */
export class DateParseError extends CatalogError {
  readonly input: string;
  readonly pattern: string;

  constructor(input: string, pattern: string) {
    super(`Unparseable date: "${input}" (expected ${pattern})`, {
      code: ErrorCodes.AGGREGATION_DATE_PARSE,
    });
    this.name = 'DateParseError';
    this.input = input;
    this.pattern = pattern;
  }
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

export class CacheNotInitializedError extends CatalogError {
  constructor(component: string) {
    super(`${component} is not initialized`, { code: ErrorCodes.CACHE_NOT_INITIALIZED });
    this.name = 'CacheNotInitializedError';
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigValidationError extends CatalogError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.join('\n')}`, {
      code: ErrorCodes.CONFIG_VALIDATION_ERROR,
      details: issues,
    });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Type guard for catalog errors
 */
export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}
