import { z } from 'zod';
import { ConfigValidationError } from './errors.js';

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Lookup cache
  cacheTtlMs: z.number().int().min(1).default(120_000), // absolute write-time expiry
  cacheCleanupIntervalMs: z.number().int().min(1000).default(30_000),
  tagCacheMaxEntries: z.number().int().min(1).default(100),
  classificationCacheMaxEntries: z.number().int().min(1).default(25),
  glossaryCacheMaxEntries: z.number().int().min(1).default(25),
  glossaryTermCacheMaxEntries: z.number().int().min(1).default(100),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

function parseIntOrUndefined(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    cacheTtlMs: parseIntOrUndefined(env['CACHE_TTL_MS']),
    cacheCleanupIntervalMs: parseIntOrUndefined(env['CACHE_CLEANUP_INTERVAL_MS']),
    tagCacheMaxEntries: parseIntOrUndefined(env['TAG_CACHE_MAX_ENTRIES']),
    classificationCacheMaxEntries: parseIntOrUndefined(env['CLASSIFICATION_CACHE_MAX_ENTRIES']),
    glossaryCacheMaxEntries: parseIntOrUndefined(env['GLOSSARY_CACHE_MAX_ENTRIES']),
    glossaryTermCacheMaxEntries: parseIntOrUndefined(env['GLOSSARY_TERM_CACHE_MAX_ENTRIES']),
    nodeEnv: env['NODE_ENV'] || undefined,
    logLevel: env['LOG_LEVEL'] || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigValidationError(errors);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
