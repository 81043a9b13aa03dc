/**
 * Crawl Control Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * `z.coerce.boolean()` treats any non-empty string as true, so "false"
 * and "0" need explicit handling.
 */
const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === 'boolean') {
      return value;
    }
    return !['false', '0', 'no', 'off', ''].includes(value.trim().toLowerCase());
  });

const csv = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

/**
 * Rate limiting configuration schema
 */
const rateLimitConfigSchema = z.object({
  enabled: envBoolean.default(true),
  /** Requests allowed per window */
  maxRequests: z.coerce.number().int().min(1).max(100000).default(60),
  /** Window length in seconds */
  windowSeconds: z.coerce.number().int().min(1).max(86400).default(60),
});

export type RateLimitConfig = z.infer<typeof rateLimitConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Server
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  host: z.string().min(1).default('0.0.0.0'),
  corsOrigins: csv.default(['*']),
  apiKey: z.string().min(1).optional(),

  // Shared cache
  cacheBackend: z.enum(['redis', 'memory']).default('redis'),
  redisUrl: z.string().url().default('redis://localhost:6379/1'),

  // Relational store, only probed for liveness
  databaseUrl: z
    .string()
    .refine((value) => /^postgres(ql)?:\/\//.test(value), {
      message: 'DATABASE_URL must be a postgresql:// URL',
    })
    .optional(),

  // Task lifecycle
  resultTtlSeconds: z.coerce.number().int().min(1).max(604800).default(3600),
  stopTimeoutMs: z.coerce.number().int().min(100).max(600000).default(10000),
  maxItemsDefault: z.coerce.number().int().min(1).default(1000),

  rateLimit: rateLimitConfigSchema,
});

export type CrawlControlConfig = z.infer<typeof configSchema>;

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): CrawlControlConfig {
  const raw = {
    port: readEnv('CRAWL_PORT'),
    host: readEnv('CRAWL_HOST'),
    corsOrigins: readEnv('CRAWL_CORS_ORIGINS'),
    apiKey: readEnv('CRAWL_API_KEY'),
    cacheBackend: readEnv('CRAWL_CACHE_BACKEND'),
    redisUrl: readEnv('CRAWL_REDIS_URL'),
    databaseUrl: readEnv('CRAWL_DATABASE_URL'),
    resultTtlSeconds: readEnv('CRAWL_RESULT_TTL_SECONDS'),
    stopTimeoutMs: readEnv('CRAWL_STOP_TIMEOUT_MS'),
    maxItemsDefault: readEnv('CRAWL_MAX_ITEMS_DEFAULT'),
    rateLimit: {
      enabled: readEnv('CRAWL_RATE_LIMIT_ENABLED'),
      maxRequests: readEnv('CRAWL_RATE_LIMIT_MAX_REQUESTS'),
      windowSeconds: readEnv('CRAWL_RATE_LIMIT_WINDOW_SECONDS'),
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      port: result.data.port,
      cacheBackend: result.data.cacheBackend,
      databaseConfigured: result.data.databaseUrl !== undefined,
      resultTtlSeconds: result.data.resultTtlSeconds,
      stopTimeoutMs: result.data.stopTimeoutMs,
      rateLimitEnabled: result.data.rateLimit.enabled,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: CrawlControlConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): CrawlControlConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
