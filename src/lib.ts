/**
 * Crawl Control Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Orchestrator (main entry point)
export * from './orchestrator/index.js';

// Job runtime and spiders
export * from './runtime/index.js';

// Infrastructure
export * from './cache/index.js';
export * from './database/index.js';
export { ResourceManager } from './resources/index.js';
export {
  FixedWindowRateLimiter,
  RATE_LIMIT_KEY_PREFIX,
  type FixedWindowRateLimiterOptions,
  type RateLimitDecision,
} from './rate-limit/fixed-window-limiter.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type CrawlControlConfig, type RateLimitConfig } from './config/index.js';

// HTTP server
export * as server from './server/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Logging
export { logger, createLogger } from './utils/logger.js';
