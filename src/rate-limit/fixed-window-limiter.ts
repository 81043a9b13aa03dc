/**
 * Fixed-window rate limiter.
 *
 * One counter per client key on the shared cache. Every request increments
 * the counter and, in the same transaction, sets the window length as its
 * TTL unless one is already running, so a counter always expires. Rejected
 * requests are counted too. Requests at the window edge can burst up to
 * twice the ceiling; that is accepted.
 */

import type { CacheClient } from '../cache/types.js';
import { TransientInfrastructureError, describeError } from '../orchestrator/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

export const RATE_LIMIT_KEY_PREFIX = 'rate_limit:';

export interface FixedWindowRateLimiterOptions {
  /** Requests allowed per window (default: 60) */
  maxRequests?: number;
  /** Window length in seconds (default: 60) */
  windowSeconds?: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  /** Counter value after this request was counted */
  count: number;
  limit: number;
  /** Seconds until the window resets; set when rejected */
  retryAfterSeconds?: number;
}

export class FixedWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowSeconds: number;

  constructor(
    private readonly cache: CacheClient,
    options: FixedWindowRateLimiterOptions = {}
  ) {
    this.maxRequests = options.maxRequests ?? 60;
    this.windowSeconds = options.windowSeconds ?? 60;

    log.debug(
      { maxRequests: this.maxRequests, windowSeconds: this.windowSeconds },
      'FixedWindowRateLimiter initialized'
    );
  }

  /**
   * Count one request for `clientKey` and decide whether it may proceed.
   */
  async consume(clientKey: string): Promise<RateLimitDecision> {
    const key = `${RATE_LIMIT_KEY_PREFIX}${clientKey}`;

    try {
      const count = await this.cache.incrementWindow(key, this.windowSeconds);

      if (count > this.maxRequests) {
        const ttl = await this.cache.ttl(key);
        const retryAfterSeconds = ttl > 0 ? ttl : this.windowSeconds;
        log.warn({ clientKey, count, limit: this.maxRequests, retryAfterSeconds }, 'Rate limit exceeded');
        return { allowed: false, count, limit: this.maxRequests, retryAfterSeconds };
      }

      return { allowed: true, count, limit: this.maxRequests };
    } catch (error) {
      log.error({ err: error, clientKey }, 'Rate limit check failed');
      throw new TransientInfrastructureError('cache', describeError(error), { cause: error });
    }
  }
}
