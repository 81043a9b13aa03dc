import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { FixedWindowRateLimiter } from '../../rate-limit/fixed-window-limiter.js';
import { createErrorResponse, ErrorCode } from '../types.js';

/**
 * Build the per-client rate limit preHandler, keyed by client IP.
 * Cache failures propagate to the error handler as 503.
 */
export function createRateLimitHook(limiter: FixedWindowRateLimiter): preHandlerAsyncHookHandler {
  return async function rateLimit(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | void> {
    const decision = await limiter.consume(request.ip);

    void reply.header('X-RateLimit-Limit', String(decision.limit));

    if (!decision.allowed) {
      const retryAfterSeconds = decision.retryAfterSeconds ?? limiter.windowSeconds;
      void reply.header('Retry-After', String(retryAfterSeconds));
      return reply.status(429).send(
        createErrorResponse(
          ErrorCode.RATE_LIMITED,
          `Rate limit exceeded: at most ${decision.limit} requests per ${limiter.windowSeconds} seconds`,
          { limit: decision.limit, retryAfterSeconds },
          request.id
        )
      );
    }

    void reply.header('X-RateLimit-Remaining', String(Math.max(decision.limit - decision.count, 0)));
  };
}
