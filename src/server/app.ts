import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { nanoid } from 'nanoid';
import { serverConfigSchema, createErrorResponse, ErrorCode, type ServerConfig } from './types.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerSpiderRoutes } from './routes/spiders.js';
import { registerMonitoringRoutes } from './routes/monitoring.js';
import { createApiKeyAuth } from './middleware/auth.js';
import { createRateLimitHook } from './middleware/rate-limit.js';
import { isCrawlControlError } from '../orchestrator/errors.js';
import type { Orchestrator } from '../orchestrator/orchestrator.js';
import type { FixedWindowRateLimiter } from '../rate-limit/fixed-window-limiter.js';
import type { ResourceManager } from '../resources/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

export const API_PREFIX = '/api/v1';

/**
 * Server configuration plus the collaborators the routes use
 */
export interface AppConfig extends Partial<ServerConfig> {
  orchestrator: Orchestrator;
  resources: ResourceManager;
  /** Rate limiting for API routes; off when omitted */
  rateLimiter?: FixedWindowRateLimiter;
  /** Bearer key for mutating routes; auth off when omitted */
  apiKey?: string;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(config: AppConfig): Promise<FastifyInstance> {
  const { orchestrator, resources, rateLimiter, apiKey, ...serverConfig } = config;

  // Validate and apply defaults
  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  await app.register(cors, {
    origin: validatedConfig.corsOrigins.includes('*') ? true : validatedConfig.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  // Add request ID to response headers
  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  // Global error handler
  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    if (isCrawlControlError(error)) {
      if (error.statusCode >= 500) {
        logger.error({ err: error, requestId: request.id }, 'Request failed');
      } else {
        logger.info({ code: error.code, requestId: request.id }, error.message);
      }
      return reply
        .status(error.statusCode)
        .send(createErrorResponse(error.code, error.message, error.details, request.id));
    }

    logger.error({ err: error, requestId: request.id }, 'Request error');

    if (error.validation) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Validation error',
          { errors: error.validation },
          request.id
        )
      );
    }

    if (error.statusCode && error.statusCode < 500) {
      const code = mapStatusToErrorCode(error.statusCode);
      return reply
        .status(error.statusCode)
        .send(createErrorResponse(code, error.message, undefined, request.id));
    }

    return reply.status(500).send(
      createErrorResponse(
        ErrorCode.INTERNAL_ERROR,
        'An unexpected error occurred',
        undefined,
        request.id
      )
    );
  });

  // Not found handler
  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send(
      createErrorResponse(
        ErrorCode.NOT_FOUND,
        `Route ${request.method} ${request.url} not found`,
        undefined,
        request.id
      )
    );
  });

  registerHealthRoutes(app, { resources });

  const authenticate = createApiKeyAuth(apiKey);
  await app.register(
    async (api) => {
      if (rateLimiter) {
        api.addHook('preHandler', createRateLimitHook(rateLimiter));
      }
      registerSpiderRoutes(api, { orchestrator, authenticate });
      registerMonitoringRoutes(api, { orchestrator, resources });
    },
    { prefix: API_PREFIX }
  );

  return app;
}

/**
 * Map HTTP status code to error code
 */
function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCode.BAD_REQUEST;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 403:
      return ErrorCode.FORBIDDEN;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 429:
      return ErrorCode.RATE_LIMITED;
    default:
      return ErrorCode.BAD_REQUEST;
  }
}
