import type { FastifyInstance } from 'fastify';
import {
  createSuccessResponse,
  type ComponentCheck,
  type HealthStatus,
  type LivenessResponse,
  type ReadinessResponse,
} from '../types.js';
import type { ResourceManager } from '../../resources/index.js';
import { describeError } from '../../orchestrator/errors.js';

/**
 * Package version - should match package.json
 */
export const VERSION = '0.1.0';

export const SERVICE_NAME = 'crawl-control';

/**
 * Time a probe and describe the outcome as `connected (x.xxms)`.
 */
export async function checkComponent(
  name: string,
  probe: () => Promise<void>
): Promise<ComponentCheck> {
  const start = performance.now();
  try {
    await probe();
    const latencyMs = Math.round((performance.now() - start) * 100) / 100;
    return { name, healthy: true, message: `connected (${latencyMs.toFixed(2)}ms)`, latencyMs };
  } catch (error) {
    const latencyMs = Math.round((performance.now() - start) * 100) / 100;
    return { name, healthy: false, message: `${name} check failed: ${describeError(error)}`, latencyMs };
  }
}

/**
 * Cache and database checks. An unconfigured database counts as healthy.
 */
export async function checkDependencies(
  resources: ResourceManager
): Promise<[cache: ComponentCheck, database: ComponentCheck]> {
  const { cache, database } = resources;
  const databaseCheck: Promise<ComponentCheck> = database.configured
    ? checkComponent('database', () => database.ping())
    : Promise.resolve({ name: 'database', healthy: true, message: 'not_configured' });

  return Promise.all([checkComponent('cache', () => cache.ping()), databaseCheck]);
}

/**
 * Register health check routes
 */
export function registerHealthRoutes(
  app: FastifyInstance,
  { resources }: { resources: ResourceManager }
): void {
  /**
   * GET / - Service banner
   */
  app.get('/', async (request, reply) => {
    return reply.send(
      createSuccessResponse({ service: SERVICE_NAME, status: 'running', version: VERSION }, request.id)
    );
  });

  /**
   * GET /health - Basic health check
   */
  app.get('/health', async (request, reply) => {
    const response: HealthStatus = {
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/ready - Readiness check
   * Ready when the cache answers and the database, if configured, does too
   */
  app.get('/health/ready', async (request, reply) => {
    const checks = await checkDependencies(resources);
    const allHealthy = checks.every((c) => c.healthy);

    const response: ReadinessResponse = {
      ready: allHealthy,
      checks,
      timestamp: new Date().toISOString(),
    };

    if (!allHealthy) {
      return reply.status(503).send(createSuccessResponse(response, request.id));
    }

    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/live - Liveness check
   */
  app.get('/health/live', async (request, reply) => {
    const response: LivenessResponse = {
      alive: true,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}
