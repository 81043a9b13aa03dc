import { loadavg } from 'node:os';
import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import type { CacheInfo } from '../../cache/types.js';
import type { Orchestrator } from '../../orchestrator/orchestrator.js';
import { TransientInfrastructureError, describeError } from '../../orchestrator/errors.js';
import type { ResourceManager } from '../../resources/index.js';
import { TaskStatus } from '../../types/index.js';
import { checkDependencies, VERSION } from './health.js';
import { mapTaskStatus, toTaskView } from './spiders.js';
import type { TaskStatusView } from '../types/api.js';

function toMegabytes(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}

export interface MonitoringRoutesOptions {
  orchestrator: Orchestrator;
  resources: ResourceManager;
}

/**
 * Register monitoring routes. Paths are relative to the API prefix.
 */
export function registerMonitoringRoutes(
  app: FastifyInstance,
  { orchestrator, resources }: MonitoringRoutesOptions
): void {
  /**
   * GET /monitoring/health - Cache and database status with latency
   */
  app.get('/monitoring/health', async (request, reply) => {
    const [cache, database] = await checkDependencies(resources);
    const components = {
      cache: cache.message ?? '',
      database: database.message ?? '',
    };

    if (!cache.healthy || !database.healthy) {
      return reply.status(503).send(
        createErrorResponse(
          ErrorCode.SERVICE_UNAVAILABLE,
          'Service health check failed',
          components,
          request.id
        )
      );
    }

    return reply.send(
      createSuccessResponse(
        {
          status: 'healthy',
          ...components,
          timestamp: new Date().toISOString(),
          version: VERSION,
        },
        request.id
      )
    );
  });

  /**
   * GET /monitoring/metrics - Process, application and cache metrics
   */
  app.get('/monitoring/metrics', async (request, reply) => {
    let cacheInfo: CacheInfo;
    try {
      cacheInfo = await resources.cache.info();
    } catch (error) {
      throw new TransientInfrastructureError('cache', describeError(error), { cause: error });
    }

    const memory = process.memoryUsage();
    const stats = orchestrator.stats();
    const counts = stats.statusBreakdown;

    const metrics = {
      process: {
        rss_mb: toMegabytes(memory.rss),
        heap_used_mb: toMegabytes(memory.heapUsed),
        heap_total_mb: toMegabytes(memory.heapTotal),
        uptime_seconds: Math.round(process.uptime()),
        load_average: loadavg().map((load) => Math.round(load * 100) / 100),
      },
      application: {
        active_tasks: stats.totalTasks,
        running_tasks: counts[TaskStatus.RUNNING],
        completed_tasks: counts[TaskStatus.COMPLETED],
        failed_tasks: counts[TaskStatus.FAILED],
        stopped_tasks: counts[TaskStatus.STOPPED],
        live_jobs: stats.activeJobs,
      },
      cache: {
        backend: resources.cache.backend,
        connected_clients: cacheInfo.connectedClients,
        used_memory_mb: toMegabytes(cacheInfo.usedMemoryBytes),
        keyspace_hits: cacheInfo.keyspaceHits,
        keyspace_misses: cacheInfo.keyspaceMisses,
      },
    };

    return reply.send(createSuccessResponse(metrics, request.id));
  });

  /**
   * GET /monitoring/stats - Task overview
   */
  app.get('/monitoring/stats', async (request, reply) => {
    const stats = orchestrator.stats();

    const statusBreakdown: Partial<Record<TaskStatusView, number>> = {};
    for (const status of Object.values(TaskStatus)) {
      statusBreakdown[mapTaskStatus(status)] = stats.statusBreakdown[status];
    }

    return reply.send(
      createSuccessResponse(
        {
          overview: {
            total_tasks: stats.totalTasks,
            total_items: stats.totalItems,
            success_rate: stats.successRate,
          },
          status_breakdown: statusBreakdown,
          recent_tasks: stats.recentTasks.map(toTaskView),
        },
        request.id
      )
    );
  });
}
