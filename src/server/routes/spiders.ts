import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import {
  runSpiderBodySchema,
  taskIdParamsSchema,
  resultsQuerySchema,
  type ResultsQuery,
  type ResultsResponse,
  type SpiderView,
  type StartedTaskResponse,
  type StopTaskResponse,
  type TaskIdParams,
  type TaskStatusView,
  type TaskView,
} from '../types/api.js';
import type { Orchestrator } from '../../orchestrator/orchestrator.js';
import { TaskNotFoundError, TaskNotStoppableError } from '../../orchestrator/errors.js';
import type { SpiderInfo } from '../../runtime/types.js';
import { TaskStatus, type TaskRecord } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('routes:spiders');

/**
 * Map TaskStatus to API status
 */
export function mapTaskStatus(status: TaskStatus): TaskStatusView {
  const statusMap: Record<TaskStatus, TaskStatusView> = {
    [TaskStatus.PENDING]: 'pending',
    [TaskStatus.RUNNING]: 'running',
    [TaskStatus.STOPPING]: 'stopping',
    [TaskStatus.COMPLETED]: 'completed',
    [TaskStatus.FAILED]: 'failed',
    [TaskStatus.STOPPED]: 'stopped',
  };
  return statusMap[status];
}

/**
 * Convert a TaskRecord to its API view
 */
export function toTaskView(task: TaskRecord): TaskView {
  return {
    task_id: task.taskId,
    spider_name: task.spiderName,
    kwargs: task.kwargs,
    priority: task.priority,
    timeout: task.timeoutSeconds,
    status: mapTaskStatus(task.status),
    start_time: new Date(task.startTime).toISOString(),
    end_time: task.endTime !== undefined ? new Date(task.endTime).toISOString() : null,
    items_count: task.itemsCount,
    failure_reason: task.failureReason ?? null,
    execution_time:
      task.endTime !== undefined ? Math.round(task.endTime - task.startTime) / 1000 : null,
    result: task.result
      ? {
          items_scraped: task.result.itemsScraped,
          items_dropped: task.result.itemsDropped,
          close_reason: task.result.closeReason,
          duration_ms: task.result.durationMs,
        }
      : null,
  };
}

function toSpiderView(spider: SpiderInfo): SpiderView {
  return {
    name: spider.name,
    description: spider.description,
    allowed_domains: spider.allowedDomains,
    start_urls: spider.startUrls,
  };
}

export interface SpiderRoutesOptions {
  orchestrator: Orchestrator;
  /** preHandler guarding the mutating routes */
  authenticate: preHandlerAsyncHookHandler;
}

/**
 * Register spider and task routes. Paths are relative to the API prefix.
 */
export function registerSpiderRoutes(
  app: FastifyInstance,
  { orchestrator, authenticate }: SpiderRoutesOptions
): void {
  /**
   * POST /spiders/run - Launch a spider
   */
  app.post('/spiders/run', { preHandler: authenticate }, async (request, reply) => {
    const bodyResult = runSpiderBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid request body',
          { errors: bodyResult.error.errors },
          request.id
        )
      );
    }

    const { spider_name, spider_kwargs, priority, timeout } = bodyResult.data;
    const task = orchestrator.start(spider_name, spider_kwargs, {
      priority,
      timeoutSeconds: timeout,
    });

    const launched = task.status !== TaskStatus.FAILED;
    const response: StartedTaskResponse = {
      task_id: task.taskId,
      status: launched ? 'started' : 'failed',
      message: launched
        ? `Spider ${task.spiderName} started`
        : `Spider ${task.spiderName} failed to start: ${task.failureReason ?? 'unknown error'}`,
      spider_name: task.spiderName,
      created_at: new Date(task.startTime).toISOString(),
    };

    logger.info({ taskId: task.taskId, spiderName: task.spiderName, launched }, 'Spider run requested');
    return reply.status(201).send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /spiders - Registered spiders
   */
  app.get('/spiders', async (request, reply) => {
    const spiders = orchestrator.listSpiders().map(toSpiderView);
    return reply.send(createSuccessResponse(spiders, request.id));
  });

  /**
   * GET /spiders/tasks - All tasks keyed by id
   */
  app.get('/spiders/tasks', async (request, reply) => {
    const tasks: Record<string, TaskView> = {};
    for (const [taskId, task] of Object.entries(orchestrator.listTasks())) {
      tasks[taskId] = toTaskView(task);
    }
    return reply.send(createSuccessResponse(tasks, request.id));
  });

  /**
   * GET /spiders/tasks/:taskId - Task status
   */
  app.get<{ Params: TaskIdParams }>('/spiders/tasks/:taskId', async (request, reply) => {
    const paramsResult = taskIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid task ID',
          { errors: paramsResult.error.errors },
          request.id
        )
      );
    }

    const { taskId } = paramsResult.data;
    const task = orchestrator.getStatus(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }

    return reply.send(createSuccessResponse(toTaskView(task), request.id));
  });

  /**
   * GET /spiders/results/:taskId - Paginated records
   */
  app.get<{ Params: TaskIdParams; Querystring: ResultsQuery }>(
    '/spiders/results/:taskId',
    async (request, reply) => {
      const paramsResult = taskIdParamsSchema.safeParse(request.params);
      const queryResult = resultsQuerySchema.safeParse(request.query);
      if (!paramsResult.success || !queryResult.success) {
        const errors = [
          ...(paramsResult.success ? [] : paramsResult.error.errors),
          ...(queryResult.success ? [] : queryResult.error.errors),
        ];
        return reply.status(400).send(
          createErrorResponse(
            ErrorCode.BAD_REQUEST,
            'Invalid query parameters',
            { errors },
            request.id
          )
        );
      }

      const { taskId } = paramsResult.data;
      const { start, limit } = queryResult.data;
      const page = await orchestrator.readResults(taskId, start, limit);

      const response: ResultsResponse = {
        task_id: taskId,
        items: page.items,
        pagination: {
          start,
          limit,
          total: page.total,
          has_more: page.hasMore,
        },
      };
      return reply.send(createSuccessResponse(response, request.id));
    }
  );

  /**
   * POST /spiders/tasks/:taskId/stop - Stop a running task
   */
  app.post(
    '/spiders/tasks/:taskId/stop',
    { preHandler: authenticate },
    async (request, reply) => {
      const paramsResult = taskIdParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return reply.status(400).send(
          createErrorResponse(
            ErrorCode.BAD_REQUEST,
            'Invalid task ID',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
      }

      const { taskId } = paramsResult.data;
      const stopped = await orchestrator.stop(taskId);

      const task = orchestrator.getStatus(taskId);
      if (!task) {
        throw new TaskNotFoundError(taskId);
      }
      if (!stopped) {
        throw new TaskNotStoppableError(taskId, task.status);
      }

      const response: StopTaskResponse = {
        message: 'Task stopped',
        task_id: taskId,
        status: mapTaskStatus(task.status),
      };
      return reply.send(createSuccessResponse(response, request.id));
    }
  );
}
