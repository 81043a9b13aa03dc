/**
 * Spider Routes Unit Tests
 * Tests for run, task status, results and stop endpoints
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Orchestrator } from '../src/orchestrator/orchestrator.js';
import { blockingSpider, countingSpider, FakeJobRuntime } from './helpers/fakes.js';
import { buildTestApp } from './helpers/app.js';

describe('Spider Routes', () => {
  let app: FastifyInstance;
  let orchestrator: Orchestrator;

  beforeEach(async () => {
    ({ app, orchestrator } = await buildTestApp({
      spiders: [countingSpider('counter', 5), blockingSpider('blocker')],
    }));
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    await app.close();
  });

  async function runSpider(payload: Record<string, unknown>) {
    return app.inject({ method: 'POST', url: '/api/v1/spiders/run', payload });
  }

  async function waitForTaskStatus(taskId: string, status: string): Promise<void> {
    await vi.waitFor(async () => {
      const response = await app.inject({ method: 'GET', url: `/api/v1/spiders/tasks/${taskId}` });
      expect(response.json().data.status).toBe(status);
    });
  }

  describe('POST /api/v1/spiders/run', () => {
    it('should start the spider and return 201', async () => {
      const response = await runSpider({ spider_name: 'counter' });

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body.success).toBe(true);
      expect(body.data.status).toBe('started');
      expect(body.data.message).toBe('Spider counter started');
      expect(body.data.spider_name).toBe('counter');
      expect(typeof body.data.task_id).toBe('string');
      expect(Number.isNaN(Date.parse(body.data.created_at))).toBe(false);
    });

    it('should apply defaults to the stored task', async () => {
      const started = await runSpider({ spider_name: 'blocker' });
      const taskId = started.json().data.task_id;

      const response = await app.inject({ method: 'GET', url: `/api/v1/spiders/tasks/${taskId}` });

      expect(response.json().data).toMatchObject({
        task_id: taskId,
        spider_name: 'blocker',
        kwargs: {},
        priority: 1,
        timeout: 3600,
        status: 'running',
        end_time: null,
        items_count: 0,
        failure_reason: null,
        execution_time: null,
        result: null,
      });
    });

    it('should reject an empty spider name', async () => {
      const response = await runSpider({ spider_name: '   ' });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.success).toBe(false);
      expect(body.error.code).toBe('BAD_REQUEST');
      expect(body.error.message).toBe('Invalid request body');
      expect(body.error.details.errors[0].message).toBe('spider_name must not be empty');
    });

    it('should reject out-of-range priority and timeout', async () => {
      const highPriority = await runSpider({ spider_name: 'counter', priority: 11 });
      const shortTimeout = await runSpider({ spider_name: 'counter', timeout: 59 });

      expect(highPriority.statusCode).toBe(400);
      expect(shortTimeout.statusCode).toBe(400);
      expect(orchestrator.listTasks()).toEqual({});
    });

    it('should reject an unknown spider with the allowed names', async () => {
      const response = await runSpider({ spider_name: 'nope' });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error.code).toBe('BAD_REQUEST');
      expect(body.error.message).toBe("Invalid spider name 'nope'. Allowed: counter, blocker");
      expect(body.error.details.allowed).toEqual(['counter', 'blocker']);
    });

    it('should cap a run at max_items', async () => {
      const started = await runSpider({ spider_name: 'counter', spider_kwargs: { max_items: 2 } });
      const taskId = started.json().data.task_id;

      await waitForTaskStatus(taskId, 'completed');

      const response = await app.inject({ method: 'GET', url: `/api/v1/spiders/tasks/${taskId}` });
      const task = response.json().data;
      expect(task.items_count).toBe(2);
      expect(task.kwargs).toEqual({ max_items: 2 });
      expect(task.result).toMatchObject({
        items_scraped: 2,
        items_dropped: 0,
        close_reason: 'max_items_reached',
      });
      expect(typeof task.execution_time).toBe('number');
    });
  });

  describe('GET /api/v1/spiders', () => {
    it('should list registered spiders', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/spiders' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        { name: 'counter', description: 'counter test spider', allowed_domains: [], start_urls: [] },
        { name: 'blocker', description: 'blocker test spider', allowed_domains: [], start_urls: [] },
      ]);
    });
  });

  describe('GET /api/v1/spiders/tasks', () => {
    it('should return tasks keyed by id', async () => {
      const first = (await runSpider({ spider_name: 'blocker' })).json().data.task_id;
      const second = (await runSpider({ spider_name: 'blocker', priority: 5 })).json().data.task_id;

      const response = await app.inject({ method: 'GET', url: '/api/v1/spiders/tasks' });

      const tasks = response.json().data;
      expect(Object.keys(tasks)).toEqual([first, second]);
      expect(tasks[second].priority).toBe(5);
    });
  });

  describe('GET /api/v1/spiders/tasks/:taskId', () => {
    it('should return 404 for an unknown task', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/spiders/tasks/missing' });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error.code).toBe('NOT_FOUND');
      expect(body.error.message).toBe('Task not found: missing');
    });
  });

  describe('GET /api/v1/spiders/results/:taskId', () => {
    it('should page through stored records', async () => {
      const taskId = (await runSpider({ spider_name: 'counter' })).json().data.task_id;
      await waitForTaskStatus(taskId, 'completed');

      const response = await app.inject({
        method: 'GET',
        url: `/api/v1/spiders/results/${taskId}?start=1&limit=2`,
      });

      expect(response.statusCode).toBe(200);
      const data = response.json().data;
      expect(data.task_id).toBe(taskId);
      expect(data.pagination).toEqual({ start: 1, limit: 2, total: 5, has_more: true });
      expect(data.items.map((item: { title: string }) => item.title)).toEqual(['Item 1', 'Item 2']);
      expect(data.items[0]).toMatchObject({
        url: 'https://example.test/items/1',
        spider_name: 'counter',
        task_id: taskId,
      });
    });

    it('should default to the first hundred records', async () => {
      const taskId = (await runSpider({ spider_name: 'counter' })).json().data.task_id;
      await waitForTaskStatus(taskId, 'completed');

      const response = await app.inject({ method: 'GET', url: `/api/v1/spiders/results/${taskId}` });

      expect(response.json().data.pagination).toEqual({ start: 0, limit: 100, total: 5, has_more: false });
    });

    it('should reject invalid pagination', async () => {
      const taskId = (await runSpider({ spider_name: 'blocker' })).json().data.task_id;

      const zeroLimit = await app.inject({
        method: 'GET',
        url: `/api/v1/spiders/results/${taskId}?limit=0`,
      });
      const negativeStart = await app.inject({
        method: 'GET',
        url: `/api/v1/spiders/results/${taskId}?start=-1`,
      });

      expect(zeroLimit.statusCode).toBe(400);
      expect(zeroLimit.json().error.message).toBe('Invalid query parameters');
      expect(negativeStart.statusCode).toBe(400);
    });

    it('should return 404 for an unknown task', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/spiders/results/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.code).toBe('NOT_FOUND');
    });
  });

  describe('POST /api/v1/spiders/tasks/:taskId/stop', () => {
    it('should stop a running task', async () => {
      const taskId = (await runSpider({ spider_name: 'blocker' })).json().data.task_id;

      const response = await app.inject({ method: 'POST', url: `/api/v1/spiders/tasks/${taskId}/stop` });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({ message: 'Task stopped', task_id: taskId, status: 'stopped' });
      expect(orchestrator.getStatus(taskId)?.status).toBe('STOPPED');
    });

    it('should return 409 for a task that already ended', async () => {
      const taskId = (await runSpider({ spider_name: 'blocker' })).json().data.task_id;
      await app.inject({ method: 'POST', url: `/api/v1/spiders/tasks/${taskId}/stop` });

      const response = await app.inject({ method: 'POST', url: `/api/v1/spiders/tasks/${taskId}/stop` });

      expect(response.statusCode).toBe(409);
      const body = response.json();
      expect(body.error.code).toBe('CONFLICT');
      expect(body.error.message).toBe(`Task ${taskId} cannot be stopped in status 'STOPPED'`);
    });

    it('should return 404 for an unknown task', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/v1/spiders/tasks/missing/stop' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('Task not found: missing');
    });
  });
});

describe('Spider Routes with a failing runtime', () => {
  it('should report a launch failure as a failed start', async () => {
    const runtime = new FakeJobRuntime([
      { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
    ]);
    runtime.launchError = new Error('engine offline');
    const { app } = await buildTestApp({ runtime });

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/spiders/run',
      payload: { spider_name: 'counter' },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      status: 'failed',
      message: 'Spider counter failed to start: engine offline',
    });

    const taskId = response.json().data.task_id;
    const status = await app.inject({ method: 'GET', url: `/api/v1/spiders/tasks/${taskId}` });
    expect(status.json().data.status).toBe('failed');
    expect(status.json().data.failure_reason).toBe('engine offline');

    await app.close();
  });
});

describe('API key authentication', () => {
  let app: FastifyInstance;
  let orchestrator: Orchestrator;

  beforeEach(async () => {
    ({ app, orchestrator } = await buildTestApp({
      spiders: [blockingSpider('blocker')],
      apiKey: 'test-secret',
    }));
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    await app.close();
  });

  it('should require the authorization header on run', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/spiders/run',
      payload: { spider_name: 'blocker' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toEqual({
      code: 'UNAUTHORIZED',
      message: 'Authorization header required',
    });
    expect(orchestrator.listTasks()).toEqual({});
  });

  it('should reject a non-bearer scheme', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/spiders/run',
      headers: { authorization: 'Basic dGVzdA==' },
      payload: { spider_name: 'blocker' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.message).toBe('Invalid authorization format. Use: Bearer <api-key>');
  });

  it('should reject a wrong key', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/spiders/run',
      headers: { authorization: 'Bearer wrong-secret' },
      payload: { spider_name: 'blocker' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.message).toBe('Invalid API key');
  });

  it('should accept the configured key on run and stop', async () => {
    const headers = { authorization: 'Bearer test-secret' };
    const started = await app.inject({
      method: 'POST',
      url: '/api/v1/spiders/run',
      headers,
      payload: { spider_name: 'blocker' },
    });
    expect(started.statusCode).toBe(201);
    const taskId = started.json().data.task_id;

    const unauthenticatedStop = await app.inject({
      method: 'POST',
      url: `/api/v1/spiders/tasks/${taskId}/stop`,
    });
    expect(unauthenticatedStop.statusCode).toBe(401);

    const stopped = await app.inject({
      method: 'POST',
      url: `/api/v1/spiders/tasks/${taskId}/stop`,
      headers,
    });
    expect(stopped.statusCode).toBe(200);
  });

  it('should leave read routes open', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/spiders/tasks' });

    expect(response.statusCode).toBe(200);
  });
});
