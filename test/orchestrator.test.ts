/**
 * Orchestrator Scenario Tests
 * Start, ingest, stop races and forced stop finalization
 */

import { describe, it, expect, vi } from 'vitest';
import { MemoryCache } from '../src/cache/memory-cache.js';
import { Orchestrator } from '../src/orchestrator/orchestrator.js';
import { ResultStore } from '../src/orchestrator/result-store.js';
import { TaskRegistry } from '../src/orchestrator/task-registry.js';
import { InvalidRequestError, TaskNotFoundError } from '../src/orchestrator/errors.js';
import { createOrchestrator } from '../src/orchestrator/index.js';
import { InProcessJobRuntime } from '../src/runtime/job-runtime.js';
import { SpiderRegistry } from '../src/runtime/spider-registry.js';
import type { SpiderDefinition } from '../src/runtime/types.js';
import { TaskStatus } from '../src/types/index.js';
import {
  FakeJobRuntime,
  blockingSpider,
  countingSpider,
  defineSpider,
  deferred,
  summary,
} from './helpers/fakes.js';

function createWithSpiders(spiders: SpiderDefinition[], stopTimeoutMs = 1000): Orchestrator {
  return new Orchestrator(
    new TaskRegistry(),
    new InProcessJobRuntime(new SpiderRegistry(spiders)),
    new ResultStore(new MemoryCache()),
    { stopTimeoutMs }
  );
}

async function waitForStatus(
  orchestrator: Orchestrator,
  taskId: string,
  status: TaskStatus
): Promise<void> {
  await vi.waitFor(() => {
    expect(orchestrator.getStatus(taskId)?.status).toBe(status);
  });
}

describe('Orchestrator', () => {
  describe('start()', () => {
    it('should return a RUNNING task without waiting for the job', () => {
      const orchestrator = createWithSpiders([countingSpider('counter', 5)]);

      const task = orchestrator.start('counter', { depth: 1 }, { priority: 3, timeoutSeconds: 600 });

      expect(task.status).toBe(TaskStatus.RUNNING);
      expect(task.itemsCount).toBe(0);
      expect(task.priority).toBe(3);
      expect(task.timeoutSeconds).toBe(600);
      expect(task.endTime).toBeUndefined();
    });

    it('should trim the spider name', () => {
      const orchestrator = createWithSpiders([countingSpider('counter', 1)]);

      expect(orchestrator.start('  counter ').spiderName).toBe('counter');
    });

    it('should reject empty and unknown spider names without creating a task', () => {
      const orchestrator = createWithSpiders([countingSpider('counter', 1)]);

      expect(() => orchestrator.start('   ')).toThrow('Spider name must not be empty');
      expect(() => orchestrator.start('nope')).toThrow(InvalidRequestError);
      expect(() => orchestrator.start('nope')).toThrow("Invalid spider name 'nope'. Allowed: counter");
      expect(orchestrator.listTasks()).toEqual({});
    });

    it('should record a runtime launch failure on the task', () => {
      const runtime = new FakeJobRuntime([
        { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
      ]);
      runtime.launchError = new Error('engine offline');
      const orchestrator = new Orchestrator(new TaskRegistry(), runtime, new ResultStore(new MemoryCache()));

      const task = orchestrator.start('counter');

      expect(task.status).toBe(TaskStatus.FAILED);
      expect(task.failureReason).toBe('engine offline');
      expect(task.endTime).toBeDefined();
    });
  });

  describe('completion', () => {
    it('should store every record and complete the task', async () => {
      const orchestrator = createWithSpiders([countingSpider('counter', 5)]);

      const { taskId } = orchestrator.start('counter');
      await waitForStatus(orchestrator, taskId, TaskStatus.COMPLETED);

      const task = orchestrator.getStatus(taskId);
      expect(task?.itemsCount).toBe(5);
      expect(task?.endTime).toBeDefined();
      expect(task?.result).toMatchObject({ itemsScraped: 5, itemsDropped: 0, closeReason: 'finished' });

      const page = await orchestrator.readResults(taskId, 0, 10);
      expect(page.total).toBe(5);
      expect(page.hasMore).toBe(false);
      expect(page.items.map((item) => item['title'])).toEqual([
        'Item 0',
        'Item 1',
        'Item 2',
        'Item 3',
        'Item 4',
      ]);
    });

    it('should fail the task with the job error', async () => {
      const orchestrator = createWithSpiders([
        defineSpider('broken', async () => {
          throw new Error('selector not found');
        }),
      ]);

      const { taskId } = orchestrator.start('broken');
      await waitForStatus(orchestrator, taskId, TaskStatus.FAILED);

      expect(orchestrator.getStatus(taskId)?.failureReason).toBe('selector not found');
    });
  });

  describe('stop()', () => {
    it('should end STOPPED when the job completes after the stop was requested', async () => {
      const release = deferred();
      const orchestrator = createWithSpiders([
        defineSpider('slow', async ({ emit }) => {
          await emit({ url: 'https://example.test/only' });
          await release.promise;
        }),
      ]);

      const { taskId } = orchestrator.start('slow');
      const stopping = orchestrator.stop(taskId);
      expect(orchestrator.getStatus(taskId)?.status).toBe(TaskStatus.STOPPING);

      release.resolve();

      expect(await stopping).toBe(true);
      const task = orchestrator.getStatus(taskId);
      expect(task?.status).toBe(TaskStatus.STOPPED);
      expect(task?.endTime).toBeDefined();
      expect(task?.result).toBeUndefined();
    });

    it('should ignore a completion that lands between stop and teardown', async () => {
      const runtime = new FakeJobRuntime([
        { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
      ]);
      const orchestrator = new Orchestrator(new TaskRegistry(), runtime, new ResultStore(new MemoryCache()));
      const { taskId } = orchestrator.start('counter');

      const stopping = orchestrator.stop(taskId);
      runtime.finish(taskId, { kind: 'completed', summary: summary(3) });

      expect(await stopping).toBe(true);
      expect(orchestrator.getStatus(taskId)?.status).toBe(TaskStatus.STOPPED);
      expect(runtime.stopRequests).toEqual([taskId]);
    });

    it('should cancel a cooperative job', async () => {
      const orchestrator = createWithSpiders([blockingSpider('blocker')]);

      const { taskId } = orchestrator.start('blocker');

      expect(await orchestrator.stop(taskId)).toBe(true);
      expect(orchestrator.getStatus(taskId)?.status).toBe(TaskStatus.STOPPED);
      expect(orchestrator.getStatus(taskId)?.failureReason).toBeUndefined();
    });

    it('should force STOPPED when the job never acknowledges', async () => {
      const release = deferred();
      const orchestrator = createWithSpiders(
        [blockingSpider('stubborn', { release: release.promise, ignoreAbort: true })],
        20
      );

      const { taskId } = orchestrator.start('stubborn');

      expect(await orchestrator.stop(taskId)).toBe(true);
      expect(orchestrator.getStatus(taskId)?.status).toBe(TaskStatus.STOPPED);

      release.resolve();
      await vi.waitFor(() => {
        expect(orchestrator.stats().activeJobs).toBe(0);
      });
      expect(orchestrator.getStatus(taskId)?.status).toBe(TaskStatus.STOPPED);
    });

    it('should not count records a forced-stopped job emits later', async () => {
      const release = deferred();
      const orchestrator = createWithSpiders(
        [
          defineSpider('late', async ({ emit }) => {
            await release.promise;
            await emit({ url: 'https://example.test/late' });
          }),
        ],
        20
      );
      const { taskId } = orchestrator.start('late');

      expect(await orchestrator.stop(taskId)).toBe(true);
      release.resolve();
      await vi.waitFor(() => {
        expect(orchestrator.stats().activeJobs).toBe(0);
      });

      expect(orchestrator.getStatus(taskId)).toMatchObject({ status: TaskStatus.STOPPED, itemsCount: 0 });
      expect((await orchestrator.readResults(taskId, 0, 10)).total).toBe(0);
    });

    it('should finalize at once when no live job is found', async () => {
      const runtime = new FakeJobRuntime([
        { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
      ]);
      runtime.exposeHandles = false;
      const orchestrator = new Orchestrator(new TaskRegistry(), runtime, new ResultStore(new MemoryCache()));
      const { taskId } = orchestrator.start('counter');

      expect(await orchestrator.stop(taskId)).toBe(true);
      expect(orchestrator.getStatus(taskId)?.status).toBe(TaskStatus.STOPPED);
      expect(runtime.stopRequests).toEqual([]);
    });

    it('should raise NotFound for unknown tasks', async () => {
      const orchestrator = createWithSpiders([countingSpider('counter', 1)]);

      await expect(orchestrator.stop('missing')).rejects.toBeInstanceOf(TaskNotFoundError);
    });

    it('should return false for a completed task', async () => {
      const orchestrator = createWithSpiders([countingSpider('counter', 1)]);
      const { taskId } = orchestrator.start('counter');
      await waitForStatus(orchestrator, taskId, TaskStatus.COMPLETED);

      expect(await orchestrator.stop(taskId)).toBe(false);
      expect(orchestrator.getStatus(taskId)?.status).toBe(TaskStatus.COMPLETED);
    });

    it('should return false for a second stop', async () => {
      const orchestrator = createWithSpiders([blockingSpider('blocker')]);
      const { taskId } = orchestrator.start('blocker');

      const first = orchestrator.stop(taskId);
      const second = orchestrator.stop(taskId);

      expect(await second).toBe(false);
      expect(await first).toBe(true);
    });
  });

  describe('ingest() and readResults()', () => {
    it('should append records and count them on the task', async () => {
      const runtime = new FakeJobRuntime([
        { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
      ]);
      const orchestrator = new Orchestrator(new TaskRegistry(), runtime, new ResultStore(new MemoryCache()));
      const { taskId } = orchestrator.start('counter');

      expect(await orchestrator.ingest(taskId, [{ url: 'https://example.test/1' }])).toBe(1);
      expect(await orchestrator.ingest(taskId, [])).toBe(1);
      expect(
        await orchestrator.ingest(taskId, [{ url: 'https://example.test/2' }, { url: 'https://example.test/3' }])
      ).toBe(3);

      const page = await orchestrator.readResults(taskId, 1, 1);
      expect(page).toEqual({ items: [{ url: 'https://example.test/2' }], total: 3, hasMore: true });
    });

    it('should raise NotFound for unknown tasks', async () => {
      const orchestrator = createWithSpiders([]);

      await expect(orchestrator.ingest('missing', [{ url: 'https://example.test' }])).rejects.toBeInstanceOf(
        TaskNotFoundError
      );
      await expect(orchestrator.readResults('missing', 0, 10)).rejects.toBeInstanceOf(TaskNotFoundError);
    });

    it('should reject out-of-bounds pages', async () => {
      const runtime = new FakeJobRuntime([
        { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
      ]);
      const orchestrator = new Orchestrator(new TaskRegistry(), runtime, new ResultStore(new MemoryCache()));
      const { taskId } = orchestrator.start('counter');
      await orchestrator.ingest(taskId, [{ url: 'https://example.test/1' }, { url: 'https://example.test/2' }]);

      await expect(orchestrator.readResults(taskId, 0, 0)).rejects.toBeInstanceOf(InvalidRequestError);
      await expect(orchestrator.readResults(taskId, -1, 10)).rejects.toThrow(
        'Invalid offset -1: expected a non-negative integer'
      );
    });
  });

  describe('stats()', () => {
    it('should summarize tasks by status', async () => {
      const runtime = new FakeJobRuntime([
        { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
      ]);
      const orchestrator = new Orchestrator(new TaskRegistry(), runtime, new ResultStore(new MemoryCache()));
      const ids = [1, 2, 3, 4].map(() => orchestrator.start('counter').taskId);
      const [a, b, c] = ids;

      await orchestrator.ingest(a, [{ url: 'https://example.test/1' }]);
      runtime.finish(a, { kind: 'completed', summary: summary(1) });
      runtime.finish(b, { kind: 'completed', summary: summary(0) });
      runtime.finish(c, { kind: 'failed', reason: 'boom', summary: summary(0, 'error') });
      await waitForStatus(orchestrator, c, TaskStatus.FAILED);

      const stats = orchestrator.stats();
      expect(stats.totalTasks).toBe(4);
      expect(stats.totalItems).toBe(1);
      expect(stats.successRate).toBe(66.67);
      expect(stats.statusBreakdown).toMatchObject({ COMPLETED: 2, FAILED: 1, RUNNING: 1 });
      expect(stats.recentTasks.map((task) => task.taskId)).toEqual(ids);
    });

    it('should report a zero success rate before any task ended', () => {
      const orchestrator = createWithSpiders([blockingSpider('blocker')]);
      orchestrator.start('blocker');

      expect(orchestrator.stats().successRate).toBe(0);
    });

    it('should keep only the ten most recent tasks', () => {
      const runtime = new FakeJobRuntime([
        { name: 'counter', description: null, allowedDomains: [], startUrls: [] },
      ]);
      const orchestrator = new Orchestrator(new TaskRegistry(), runtime, new ResultStore(new MemoryCache()));
      const ids = Array.from({ length: 12 }, () => orchestrator.start('counter').taskId);

      expect(orchestrator.stats().recentTasks.map((task) => task.taskId)).toEqual(ids.slice(2));
    });
  });

  describe('shutdown()', () => {
    it('should stop every running task', async () => {
      const orchestrator = createWithSpiders([blockingSpider('blocker'), countingSpider('counter', 1)]);
      const first = orchestrator.start('blocker').taskId;
      const second = orchestrator.start('blocker').taskId;
      const done = orchestrator.start('counter').taskId;
      await waitForStatus(orchestrator, done, TaskStatus.COMPLETED);

      await orchestrator.shutdown();

      expect(orchestrator.getStatus(first)?.status).toBe(TaskStatus.STOPPED);
      expect(orchestrator.getStatus(second)?.status).toBe(TaskStatus.STOPPED);
      expect(orchestrator.getStatus(done)?.status).toBe(TaskStatus.COMPLETED);
      expect(orchestrator.stats().activeJobs).toBe(0);
    });
  });
});

describe('createOrchestrator()', () => {
  it('should wire the built-in catalogue', () => {
    const orchestrator = createOrchestrator({
      cache: new MemoryCache(),
      config: { resultTtlSeconds: 60, stopTimeoutMs: 500, maxItemsDefault: 10 },
    });

    expect(orchestrator.stopTimeoutMs).toBe(500);
    expect(orchestrator.listSpiders().map((spider) => spider.name)).toEqual(['example_spider']);
  });
});
