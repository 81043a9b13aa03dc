/**
 * Orchestrator facade.
 *
 * Composes the task registry, the job runtime and the result store behind
 * the operations the HTTP layer calls. Launches are fire-and-forget: the
 * only channels back from a job are its outcome promise and ingest().
 */

import { createLogger } from '../utils/logger.js';
import {
  TaskStatus,
  type CrawlRecord,
  type CreateTaskOptions,
  type ResultPage,
  type SpiderKwargs,
  type TaskRecord,
} from '../types/index.js';
import type { JobRuntime, SpiderInfo } from '../runtime/types.js';
import type { ResultStore } from './result-store.js';
import type { TaskRegistry } from './task-registry.js';
import { InvalidRequestError, TaskNotFoundError, describeError } from './errors.js';

const log = createLogger('orchestrator');

export const DEFAULT_STOP_TIMEOUT_MS = 10000;
const RECENT_TASKS_LIMIT = 10;

export interface OrchestratorOptions {
  /** How long stop() waits for the runtime before forcing STOPPED */
  stopTimeoutMs?: number;
}

export interface OrchestratorStats {
  totalTasks: number;
  totalItems: number;
  /** Completed share of finished-by-job tasks, percent with two decimals */
  successRate: number;
  activeJobs: number;
  statusBreakdown: Record<TaskStatus, number>;
  /** Last ten created, in creation order */
  recentTasks: TaskRecord[];
}

export class Orchestrator {
  readonly stopTimeoutMs: number;

  constructor(
    private readonly registry: TaskRegistry,
    private readonly runtime: JobRuntime,
    private readonly results: ResultStore,
    options: OrchestratorOptions = {}
  ) {
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  /**
   * Launch a spider and return its task without waiting for the job.
   *
   * An invalid spider name is raised to the caller. Once a task id exists,
   * a runtime refusal is recorded on the task as FAILED instead.
   */
  start(spiderName: string, kwargs: SpiderKwargs = {}, options: CreateTaskOptions = {}): TaskRecord {
    const name = this.resolveSpiderName(spiderName);
    const taskId = this.registry.create(name, kwargs, options);

    try {
      const handle = this.runtime.launch(name, taskId, kwargs, (id, records) =>
        this.ingest(id, records).then(() => undefined)
      );

      this.registry.markRunning(taskId);
      this.runtime.onComplete(handle, (summary) => {
        this.registry.complete(taskId, summary);
      });
      this.runtime.onFail(handle, (reason) => {
        this.registry.fail(taskId, reason);
      });
    } catch (error) {
      const reason = describeError(error);
      log.error({ err: error, taskId, spiderName: name }, 'Job launch failed');
      this.registry.failLaunch(taskId, reason);
    }

    return this.require(taskId);
  }

  getStatus(taskId: string): TaskRecord | undefined {
    return this.registry.get(taskId);
  }

  listTasks(): Record<string, TaskRecord> {
    return this.registry.listAll();
  }

  /**
   * Stop a running task. Resolves true once the task is STOPPED and false
   * when it was not running; throws TaskNotFoundError for unknown ids.
   *
   * Waits at most `stopTimeoutMs` for the runtime. A task whose job never
   * acknowledges is still finalized to STOPPED.
   */
  async stop(taskId: string): Promise<boolean> {
    if (!this.registry.has(taskId)) {
      throw new TaskNotFoundError(taskId);
    }
    if (!this.registry.beginStop(taskId)) {
      return false;
    }

    const handle = this.runtime.findHandle(taskId);
    if (!handle) {
      log.info({ taskId }, 'No live job for task, finalizing stop');
      this.registry.finalizeStop(taskId);
      return true;
    }

    try {
      const ack = await this.runtime.requestStop(handle, this.stopTimeoutMs);
      if (ack.acknowledged) {
        log.info({ taskId, durationMs: ack.durationMs }, 'Job acknowledged stop');
      } else {
        log.warn(
          { taskId, timeoutMs: this.stopTimeoutMs },
          'Job did not acknowledge stop in time, forcing STOPPED'
        );
      }
    } catch (error) {
      log.error({ err: error, taskId }, 'Stop request failed, forcing STOPPED');
    } finally {
      this.registry.finalizeStop(taskId);
    }

    return true;
  }

  /**
   * Store a batch of records for a task and count them. Returns the task's
   * new item count.
   */
  async ingest(taskId: string, records: readonly CrawlRecord[]): Promise<number> {
    if (!this.registry.has(taskId)) {
      throw new TaskNotFoundError(taskId);
    }
    if (records.length === 0) {
      return this.require(taskId).itemsCount;
    }

    await this.results.append(taskId, records);
    return this.registry.addItems(taskId, records.length);
  }

  async readResults(taskId: string, offset: number, limit: number): Promise<ResultPage> {
    if (!this.registry.has(taskId)) {
      throw new TaskNotFoundError(taskId);
    }
    return this.results.read(taskId, offset, limit);
  }

  listSpiders(): SpiderInfo[] {
    return this.runtime.describeSpiders();
  }

  stats(): OrchestratorStats {
    const tasks = Object.values(this.registry.listAll());
    const statusBreakdown = this.registry.countByStatus();
    const completed = statusBreakdown[TaskStatus.COMPLETED];
    const ended = completed + statusBreakdown[TaskStatus.FAILED];

    return {
      totalTasks: tasks.length,
      totalItems: tasks.reduce((sum, task) => sum + task.itemsCount, 0),
      successRate: ended === 0 ? 0 : Math.round((completed / ended) * 10000) / 100,
      activeJobs: this.runtime.activeCount(),
      statusBreakdown,
      recentTasks: tasks.slice(-RECENT_TASKS_LIMIT),
    };
  }

  /**
   * Stop every running task, then whatever the runtime still holds.
   */
  async shutdown(): Promise<void> {
    const running = Object.values(this.registry.listAll())
      .filter((task) => task.status === TaskStatus.RUNNING)
      .map((task) => task.taskId);

    log.info({ running: running.length }, 'Stopping running tasks');
    await Promise.all(running.map((taskId) => this.stop(taskId)));
    await this.runtime.shutdown(this.stopTimeoutMs);
  }

  private resolveSpiderName(spiderName: string): string {
    const name = spiderName.trim();
    const allowed = this.runtime.spiderNames();
    if (name === '') {
      throw new InvalidRequestError('Spider name must not be empty', { allowed });
    }
    if (!allowed.includes(name)) {
      throw new InvalidRequestError(
        `Invalid spider name '${name}'. Allowed: ${allowed.join(', ')}`,
        { spiderName: name, allowed }
      );
    }
    return name;
  }

  private require(taskId: string): TaskRecord {
    const task = this.registry.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }
}
