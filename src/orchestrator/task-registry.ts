import { nanoid } from 'nanoid';
import { createLogger } from '../utils/logger.js';
import {
  TaskEvent,
  TaskStatus,
  type CreateTaskOptions,
  type JobSummary,
  type SpiderKwargs,
  type TaskRecord,
} from '../types/index.js';
import { getNextStatus, getValidEvents, isStopStatus, isTerminalStatus } from './state-machine.js';
import { InvalidTransitionError, TaskNotFoundError } from './errors.js';

const log = createLogger('task-registry');

export const DEFAULT_PRIORITY = 1;
export const DEFAULT_TIMEOUT_SECONDS = 3600;

export interface TaskRegistryOptions {
  /** Clock for start/end times, epoch milliseconds */
  now?: () => number;
  generateId?: () => string;
}

/**
 * Monotonic wall-clock: performance.now() anchored at the process time origin.
 */
export function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}

/**
 * Owns every TaskRecord and applies guarded state transitions.
 *
 * Each operation reads the current status and writes the next one without
 * yielding to the event loop, so transitions on a task are linearizable
 * even when completion callbacks and stop requests interleave.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: TaskRegistryOptions = {}) {
    this.now = options.now ?? monotonicNow;
    this.generateId = options.generateId ?? (() => nanoid());
  }

  /**
   * Allocate a new PENDING task and return its id.
   */
  create(spiderName: string, kwargs: SpiderKwargs, options: CreateTaskOptions = {}): string {
    let taskId = this.generateId();
    while (this.tasks.has(taskId)) {
      log.warn({ taskId }, 'Generated task id collided, regenerating');
      taskId = this.generateId();
    }

    const task: TaskRecord = {
      taskId,
      spiderName,
      kwargs: { ...kwargs },
      priority: options.priority ?? DEFAULT_PRIORITY,
      timeoutSeconds: options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
      status: TaskStatus.PENDING,
      startTime: this.now(),
      itemsCount: 0,
    };

    this.tasks.set(taskId, task);
    log.info({ taskId, spiderName }, 'Task created');

    return taskId;
  }

  /**
   * PENDING → RUNNING once the runtime accepted the job.
   */
  markRunning(taskId: string): void {
    this.apply(this.require(taskId), TaskEvent.LAUNCH_ACK);
  }

  /**
   * RUNNING → COMPLETED. Ignored once a stop was requested or the task ended.
   */
  complete(taskId: string, result?: JobSummary): boolean {
    return this.settle(taskId, TaskEvent.JOB_COMPLETED, (task) => {
      if (result) {
        task.result = { ...result };
      }
    });
  }

  /**
   * RUNNING → FAILED. Same guard as complete().
   */
  fail(taskId: string, reason: string): boolean {
    return this.settle(taskId, TaskEvent.JOB_FAILED, (task) => {
      task.failureReason = reason;
    });
  }

  /**
   * PENDING → FAILED when the runtime refused to start the job.
   */
  failLaunch(taskId: string, reason: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== TaskStatus.PENDING) {
      return false;
    }
    task.failureReason = reason;
    this.apply(task, TaskEvent.LAUNCH_FAILED);
    return true;
  }

  /**
   * RUNNING → STOPPING. Returns false, without side effects, for unknown
   * tasks and for tasks that are not running.
   */
  beginStop(taskId: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== TaskStatus.RUNNING) {
      log.debug({ taskId, status: task?.status }, 'Stop not started: task unknown or not running');
      return false;
    }
    this.apply(task, TaskEvent.STOP_REQUESTED);
    return true;
  }

  /**
   * STOPPING → STOPPED.
   */
  finalizeStop(taskId: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== TaskStatus.STOPPING) {
      log.warn({ taskId, status: task?.status }, 'Stop finalization skipped: task not stopping');
      return false;
    }
    this.apply(task, TaskEvent.RUNTIME_TORN_DOWN);
    return true;
  }

  /**
   * Count ingested records. Not a status transition, so it is accepted in
   * any state (late records can land while a job tears down).
   */
  addItems(taskId: string, count: number): number {
    const task = this.require(taskId);
    task.itemsCount += count;
    return task.itemsCount;
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  get(taskId: string): TaskRecord | undefined {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  /**
   * All tasks keyed by id, in creation order.
   */
  listAll(): Record<string, TaskRecord> {
    const all: Record<string, TaskRecord> = {};
    for (const [taskId, task] of this.tasks) {
      all[taskId] = structuredClone(task);
    }
    return all;
  }

  countByStatus(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = {
      [TaskStatus.PENDING]: 0,
      [TaskStatus.RUNNING]: 0,
      [TaskStatus.STOPPING]: 0,
      [TaskStatus.COMPLETED]: 0,
      [TaskStatus.FAILED]: 0,
      [TaskStatus.STOPPED]: 0,
    };
    for (const task of this.tasks.values()) {
      counts[task.status] += 1;
    }
    return counts;
  }

  get size(): number {
    return this.tasks.size;
  }

  private require(taskId: string): TaskRecord {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  /**
   * Compare-and-set for the job's own terminal signal: applies only while
   * the task is still RUNNING.
   */
  private settle(taskId: string, event: TaskEvent, mutate: (task: TaskRecord) => void): boolean {
    const task = this.tasks.get(taskId);
    if (!task) {
      log.warn({ taskId, event }, 'Terminal signal for unknown task');
      return false;
    }

    if (task.status !== TaskStatus.RUNNING) {
      log.info(
        { taskId, status: task.status, event },
        isStopStatus(task.status)
          ? 'Terminal signal ignored: stop already requested'
          : 'Terminal signal ignored: task not running'
      );
      return false;
    }

    mutate(task);
    this.apply(task, event);
    return true;
  }

  private apply(task: TaskRecord, event: TaskEvent): void {
    const next = getNextStatus(task.status, event);
    if (next === null) {
      const error = new InvalidTransitionError(
        task.taskId,
        task.status,
        event,
        getValidEvents(task.status)
      );
      log.error({ taskId: task.taskId, currentState: task.status, event }, error.message);
      throw error;
    }

    const from = task.status;
    task.status = next;

    if (isTerminalStatus(next) && task.endTime === undefined) {
      task.endTime = this.now();
    }

    log.info({ taskId: task.taskId, from, event, to: next }, 'State transition');
  }
}
