/**
 * All possible crawl task states.
 */
export const TaskStatus = {
  PENDING: 'PENDING',
  RUNNING: 'RUNNING',
  STOPPING: 'STOPPING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  STOPPED: 'STOPPED',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/**
 * Events that drive task state transitions.
 */
export const TaskEvent = {
  LAUNCH_ACK: 'launch_ack',
  LAUNCH_FAILED: 'launch_failed',
  STOP_REQUESTED: 'stop_requested',
  JOB_COMPLETED: 'job_completed',
  JOB_FAILED: 'job_failed',
  RUNTIME_TORN_DOWN: 'runtime_torn_down',
} as const;

export type TaskEvent = (typeof TaskEvent)[keyof typeof TaskEvent];

/**
 * Opaque job parameters handed to a spider.
 */
export type SpiderKwargs = Record<string, unknown>;

/**
 * A harvested record. Payloads are opaque to the orchestrator.
 */
export type CrawlRecord = Record<string, unknown>;

/**
 * Summary a job reports when it finishes on its own.
 */
export interface JobSummary {
  itemsScraped: number;
  itemsDropped: number;
  closeReason: string;
  durationMs: number;
}

/**
 * One launched crawl job as tracked by the task registry.
 */
export interface TaskRecord {
  taskId: string;
  spiderName: string;
  kwargs: SpiderKwargs;
  /** Accepted and stored, not yet used for scheduling */
  priority: number;
  /** Accepted and stored, not yet enforced */
  timeoutSeconds: number;
  status: TaskStatus;
  /** Monotonic epoch milliseconds */
  startTime: number;
  /** Set exactly once, on the first terminal transition */
  endTime?: number;
  itemsCount: number;
  /** Present only when status is FAILED */
  failureReason?: string;
  result?: JobSummary;
}

/**
 * Options accepted when a task is created.
 */
export interface CreateTaskOptions {
  priority?: number;
  timeoutSeconds?: number;
}

/**
 * Page of stored records for a task.
 */
export interface ResultPage {
  items: CrawlRecord[];
  total: number;
  hasMore: boolean;
}
