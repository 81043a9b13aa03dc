/**
 * In-process job runtime.
 *
 * Runs every spider as an independent async unit on the event loop. The
 * orchestrator only ever sees a JobHandle: a task id plus a one-shot
 * outcome promise. Stops are delivered through the job's AbortSignal and
 * acknowledged when the spider's run has settled.
 */

import { createLogger } from '../utils/logger.js';
import { SpiderNotFoundError, describeError } from '../orchestrator/errors.js';
import type { CrawlRecord, JobSummary, SpiderKwargs } from '../types/index.js';
import { ItemPipeline } from './item-pipeline.js';
import { SpiderRegistry } from './spider-registry.js';
import type {
  JobHandle,
  JobOutcome,
  JobRuntime,
  RecordSink,
  SpiderContext,
  SpiderDefinition,
  SpiderInfo,
  StopAcknowledgement,
} from './types.js';

const log = createLogger('job-runtime');

export const DEFAULT_MAX_ITEMS = 1000;

export const CloseReason = {
  FINISHED: 'finished',
  CANCELLED: 'cancelled',
  MAX_ITEMS_REACHED: 'max_items_reached',
  ERROR: 'error',
} as const;

export type CloseReason = (typeof CloseReason)[keyof typeof CloseReason];

/**
 * Abort reason used when a job is stopped or closes itself.
 */
export class JobClosedError extends Error {
  constructor(public readonly closeReason: CloseReason) {
    super(`Job closed: ${closeReason}`);
    this.name = 'JobClosedError';
  }
}

export interface InProcessJobRuntimeOptions {
  /** Default for the `max_items` job parameter */
  maxItemsDefault?: number;
  now?: () => number;
}

interface JobControl {
  controller: AbortController;
  closeReason: CloseReason;
}

interface LiveJob {
  handle: JobHandle;
  control: JobControl;
}

/**
 * Read `max_items` from the job parameters; numeric strings are accepted.
 */
export function resolveMaxItems(kwargs: SpiderKwargs, fallback: number): number {
  const raw = kwargs['max_items'];
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

export class InProcessJobRuntime implements JobRuntime {
  private readonly jobs = new Map<string, LiveJob>();
  private readonly maxItemsDefault: number;
  private readonly now: () => number;

  constructor(
    private readonly spiders: SpiderRegistry,
    options: InProcessJobRuntimeOptions = {}
  ) {
    this.maxItemsDefault = options.maxItemsDefault ?? DEFAULT_MAX_ITEMS;
    this.now = options.now ?? (() => Date.now());
  }

  launch(spiderName: string, taskId: string, kwargs: SpiderKwargs, sink: RecordSink): JobHandle {
    const spider = this.spiders.get(spiderName);
    if (!spider) {
      throw new SpiderNotFoundError(spiderName, this.spiders.names());
    }
    if (this.jobs.has(taskId)) {
      throw new Error(`A job is already running for task ${taskId}`);
    }

    const control: JobControl = {
      controller: new AbortController(),
      closeReason: CloseReason.FINISHED,
    };
    const startedAt = this.now();

    const outcome = this.execute(spider, { taskId, spiderName, startedAt }, control, kwargs, sink);
    const handle: JobHandle = { taskId, spiderName, startedAt, outcome };
    this.jobs.set(taskId, { handle, control });

    log.info({ taskId, spiderName }, 'Job launched');
    return handle;
  }

  onComplete(handle: JobHandle, callback: (summary: JobSummary) => void): void {
    handle.outcome
      .then((outcome) => {
        if (outcome.kind === 'completed') {
          callback(outcome.summary);
        }
      })
      .catch((err: unknown) => {
        log.error({ err, taskId: handle.taskId }, 'Completion callback failed');
      });
  }

  onFail(handle: JobHandle, callback: (reason: string, summary: JobSummary) => void): void {
    handle.outcome
      .then((outcome) => {
        if (outcome.kind === 'failed') {
          callback(outcome.reason, outcome.summary);
        }
      })
      .catch((err: unknown) => {
        log.error({ err, taskId: handle.taskId }, 'Failure callback failed');
      });
  }

  findHandle(taskId: string): JobHandle | undefined {
    return this.jobs.get(taskId)?.handle;
  }

  async requestStop(handle: JobHandle, timeoutMs: number): Promise<StopAcknowledgement> {
    const startedAt = this.now();
    const job = this.jobs.get(handle.taskId);

    if (!job) {
      // Already torn down
      return { acknowledged: true, durationMs: 0 };
    }

    const { control } = job;
    if (!control.controller.signal.aborted) {
      control.closeReason = CloseReason.CANCELLED;
      control.controller.abort(new JobClosedError(CloseReason.CANCELLED));
      log.info({ taskId: handle.taskId, timeoutMs }, 'Stop signal delivered to job');
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      const acknowledged = await Promise.race([handle.outcome.then(() => true), timedOut]);
      return { acknowledged, durationMs: this.now() - startedAt };
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  activeCount(): number {
    return this.jobs.size;
  }

  async shutdown(timeoutMs: number): Promise<void> {
    const handles = [...this.jobs.values()].map((job) => job.handle);
    if (handles.length === 0) {
      return;
    }

    log.info({ jobs: handles.length, timeoutMs }, 'Shutting down job runtime');
    const acks = await Promise.all(handles.map((handle) => this.requestStop(handle, timeoutMs)));
    const unacknowledged = acks.filter((ack) => !ack.acknowledged).length;
    if (unacknowledged > 0) {
      log.warn({ unacknowledged }, 'Jobs did not acknowledge shutdown in time');
    }
  }

  spiderNames(): string[] {
    return this.spiders.names();
  }

  describeSpiders(): SpiderInfo[] {
    return this.spiders.list();
  }

  private async execute(
    spider: SpiderDefinition,
    identity: Pick<JobHandle, 'taskId' | 'spiderName' | 'startedAt'>,
    job: JobControl,
    kwargs: SpiderKwargs,
    sink: RecordSink
  ): Promise<JobOutcome> {
    const { taskId, spiderName, startedAt } = identity;
    const { controller } = job;

    // Let launch() return before any spider code runs
    await Promise.resolve();

    const jobLog = log.child({ taskId, spiderName });
    const pipeline = new ItemPipeline({ taskId, spiderName });
    const maxItems = resolveMaxItems(kwargs, this.maxItemsDefault);

    let delivery: Promise<void> = Promise.resolve();
    let deliveryError: unknown;

    const deliver = async (batch: CrawlRecord[]): Promise<void> => {
      if (job.closeReason === CloseReason.MAX_ITEMS_REACHED) {
        return;
      }
      if (job.closeReason === CloseReason.CANCELLED) {
        jobLog.debug({ records: batch.length }, 'Batch dropped: job cancelled');
        return;
      }

      const capacity = maxItems - pipeline.acceptedCount;
      const { accepted, dropped } = pipeline.process(batch, capacity);

      for (const { reason } of dropped) {
        jobLog.debug({ reason }, 'Record dropped');
      }
      if (accepted.length > 0) {
        await sink(taskId, accepted);
      }

      if (pipeline.acceptedCount >= maxItems && !controller.signal.aborted) {
        jobLog.info({ maxItems }, 'Max items reached, closing spider');
        job.closeReason = CloseReason.MAX_ITEMS_REACHED;
        controller.abort(new JobClosedError(CloseReason.MAX_ITEMS_REACHED));
      }
    };

    const context: SpiderContext = {
      taskId,
      spiderName,
      kwargs: { ...kwargs },
      signal: controller.signal,
      logger: jobLog,
      emit: (records) => {
        const batch = Array.isArray(records) ? records : [records];
        const next = delivery.then(() => deliver(batch));
        delivery = next.catch((err: unknown) => {
          deliveryError ??= err;
        });
        return next;
      },
    };

    const summarize = (closeReason: CloseReason): JobSummary => ({
      itemsScraped: pipeline.acceptedCount,
      itemsDropped: pipeline.droppedCount,
      closeReason,
      durationMs: this.now() - startedAt,
    });

    let outcome: JobOutcome;
    try {
      let runError: unknown;
      try {
        await spider.run(context);
      } catch (error) {
        runError = error;
      }

      // Every emitted batch lands before the job reports back
      await delivery;

      if (deliveryError !== undefined) {
        throw deliveryError;
      }
      if (runError !== undefined && job.closeReason !== CloseReason.MAX_ITEMS_REACHED) {
        throw runError;
      }

      outcome = { kind: 'completed', summary: summarize(job.closeReason) };
      jobLog.info({ ...outcome.summary }, 'Job finished');
    } catch (error) {
      const reason =
        job.closeReason === CloseReason.CANCELLED ? 'Job cancelled' : describeError(error);
      outcome = {
        kind: 'failed',
        reason,
        summary: summarize(job.closeReason === CloseReason.FINISHED ? CloseReason.ERROR : job.closeReason),
      };
      jobLog.warn({ err: error, reason }, 'Job failed');
    } finally {
      this.jobs.delete(taskId);
    }

    return outcome;
  }
}
