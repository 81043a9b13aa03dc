import type { Logger } from 'pino';
import type { CrawlRecord, JobSummary, SpiderKwargs } from '../types/index.js';

/**
 * What a spider sees while it runs.
 */
export interface SpiderContext {
  readonly taskId: string;
  readonly spiderName: string;
  readonly kwargs: SpiderKwargs;
  /** Aborted when the job is stopped or reaches max_items */
  readonly signal: AbortSignal;
  readonly logger: Logger;
  /**
   * Hand harvested records to the item pipeline. Calls are delivered in
   * order; the promise settles once the batch reached the result store.
   */
  emit(records: CrawlRecord | CrawlRecord[]): Promise<void>;
}

/**
 * A job definition the runtime can launch by name.
 */
export interface SpiderDefinition {
  readonly name: string;
  readonly description?: string;
  readonly allowedDomains?: readonly string[];
  readonly startUrls?: readonly string[];
  run(context: SpiderContext): Promise<void>;
}

/**
 * Catalogue entry for a registered spider.
 */
export interface SpiderInfo {
  name: string;
  description: string | null;
  allowedDomains: string[];
  startUrls: string[];
}

export type JobOutcome =
  | { kind: 'completed'; summary: JobSummary }
  | { kind: 'failed'; reason: string; summary: JobSummary };

/**
 * Opaque reference to a launched job.
 */
export interface JobHandle {
  readonly taskId: string;
  readonly spiderName: string;
  /** Epoch milliseconds */
  readonly startedAt: number;
  /** One-shot terminal signal; settles exactly once and never rejects */
  readonly outcome: Promise<JobOutcome>;
}

/**
 * Destination for record batches that passed the item pipeline.
 */
export type RecordSink = (taskId: string, records: CrawlRecord[]) => Promise<void>;

export interface StopAcknowledgement {
  /** False when the timeout elapsed before the job tore down */
  acknowledged: boolean;
  durationMs: number;
}

/**
 * Adapter over the engine that actually executes spiders.
 */
export interface JobRuntime {
  /**
   * Start a job. Returns once the job is scheduled; throws when the spider
   * cannot be started at all.
   */
  launch(spiderName: string, taskId: string, kwargs: SpiderKwargs, sink: RecordSink): JobHandle;
  onComplete(handle: JobHandle, callback: (summary: JobSummary) => void): void;
  onFail(handle: JobHandle, callback: (reason: string, summary: JobSummary) => void): void;
  /** Live handle for a task; undefined once the job tore down */
  findHandle(taskId: string): JobHandle | undefined;
  requestStop(handle: JobHandle, timeoutMs: number): Promise<StopAcknowledgement>;
  activeCount(): number;
  /** Stop every live job, waiting up to `timeoutMs` for each */
  shutdown(timeoutMs: number): Promise<void>;
  /** Names of the spiders this runtime can launch */
  spiderNames(): string[];
  describeSpiders(): SpiderInfo[];
}
