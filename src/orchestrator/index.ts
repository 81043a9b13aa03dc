import type { CacheClient } from '../cache/types.js';
import type { CrawlControlConfig } from '../config/index.js';
import { InProcessJobRuntime } from '../runtime/job-runtime.js';
import { SpiderRegistry } from '../runtime/spider-registry.js';
import { createExampleSpider } from '../runtime/spiders/example-spider.js';
import type { JobRuntime, SpiderDefinition } from '../runtime/types.js';
import { Orchestrator } from './orchestrator.js';
import { ResultStore } from './result-store.js';
import { TaskRegistry } from './task-registry.js';

export interface CreateOrchestratorOptions {
  cache: CacheClient;
  config: Pick<CrawlControlConfig, 'resultTtlSeconds' | 'stopTimeoutMs' | 'maxItemsDefault'>;
  /** Defaults to the built-in catalogue */
  spiders?: SpiderDefinition[];
  /** Replaces the in-process runtime, e.g. with a test double */
  runtime?: JobRuntime;
}

export function createDefaultSpiders(): SpiderDefinition[] {
  return [createExampleSpider()];
}

/**
 * Wire an orchestrator with its registry, runtime and result store.
 */
export function createOrchestrator(options: CreateOrchestratorOptions): Orchestrator {
  const { cache, config } = options;
  const runtime =
    options.runtime ??
    new InProcessJobRuntime(new SpiderRegistry(options.spiders ?? createDefaultSpiders()), {
      maxItemsDefault: config.maxItemsDefault,
    });

  return new Orchestrator(
    new TaskRegistry(),
    runtime,
    new ResultStore(cache, { ttlSeconds: config.resultTtlSeconds }),
    { stopTimeoutMs: config.stopTimeoutMs }
  );
}

export { Orchestrator, DEFAULT_STOP_TIMEOUT_MS } from './orchestrator.js';
export type { OrchestratorOptions, OrchestratorStats } from './orchestrator.js';
export { TaskRegistry, monotonicNow, DEFAULT_PRIORITY, DEFAULT_TIMEOUT_SECONDS } from './task-registry.js';
export type { TaskRegistryOptions } from './task-registry.js';
export { ResultStore, resultKey, RESULT_KEY_PREFIX, DEFAULT_RESULT_TTL_SECONDS } from './result-store.js';
export * from './state-machine.js';
export * from './errors.js';
