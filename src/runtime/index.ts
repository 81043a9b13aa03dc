export * from './types.js';
export { InProcessJobRuntime, CloseReason, JobClosedError, resolveMaxItems, DEFAULT_MAX_ITEMS } from './job-runtime.js';
export type { InProcessJobRuntimeOptions } from './job-runtime.js';
export { ItemPipeline, validateRecord, fingerprintRecord } from './item-pipeline.js';
export type { DropReason, DroppedRecord, PipelineResult } from './item-pipeline.js';
export { SpiderRegistry } from './spider-registry.js';
export {
  createExampleSpider,
  createAxiosJsonFetcher,
  EXAMPLE_SPIDER_NAME,
  EXAMPLE_SPIDER_URL,
  type JsonFetcher,
} from './spiders/example-spider.js';
