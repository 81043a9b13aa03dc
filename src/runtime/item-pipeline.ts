import { createHash } from 'node:crypto';
import type { CrawlRecord } from '../types/index.js';

export type DropReason = 'missing_url' | 'invalid_url' | 'duplicate';

export interface DroppedRecord {
  record: CrawlRecord;
  reason: DropReason;
}

export interface PipelineResult {
  accepted: CrawlRecord[];
  dropped: DroppedRecord[];
}

export interface ItemPipelineContext {
  taskId: string;
  spiderName: string;
  now?: () => Date;
}

/**
 * Records need an absolute http(s) `url`.
 */
export function validateRecord(record: CrawlRecord): DropReason | null {
  const url = record['url'];
  if (typeof url !== 'string' || url.trim() === '') {
    return 'missing_url';
  }
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    return 'invalid_url';
  }
  return null;
}

/**
 * SHA-256 over `url:title`.
 */
export function fingerprintRecord(record: CrawlRecord): string {
  const url = record['url'];
  const title = record['title'];
  const content = `${typeof url === 'string' ? url : ''}:${title === undefined || title === null ? '' : String(title)}`;
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Per-job validation, deduplication and stamping of harvested records.
 */
export class ItemPipeline {
  private readonly seen = new Set<string>();
  private readonly now: () => Date;
  private accepted = 0;
  private dropped = 0;

  constructor(private readonly context: ItemPipelineContext) {
    this.now = context.now ?? (() => new Date());
  }

  get acceptedCount(): number {
    return this.accepted;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Run a batch through the stages, accepting at most `capacity` records.
   * Records beyond the capacity are left unprocessed.
   */
  process(records: readonly CrawlRecord[], capacity: number = Number.POSITIVE_INFINITY): PipelineResult {
    const result: PipelineResult = { accepted: [], dropped: [] };

    for (const record of records) {
      if (result.accepted.length >= capacity) {
        break;
      }

      const invalid = validateRecord(record);
      if (invalid) {
        result.dropped.push({ record, reason: invalid });
        continue;
      }

      const fingerprint = fingerprintRecord(record);
      if (this.seen.has(fingerprint)) {
        result.dropped.push({ record, reason: 'duplicate' });
        continue;
      }
      this.seen.add(fingerprint);

      result.accepted.push({
        ...record,
        crawled_at: this.now().toISOString(),
        spider_name: this.context.spiderName,
        task_id: this.context.taskId,
      });
    }

    this.accepted += result.accepted.length;
    this.dropped += result.dropped.length;
    return result;
  }
}
