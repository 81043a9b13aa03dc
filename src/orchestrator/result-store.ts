import type { CacheClient } from '../cache/types.js';
import type { CrawlRecord, ResultPage } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { InvalidRequestError, TransientInfrastructureError, describeError } from './errors.js';

const log = createLogger('result-store');

export const RESULT_KEY_PREFIX = 'crawl_results:';
export const DEFAULT_RESULT_TTL_SECONDS = 3600;

export function resultKey(taskId: string): string {
  return `${RESULT_KEY_PREFIX}${taskId}`;
}

export interface ResultStoreOptions {
  /** Expiry window, refreshed by every append */
  ttlSeconds?: number;
}

/**
 * Offsets count from the head only; a zero or negative limit would turn
 * into an LRANGE that reads from the tail.
 */
export function assertPageBounds(offset: number, limit: number): void {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidRequestError(`Invalid offset ${offset}: expected a non-negative integer`, { offset });
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidRequestError(`Invalid limit ${limit}: expected a positive integer`, { limit });
  }
}

/**
 * Append-only, per-task record log on the shared cache.
 *
 * Records are stored as JSON list entries under `crawl_results:{taskId}`.
 * The key carries a single absolute expiry that only appends refresh.
 */
export class ResultStore {
  readonly ttlSeconds: number;

  constructor(
    private readonly cache: CacheClient,
    options: ResultStoreOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_RESULT_TTL_SECONDS;
  }

  /**
   * Append records in order. Returns the stored total.
   */
  async append(taskId: string, records: readonly CrawlRecord[]): Promise<number> {
    if (records.length === 0) {
      return this.withCache('append', taskId, () => this.cache.listLength(resultKey(taskId)));
    }

    const payloads = records.map((record) => JSON.stringify(record));
    const total = await this.withCache('append', taskId, () =>
      this.cache.appendToList(resultKey(taskId), payloads, this.ttlSeconds)
    );

    log.debug({ taskId, appended: records.length, total }, 'Records appended');
    return total;
  }

  /**
   * Slice `[offset, offset + limit)` in insertion order plus the total count.
   */
  async read(taskId: string, offset: number, limit: number): Promise<ResultPage> {
    assertPageBounds(offset, limit);
    const key = resultKey(taskId);
    const [raw, total] = await this.withCache('read', taskId, () =>
      Promise.all([
        this.cache.listRange(key, offset, offset + limit - 1),
        this.cache.listLength(key),
      ])
    );

    const items = raw.map((entry, index) => {
      try {
        const parsed: unknown = JSON.parse(entry);
        return toRecord(parsed);
      } catch (error) {
        throw new TransientInfrastructureError(
          'cache',
          `corrupted entry ${offset + index} for task ${taskId}`,
          { cause: error }
        );
      }
    });

    return {
      items,
      total,
      hasMore: offset + limit < total,
    };
  }

  private async withCache<T>(operation: string, taskId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof TransientInfrastructureError) {
        throw error;
      }
      log.error({ err: error, taskId, operation }, 'Result store operation failed');
      throw new TransientInfrastructureError('cache', describeError(error), { cause: error });
    }
  }
}

/**
 * Records are JSON objects when the runtime stores them; anything else is
 * wrapped so callers always receive an object.
 */
function toRecord(value: unknown): CrawlRecord {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return { value };
}
