/**
 * Process-wide clients with an explicit lifecycle: init() before the server
 * listens, close() after it stopped.
 */

import { createCacheClient } from '../cache/index.js';
import type { CacheClient } from '../cache/types.js';
import type { CrawlControlConfig } from '../config/index.js';
import { PostgresProbe, type DatabaseProbe } from '../database/postgres-probe.js';
import { describeError } from '../orchestrator/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('resources');

export class ResourceManager {
  constructor(
    readonly cache: CacheClient,
    readonly database: DatabaseProbe
  ) {}

  static fromConfig(
    config: Pick<CrawlControlConfig, 'cacheBackend' | 'redisUrl' | 'databaseUrl'>
  ): ResourceManager {
    return new ResourceManager(
      createCacheClient(config),
      new PostgresProbe({ url: config.databaseUrl })
    );
  }

  async init(): Promise<void> {
    log.info({ cache: this.cache.backend, database: this.database.configured }, 'Initializing resources');
    await this.cache.connect();
    await this.database.connect();
    log.info('Resources initialized');
  }

  /**
   * Close every client. Failures are logged and do not stop the others
   * from closing.
   */
  async close(): Promise<string[]> {
    const errors: string[] = [];

    for (const [name, closeable] of [
      ['cache', this.cache],
      ['database', this.database],
    ] as const) {
      try {
        await closeable.close();
      } catch (error) {
        const message = `${name}: ${describeError(error)}`;
        errors.push(message);
        log.error({ err: error, resource: name }, 'Failed to close resource');
      }
    }

    if (errors.length === 0) {
      log.info('Resources closed');
    }
    return errors;
  }
}
