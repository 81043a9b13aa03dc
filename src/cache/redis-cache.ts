import { Redis, type RedisOptions } from 'ioredis';
import { createLogger } from '../utils/logger.js';
import type { CacheClient, CacheInfo } from './types.js';

const log = createLogger('cache:redis');

export interface RedisCacheOptions {
  url: string;
  /** Extra ioredis options merged over the defaults */
  redisOptions?: RedisOptions;
}

function readInfoNumber(fields: Map<string, string>, name: string): number {
  const value = Number(fields.get(name) ?? 0);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Reply of the first command of a MULTI/EXEC, after checking that the
 * transaction ran and no command in it failed.
 */
function firstReply(results: [error: Error | null, result: unknown][] | null, key: string): unknown {
  if (!results) {
    throw new Error(`Transaction aborted on ${key}`);
  }
  for (const [error] of results) {
    if (error) {
      throw error;
    }
  }
  return results[0]?.[1];
}

/**
 * Parse the `INFO` reply: `key:value` lines grouped under `# Section` headers.
 */
export function parseRedisInfo(raw: string): CacheInfo {
  const fields = new Map<string, string>();
  for (const line of raw.split(/\r?\n/)) {
    if (!line || line.startsWith('#')) {
      continue;
    }
    const separator = line.indexOf(':');
    if (separator > 0) {
      fields.set(line.slice(0, separator), line.slice(separator + 1).trim());
    }
  }

  return {
    connectedClients: readInfoNumber(fields, 'connected_clients'),
    usedMemoryBytes: readInfoNumber(fields, 'used_memory'),
    keyspaceHits: readInfoNumber(fields, 'keyspace_hits'),
    keyspaceMisses: readInfoNumber(fields, 'keyspace_misses'),
  };
}

/**
 * CacheClient backed by a Redis server through ioredis.
 */
export class RedisCache implements CacheClient {
  readonly backend = 'redis' as const;
  private readonly client: Redis;

  constructor(options: RedisCacheOptions) {
    this.client = new Redis(options.url, {
      lazyConnect: true,
      maxRetriesPerRequest: 2,
      enableOfflineQueue: false,
      ...options.redisOptions,
    });

    this.client.on('error', (err: Error) => {
      log.error({ err }, 'Redis connection error');
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
    log.info('Redis connection established');
  }

  async close(): Promise<void> {
    await this.client.quit();
    log.info('Redis connection closed');
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async info(): Promise<CacheInfo> {
    return parseRedisInfo(await this.client.info());
  }

  async incrementWindow(key: string, ttlSeconds: number): Promise<number> {
    const results = await this.client.multi().incr(key).expire(key, ttlSeconds, 'NX').exec();
    const count = firstReply(results, key);
    if (typeof count !== 'number') {
      throw new Error(`Unexpected INCR reply for ${key}`);
    }
    return count;
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  async appendToList(key: string, values: string[], ttlSeconds: number): Promise<number> {
    const results = await this.client
      .multi()
      .rpush(key, ...values)
      .expire(key, ttlSeconds)
      .exec();

    const pushed = firstReply(results, key);
    if (typeof pushed !== 'number') {
      throw new Error(`Unexpected RPUSH reply for ${key}`);
    }
    return pushed;
  }

  async listRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lrange(key, start, stop);
  }

  async listLength(key: string): Promise<number> {
    return this.client.llen(key);
  }
}
