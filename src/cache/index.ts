import type { CrawlControlConfig } from '../config/index.js';
import { MemoryCache } from './memory-cache.js';
import { RedisCache } from './redis-cache.js';
import type { CacheClient } from './types.js';

export function createCacheClient(
  config: Pick<CrawlControlConfig, 'cacheBackend' | 'redisUrl'>
): CacheClient {
  return config.cacheBackend === 'memory'
    ? new MemoryCache()
    : new RedisCache({ url: config.redisUrl });
}

export { MemoryCache, type MemoryCacheOptions } from './memory-cache.js';
export { RedisCache, parseRedisInfo, type RedisCacheOptions } from './redis-cache.js';
export type { CacheClient, CacheInfo } from './types.js';
