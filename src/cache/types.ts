/**
 * Server statistics surfaced by the metrics endpoint.
 */
export interface CacheInfo {
  connectedClients: number;
  usedMemoryBytes: number;
  keyspaceHits: number;
  keyspaceMisses: number;
}

/**
 * Port over the shared cache. Mirrors the handful of Redis commands the
 * result store and the rate limiter need.
 */
export interface CacheClient {
  readonly backend: 'redis' | 'memory';

  connect(): Promise<void>;
  close(): Promise<void>;
  /** Round-trip check; rejects when the cache is unreachable */
  ping(): Promise<void>;
  info(): Promise<CacheInfo>;

  /**
   * INCR then EXPIRE NX in one transaction: the counter is created with a
   * `ttlSeconds` expiry and later increments keep it. Returns the new value.
   */
  incrementWindow(key: string, ttlSeconds: number): Promise<number>;
  /** TTL in seconds: -2 when the key does not exist, -1 when it has no expiry */
  ttl(key: string): Promise<number>;

  /** RPUSH every value then EXPIRE the key, in one transaction; returns the list length */
  appendToList(key: string, values: string[], ttlSeconds: number): Promise<number>;
  /** LRANGE with inclusive bounds */
  listRange(key: string, start: number, stop: number): Promise<string[]>;
  listLength(key: string): Promise<number>;
}
