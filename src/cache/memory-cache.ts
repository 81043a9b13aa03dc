import type { CacheClient, CacheInfo } from './types.js';

interface Entry {
  value: string | string[];
  /** Epoch milliseconds; undefined means no expiry */
  expiresAt?: number;
}

export interface MemoryCacheOptions {
  now?: () => number;
}

/**
 * In-process CacheClient with Redis semantics for the commands the service
 * uses. Backs `CRAWL_CACHE_BACKEND=memory` and the test suites.
 */
export class MemoryCache implements CacheClient {
  readonly backend = 'memory' as const;
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: MemoryCacheOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  async connect(): Promise<void> {}

  async close(): Promise<void> {
    this.entries.clear();
  }

  async ping(): Promise<void> {}

  async info(): Promise<CacheInfo> {
    let usedMemoryBytes = 0;
    for (const [key, entry] of this.entries) {
      const values = Array.isArray(entry.value) ? entry.value : [entry.value];
      usedMemoryBytes += key.length + values.reduce((sum, value) => sum + value.length, 0);
    }
    return {
      connectedClients: 1,
      usedMemoryBytes,
      keyspaceHits: this.hits,
      keyspaceMisses: this.misses,
    };
  }

  async incrementWindow(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.lookup(key);
    if (entry === undefined) {
      this.entries.set(key, { value: '1', expiresAt: this.now() + ttlSeconds * 1000 });
      return 1;
    }
    if (Array.isArray(entry.value)) {
      throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    }
    const next = Number(entry.value) + 1;
    entry.value = String(next);
    entry.expiresAt ??= this.now() + ttlSeconds * 1000;
    return next;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.lookup(key);
    if (entry === undefined) {
      return -2;
    }
    if (entry.expiresAt === undefined) {
      return -1;
    }
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async appendToList(key: string, values: string[], ttlSeconds: number): Promise<number> {
    const entry = this.lookup(key);
    let list: string[];
    if (entry === undefined) {
      list = [];
    } else if (Array.isArray(entry.value)) {
      list = entry.value;
    } else {
      throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    }
    list.push(...values);
    this.entries.set(key, { value: list, expiresAt: this.now() + ttlSeconds * 1000 });
    return list.length;
  }

  async listRange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.readList(key);
    const length = list.length;
    const from = start < 0 ? Math.max(length + start, 0) : start;
    const to = stop < 0 ? length + stop : Math.min(stop, length - 1);
    if (from > to) {
      return [];
    }
    return list.slice(from, to + 1);
  }

  async listLength(key: string): Promise<number> {
    return this.readList(key).length;
  }

  private readList(key: string): string[] {
    const entry = this.lookup(key);
    if (entry === undefined) {
      return [];
    }
    if (!Array.isArray(entry.value)) {
      throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    }
    return entry.value;
  }

  private lookup(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      this.misses += 1;
      return undefined;
    }
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return entry;
  }
}
