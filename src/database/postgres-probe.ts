import pg from 'pg';
import { createLogger } from '../utils/logger.js';

const log = createLogger('database');

/**
 * Liveness view of the relational store. The service keeps no data there;
 * it only checks that the database answers.
 */
export interface DatabaseProbe {
  /** False when no database URL is configured */
  readonly configured: boolean;
  connect(): Promise<void>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface PostgresProbeOptions {
  url?: string;
  /** Extra pool settings, merged over the defaults */
  poolConfig?: pg.PoolConfig;
}

export class PostgresProbe implements DatabaseProbe {
  private pool: pg.Pool | null = null;
  private readonly url: string | undefined;
  private readonly poolConfig: pg.PoolConfig;

  constructor(options: PostgresProbeOptions = {}) {
    this.url = options.url;
    this.poolConfig = options.poolConfig ?? {};
  }

  get configured(): boolean {
    return this.url !== undefined;
  }

  async connect(): Promise<void> {
    if (this.url === undefined || this.pool) {
      return;
    }

    const pool = new pg.Pool({
      connectionString: this.url,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      ...this.poolConfig,
    });
    // Idle clients can error when the server goes away
    pool.on('error', (err) => {
      log.error({ err }, 'Idle database client error');
    });

    this.pool = pool;
    await this.ping();
    log.info('Database pool ready');
  }

  async ping(): Promise<void> {
    if (!this.pool) {
      throw new Error(this.configured ? 'Database pool not connected' : 'Database not configured');
    }
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (pool) {
      await pool.end();
      log.info('Database pool closed');
    }
  }
}
