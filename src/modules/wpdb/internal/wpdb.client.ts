import { createPool, type Pool, type PoolOptions } from 'mysql2/promise';
import type { WpdbConfig } from '../../../infra/wpdb/wpdb.config';

/**
 * Lazy mysql2 pool.
 * - Created on first use, so importing the module never opens sockets.
 * - Dates come back as strings to match what WordPress stores.
 */
export class LazyWpdbPool {
  private pool?: Pool;

  constructor(private readonly cfg: WpdbConfig) {}

  public getPool(): Pool {
    const existing = this.pool;
    if (existing) return existing;

    const options: PoolOptions = {
      host: this.cfg.host,
      port: this.cfg.port,
      user: this.cfg.user,
      password: this.cfg.password,
      database: this.cfg.database,
      connectionLimit: this.cfg.connectionLimit,
      dateStrings: true,
      charset: 'utf8mb4',
    };
    const created = createPool(options);
    this.pool = created;
    return created;
  }

  /** Close the pool if it was opened (idempotent). */
  public async close(): Promise<void> {
    const current = this.pool;
    if (!current) return;
    this.pool = undefined;
    await current.end();
  }
}
