import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { escape, escapeId } from 'mysql2';
import type { RowDataPacket } from 'mysql2/promise';
import {
  wpdbTables,
  type WpdbConfig,
  type WpdbTables,
} from '../../infra/wpdb/wpdb.config';
import { StoreActionError } from '../../lib/errors/StoreActionError';
import type { UserDataStore } from '../../lib/users/types';
import { summarize } from '../../lib/utils/strings';
import { LazyWpdbPool } from './internal/wpdb.client';
import { WPDB_CONFIG } from './wpdb.constants';

/**
 * Read access to the WordPress database.
 * Queries are plain SQL text; callers escape through `escape` / `escapeId`.
 */
@Injectable()
export class WpdbService implements UserDataStore, OnModuleDestroy {
  private readonly logger = new Logger('WpdbService');
  private readonly pool: LazyWpdbPool;
  public readonly tables: WpdbTables;

  constructor(@Inject(WPDB_CONFIG) private readonly cfg: WpdbConfig) {
    this.pool = new LazyWpdbPool(cfg);
    this.tables = wpdbTables(cfg);
  }

  /** Quote a value as an SQL literal. */
  public escape(value: string | number): string {
    return escape(value);
  }

  /** Quote an identifier; a dot splits it into qualified parts. */
  public escapeId(identifier: string): string {
    return escapeId(identifier);
  }

  /** Run a read query and return its rows. Errors propagate wrapped. */
  public async getResults(
    sql: string,
  ): Promise<ReadonlyArray<Record<string, unknown>>> {
    try {
      const [rows] = await this.pool.getPool().query<RowDataPacket[]>(sql);
      this.logger.debug(`getResults -> ${rows.length} row(s)`);
      return rows;
    } catch (err) {
      throw StoreActionError.wrap(err, {
        store: 'mysql',
        operation: 'getResults',
        dbName: this.cfg.database,
        argsPreview: { sql: summarize(sql) },
      });
    }
  }

  /** Connection facts safe to expose (no credentials). */
  public describe(): { database: string; tablePrefix: string } {
    return { database: this.cfg.database, tablePrefix: this.cfg.tablePrefix };
  }

  public async onModuleDestroy(): Promise<void> {
    await this.pool.close();
  }
}
