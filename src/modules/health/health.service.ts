import { Injectable } from '@nestjs/common';
import { WpdbService } from '../wpdb/wpdb.service';

/** Service name reported by ping. */
export const SERVICE_NAME = 'theme-helpers-api';

export interface PingResult {
  ok: true;
  service: typeof SERVICE_NAME;
  /** Table prefix of the WordPress site this instance serves. */
  tablePrefix: string;
  timestamp: string; // ISO-8601
  epochMs: number;
  uptimeSec: number;
}

export interface InfoResult {
  status: 'ok';
  timestamp: string; // ISO-8601
  uptimeSec: number;
  node: string;
  env: string;
  version: string | null;
  /** WordPress database in use; no connection is attempted. */
  wpdb: { database: string; tablePrefix: string };
}

@Injectable()
export class HealthService {
  constructor(private readonly wpdb: WpdbService) {}

  public ping(): PingResult {
    const now = new Date();
    return {
      ok: true,
      service: SERVICE_NAME,
      tablePrefix: this.wpdb.describe().tablePrefix,
      timestamp: now.toISOString(),
      epochMs: now.getTime(),
      uptimeSec: Math.floor(process.uptime()),
    };
  }

  public info(): InfoResult {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptimeSec: Math.floor(process.uptime()),
      node: process.version,
      env: process.env.NODE_ENV ? String(process.env.NODE_ENV) : 'development',
      version: process.env.APP_VERSION ? String(process.env.APP_VERSION) : null,
      wpdb: this.wpdb.describe(),
    };
  }
}
