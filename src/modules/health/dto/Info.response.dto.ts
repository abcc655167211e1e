import type { InfoResult } from '../health.service';

// Response DTO for GET /api/health/info

export class InfoResponseDto {
  public readonly status: 'ok';
  public readonly timestamp: string;
  public readonly uptimeSec: number;
  public readonly node: string;
  public readonly env: string;
  public readonly version: string | null;
  public readonly wpdb: { database: string; tablePrefix: string };

  public constructor(args: Omit<InfoResult, 'status'>) {
    this.status = 'ok';
    this.timestamp = args.timestamp;
    this.uptimeSec = args.uptimeSec;
    this.node = args.node;
    this.env = args.env;
    this.version = args.version;
    this.wpdb = { ...args.wpdb };
  }
}
