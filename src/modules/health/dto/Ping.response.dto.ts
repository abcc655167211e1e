import type { PingResult } from '../health.service';

// Response DTO for GET /api/health/ping

export class PingResponseDto {
  public readonly ok: true;
  public readonly service: PingResult['service'];
  public readonly tablePrefix: string;
  public readonly timestamp: string;
  public readonly epochMs: number;
  public readonly uptimeSec: number;

  public constructor(args: Omit<PingResult, 'ok'>) {
    this.ok = true;
    this.service = args.service;
    this.tablePrefix = args.tablePrefix;
    this.timestamp = args.timestamp;
    this.epochMs = args.epochMs;
    this.uptimeSec = args.uptimeSec;
  }
}
