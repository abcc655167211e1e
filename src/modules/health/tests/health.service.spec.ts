import { HealthService } from '../health.service';
import type { WpdbService } from '../../wpdb/wpdb.service';

describe('HealthService', () => {
  let service: HealthService;

  beforeEach(() => {
    const wpdb = {
      describe: () => ({ database: 'wp_test', tablePrefix: 'wp_' }),
    } as unknown as WpdbService;
    service = new HealthService(wpdb);
  });

  describe('ping()', () => {
    it('returns ok=true and timing fields', () => {
      const result = service.ping();

      expect(result.ok).toBe(true);
      expect(result.service).toBe('theme-helpers-api');
      expect(result.tablePrefix).toBe('wp_');
      expect(result.epochMs).toBeGreaterThan(0);
      expect(result.uptimeSec).toBeGreaterThanOrEqual(0);
      expect(new Date(result.timestamp).getTime()).toBe(result.epochMs);
    });
  });

  describe('info()', () => {
    it('reports the database and table prefix in use', () => {
      const result = service.info();

      expect(result.status).toBe('ok');
      expect(result.node).toBe(process.version);
      expect(result.wpdb).toEqual({ database: 'wp_test', tablePrefix: 'wp_' });
    });

    it('reads the version from APP_VERSION', () => {
      const prev = process.env.APP_VERSION;
      process.env.APP_VERSION = '1.2.3';
      try {
        expect(service.info().version).toBe('1.2.3');
      } finally {
        if (prev === undefined) delete process.env.APP_VERSION;
        else process.env.APP_VERSION = prev;
      }
    });
  });
});
