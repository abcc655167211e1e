import { loadWpdbConfig, WPDB_DEFAULTS, wpdbTables } from '../wpdb.config';

describe('loadWpdbConfig', () => {
  it('falls back to defaults on an empty env', () => {
    expect(loadWpdbConfig({})).toEqual(WPDB_DEFAULTS);
  });

  it('reads and trims every setting', () => {
    const cfg = loadWpdbConfig({
      WPDB_HOST: ' db.internal ',
      WPDB_PORT: '3307',
      WPDB_USER: 'reader',
      WPDB_PASSWORD: ' test secret ',
      WPDB_NAME: 'blog',
      WPDB_TABLE_PREFIX: 'wp2_',
      WPDB_CONNECTION_LIMIT: '12',
    });

    expect(cfg).toEqual({
      host: 'db.internal',
      port: 3307,
      user: 'reader',
      password: ' test secret ',
      database: 'blog',
      tablePrefix: 'wp2_',
      connectionLimit: 12,
    });
  });

  it('ignores malformed numbers and prefixes', () => {
    const cfg = loadWpdbConfig({
      WPDB_PORT: '70000',
      WPDB_CONNECTION_LIMIT: '-1',
      WPDB_TABLE_PREFIX: 'wp_; DROP',
    });

    expect(cfg.port).toBe(3306);
    expect(cfg.connectionLimit).toBe(5);
    expect(cfg.tablePrefix).toBe('wp_');
  });

  it('accepts an empty table prefix', () => {
    expect(wpdbTables(loadWpdbConfig({ WPDB_TABLE_PREFIX: '' }))).toEqual({
      users: 'users',
      usermeta: 'usermeta',
    });
  });
});
