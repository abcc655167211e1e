/**
 * Environment variable names for the WordPress database connection.
 */
export const ENV_WPDB_HOST = 'WPDB_HOST';
export const ENV_WPDB_PORT = 'WPDB_PORT';
export const ENV_WPDB_USER = 'WPDB_USER';
export const ENV_WPDB_PASSWORD = 'WPDB_PASSWORD';
export const ENV_WPDB_NAME = 'WPDB_NAME';
export const ENV_WPDB_TABLE_PREFIX = 'WPDB_TABLE_PREFIX';
export const ENV_WPDB_CONNECTION_LIMIT = 'WPDB_CONNECTION_LIMIT';

export interface WpdbConfig {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  /** Prepended to every table name (`wp_` -> `wp_users`, `wp_usermeta`). */
  readonly tablePrefix: string;
  readonly connectionLimit: number;
}

export const WPDB_DEFAULTS: Readonly<WpdbConfig> = {
  host: '127.0.0.1',
  port: 3306,
  user: 'wordpress',
  password: 'wordpress', // dev-only fallback; override via env
  database: 'wordpress',
  tablePrefix: 'wp_',
  connectionLimit: 5,
};

function parsePort(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= 65535 ? n : fallback;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

/** Table prefixes are plain identifiers; anything else falls back. */
function parsePrefix(value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback;
  const v = value.trim();
  return /^[A-Za-z0-9_]*$/.test(v) ? v : fallback;
}

function pick(value: string | undefined, fallback: string): string {
  return (value && value.trim()) || fallback;
}

/**
 * Load the connection settings from the environment.
 * Never throws; unset or malformed values take the defaults.
 */
export function loadWpdbConfig(env: NodeJS.ProcessEnv = process.env): WpdbConfig {
  return {
    host: pick(env[ENV_WPDB_HOST], WPDB_DEFAULTS.host),
    port: parsePort(env[ENV_WPDB_PORT], WPDB_DEFAULTS.port),
    user: pick(env[ENV_WPDB_USER], WPDB_DEFAULTS.user),
    // passwords are taken verbatim (may contain spaces)
    password: env[ENV_WPDB_PASSWORD] ?? WPDB_DEFAULTS.password,
    database: pick(env[ENV_WPDB_NAME], WPDB_DEFAULTS.database),
    tablePrefix: parsePrefix(env[ENV_WPDB_TABLE_PREFIX], WPDB_DEFAULTS.tablePrefix),
    connectionLimit: parsePositiveInt(
      env[ENV_WPDB_CONNECTION_LIMIT],
      WPDB_DEFAULTS.connectionLimit,
    ),
  };
}

export interface WpdbTables {
  readonly users: string;
  readonly usermeta: string;
}

export function wpdbTables(cfg: Pick<WpdbConfig, 'tablePrefix'>): WpdbTables {
  return {
    users: `${cfg.tablePrefix}users`,
    usermeta: `${cfg.tablePrefix}usermeta`,
  };
}
