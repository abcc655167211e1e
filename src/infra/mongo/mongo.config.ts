/**
 * Environment variable names for the field-definition store.
 */
export const ENV_MONGO_URI = 'MONGO_URI';
export const ENV_MONGO_DB_NAME = 'MONGO_DB_NAME';
export const ENV_MONGO_SERVER_SELECTION_TIMEOUT_MS =
  'MONGO_SERVER_SELECTION_TIMEOUT_MS';

export interface MongoConfig {
  /** Connection string, credentials included when needed. */
  readonly uri: string;
  /** Database that holds the `fields` collection. */
  readonly dbName: string;
  /** How long the driver waits for a reachable server before failing. */
  readonly serverSelectionTimeoutMs: number;
}

export const MONGO_DEFAULTS: Readonly<MongoConfig> = {
  uri: 'mongodb://127.0.0.1:27017/?directConnection=true',
  dbName: 'theme',
  serverSelectionTimeoutMs: 5_000,
};

function parseTimeout(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

/**
 * Load strongly typed Mongo settings from process.env.
 * Never throws; always returns a complete config with defaults.
 */
export function loadMongoConfig(env: NodeJS.ProcessEnv = process.env): MongoConfig {
  const uri =
    (env[ENV_MONGO_URI] && env[ENV_MONGO_URI].trim()) || MONGO_DEFAULTS.uri;
  const dbName =
    (env[ENV_MONGO_DB_NAME] && env[ENV_MONGO_DB_NAME].trim()) ||
    MONGO_DEFAULTS.dbName;
  return {
    uri,
    dbName,
    serverSelectionTimeoutMs: parseTimeout(
      env[ENV_MONGO_SERVER_SELECTION_TIMEOUT_MS],
      MONGO_DEFAULTS.serverSelectionTimeoutMs,
    ),
  };
}
