/**
 * Application Configuration
 *
 * Centralized, validated configuration loaded from environment variables.
 * Entry points load a local `.env` (copied from `.env.example`) through
 * dotenv before the first call to `getConfig()`; this module only reads
 * `process.env`.
 *
 * Configuration errors throw with the offending variable named, so the
 * server never starts without database credentials.
 */

/**
 * MySQL connection settings
 */
export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  /** Maximum pooled connections */
  connectionLimit: number;
}

export interface AppConfig {
  // Web server
  host: string;
  port: number;
  corsOrigins: string[];
  logRequests: boolean;

  // MySQL
  database: DatabaseConfig;
}

type Env = Record<string, string | undefined>;

const REQUIRED_VARS = ['DB_USER', 'DB_PASSWORD'] as const;

/**
 * Parse CORS origins from environment variable
 *
 * - Single '*' (or empty) allows all origins
 * - Comma-separated list for specific origins
 */
export function parseCorsOrigins(value: string): string[] {
  if (!value || value.trim() === '*') {
    return ['*'];
  }
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

function parsePort(name: string, value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid ${name} value: ${value}. Must be between 1 and 65535.`);
  }
  return port;
}

/**
 * Validate and load application configuration
 *
 * DB_PASSWORD must be present but may be empty (local root accounts often
 * have no password).
 *
 * @throws {Error} If required environment variables are missing or invalid
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missingVars = REQUIRED_VARS.filter(varName => env[varName] === undefined);

  if (missingVars.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingVars.join(', ')}\n` +
      `Copy .env.example to .env and fill in your MySQL credentials`
    );
  }

  const port = parsePort('PORT', env.PORT || '8501');
  const dbPort = parsePort('DB_PORT', env.DB_PORT || '3306');

  const poolSizeValue = env.DB_POOL_SIZE || '10';
  const connectionLimit = parseInt(poolSizeValue, 10);
  if (isNaN(connectionLimit) || connectionLimit < 1) {
    throw new Error(`Invalid DB_POOL_SIZE value: ${poolSizeValue}. Must be at least 1.`);
  }

  return {
    host: env.HOST || 'localhost',
    port,
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS || '*'),
    logRequests: env.LOG_REQUESTS !== 'false',

    database: {
      host: env.DB_HOST || 'localhost',
      port: dbPort,
      user: env.DB_USER ?? '',
      password: env.DB_PASSWORD ?? '',
      database: env.DB_NAME || 'MNMarketLink',
      connectionLimit,
    },
  };
}

/**
 * Application configuration singleton
 */
let cachedConfig: AppConfig | null = null;

/**
 * Reset cached configuration (useful for testing)
 * @internal
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Get application configuration, loading it on first access
 *
 * @example
 * ```ts
 * import { getConfig } from './config.js';
 *
 * console.log(`Server running on port ${getConfig().port}`);
 * ```
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export default getConfig;
