import { createPool, type Pool } from 'mysql2/promise';
import { drizzle, type MySql2Database } from 'drizzle-orm/mysql2';
import type { DatabaseConfig } from '../config.js';
import * as schema from './schema.js';

/**
 * Retry options for database connection attempts
 */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry (default: 1000ms) */
  initialDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Maximum delay between retries in milliseconds (default: 10000ms) */
  maxDelayMs?: number;
  /** Whether to suppress retry warnings (default: false) */
  silent?: boolean;
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000,
  silent: false,
};

export type MarketDatabase = MySql2Database<typeof schema>;

/**
 * Database connection: Drizzle instance over a mysql2 pool
 */
export interface DatabaseConnection {
  db: MarketDatabase;
  pool: Pool;
  close: () => Promise<void>;
}

let dbInstance: DatabaseConnection | null = null;
let pendingConnection: Promise<DatabaseConnection> | null = null;

/**
 * Calculate delay for exponential backoff retry
 *
 * @param attempt - The current attempt number (0-indexed)
 */
export function calculateRetryDelay(attempt: number, options: Required<RetryOptions>): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt);
  return Math.min(exponentialDelay, options.maxDelayMs);
}

/**
 * Execute a function with exponential backoff retry logic
 *
 * Attempts the operation up to `maxRetries + 1` times, waiting
 * 1s, 2s, 4s... (by default) between attempts, and throws once every
 * attempt has failed.
 *
 * @param fn - Async function to execute
 * @param context - Description of the operation for error messages
 * @throws Error if all retry attempts fail
 *
 * @example
 * ```ts
 * const pool = await withRetry(
 *   async () => connect(),
 *   'create mysql connection',
 *   { maxRetries: 5, initialDelayMs: 2000 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  context: string,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxRetries) {
        break;
      }

      const delay = calculateRetryDelay(attempt, opts);

      if (!opts.silent) {
        console.warn(
          `Database ${context} failed (attempt ${attempt + 1}/${opts.maxRetries + 1}): ${lastError.message}. Retrying in ${delay}ms...`
        );
      }

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw new Error(
    `Failed to ${context} after ${opts.maxRetries + 1} attempts: ${lastError?.message || 'Unknown error'}`
  );
}

/**
 * Load retry options from environment variables
 *
 * - DB_RETRY_MAX: Maximum retry attempts (default: 3)
 * - DB_RETRY_DELAY_MS: Initial delay in milliseconds (default: 1000)
 * - DB_RETRY_BACKOFF: Backoff multiplier (default: 2)
 * - DB_RETRY_MAX_DELAY_MS: Maximum delay in milliseconds (default: 10000)
 * - DB_RETRY_SILENT: Silent mode (true/false, default: false)
 *
 * Unparseable or negative values are ignored.
 */
export function getRetryOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): RetryOptions {
  const options: RetryOptions = {};

  if (env.DB_RETRY_MAX) {
    const maxRetries = parseInt(env.DB_RETRY_MAX, 10);
    if (!isNaN(maxRetries) && maxRetries >= 0) {
      options.maxRetries = maxRetries;
    }
  }

  if (env.DB_RETRY_DELAY_MS) {
    const delayMs = parseInt(env.DB_RETRY_DELAY_MS, 10);
    if (!isNaN(delayMs) && delayMs >= 0) {
      options.initialDelayMs = delayMs;
    }
  }

  if (env.DB_RETRY_BACKOFF) {
    const multiplier = parseFloat(env.DB_RETRY_BACKOFF);
    if (!isNaN(multiplier) && multiplier > 0) {
      options.backoffMultiplier = multiplier;
    }
  }

  if (env.DB_RETRY_MAX_DELAY_MS) {
    const maxDelay = parseInt(env.DB_RETRY_MAX_DELAY_MS, 10);
    if (!isNaN(maxDelay) && maxDelay >= 0) {
      options.maxDelayMs = maxDelay;
    }
  }

  if (env.DB_RETRY_SILENT === 'true') {
    options.silent = true;
  }

  return options;
}

/**
 * Create a pooled MySQL connection and verify it with `SELECT 1`
 *
 * mysql2 pools connect lazily, so without the probe a wrong password would
 * only show up on the first page load.
 */
async function createMySQLConnection(config: DatabaseConfig): Promise<DatabaseConnection> {
  const pool = createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectionLimit: config.connectionLimit,
    waitForConnections: true,
  });

  try {
    await pool.query('SELECT 1');
  } catch (error) {
    await pool.end();
    throw error;
  }

  const db = drizzle(pool, { schema, mode: 'default' });

  return {
    db,
    pool,
    close: async () => {
      await pool.end();
    },
  };
}

/**
 * Get or create the database connection (singleton)
 *
 * Callers arriving while the pool is still being opened share that
 * attempt. A failed attempt leaves no instance behind, so the next call
 * tries again.
 *
 * @throws Error if connection fails after all retry attempts
 *
 * @example
 * ```ts
 * import { getDb } from './db/connection.js';
 *
 * const { db } = await getDb(getConfig().database);
 * const markets = await db.select().from(market);
 * ```
 */
export async function getDb(
  config: DatabaseConfig,
  retryOptions: RetryOptions = {}
): Promise<DatabaseConnection> {
  if (dbInstance) {
    return dbInstance;
  }

  if (!pendingConnection) {
    pendingConnection = withRetry(
      () => createMySQLConnection(config),
      'create mysql connection',
      retryOptions
    ).then(
      (connection) => {
        dbInstance = connection;
        pendingConnection = null;
        return connection;
      },
      (error: unknown) => {
        pendingConnection = null;
        throw error;
      }
    );
  }

  return pendingConnection;
}

/**
 * Close database connection
 *
 * @example
 * ```ts
 * process.on('SIGTERM', async () => {
 *   await closeDb();
 *   process.exit(0);
 * });
 * ```
 */
export async function closeDb(): Promise<void> {
  if (dbInstance) {
    const instance = dbInstance;
    dbInstance = null;
    await instance.close();
  }
}

/**
 * Forget the singleton without closing it (tests, config changes)
 */
export function resetDb(): void {
  dbInstance = null;
  pendingConnection = null;
}
