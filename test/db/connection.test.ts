/**
 * Database Connection Retry Tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';

const mysql = vi.hoisted(() => ({ createPool: vi.fn() }));
const orm = vi.hoisted(() => ({ drizzle: vi.fn(() => ({})) }));

vi.mock('mysql2/promise', () => mysql);
vi.mock('drizzle-orm/mysql2', () => orm);

import {
  calculateRetryDelay,
  closeDb,
  getDb,
  getRetryOptionsFromEnv,
  resetDb,
  withRetry,
  type RetryOptions,
} from '../../src/db/connection.js';
import type { DatabaseConfig } from '../../src/config.js';

const defaults: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000,
  silent: false,
};

const config: DatabaseConfig = {
  host: 'localhost',
  port: 3306,
  user: 'market',
  password: 'test-secret',
  database: 'MNMarketLink',
  connectionLimit: 10,
};

/**
 * Pool double whose probe query resolves after a tick
 */
function createFakePool(probe: () => Promise<unknown> = async () => [[]]) {
  return {
    query: vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 0));
      return probe();
    }),
    end: vi.fn(async () => {}),
  };
}

afterEach(() => {
  resetDb();
  vi.restoreAllMocks();
  mysql.createPool.mockReset();
});

describe('calculateRetryDelay', () => {
  it('grows exponentially', () => {
    expect(calculateRetryDelay(0, defaults)).toBe(1000);
    expect(calculateRetryDelay(1, defaults)).toBe(2000);
    expect(calculateRetryDelay(2, defaults)).toBe(4000);
  });

  it('is capped at maxDelayMs', () => {
    expect(calculateRetryDelay(5, defaults)).toBe(10000);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, 'ping')).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until the operation succeeds', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
      .mockResolvedValueOnce('connected');

    await expect(withRetry(fn, 'create mysql connection', { initialDelayMs: 0 })).resolves.toBe('connected');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      'Database create mysql connection failed (attempt 1/4): connect ECONNREFUSED. Retrying in 0ms...'
    );
  });

  it('throws after the last attempt', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('Access denied'));

    await expect(
      withRetry(fn, 'create mysql connection', { maxRetries: 2, initialDelayMs: 0, silent: true })
    ).rejects.toThrow('Failed to create mysql connection after 3 attempts: Access denied');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry when maxRetries is 0', async () => {
    const fn = vi.fn().mockRejectedValue('plain failure');

    await expect(withRetry(fn, 'query', { maxRetries: 0 })).rejects.toThrow(
      'Failed to query after 1 attempts: plain failure'
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('getRetryOptionsFromEnv', () => {
  it('returns no overrides for an empty environment', () => {
    expect(getRetryOptionsFromEnv({})).toEqual({});
  });

  it('reads every retry variable', () => {
    expect(getRetryOptionsFromEnv({
      DB_RETRY_MAX: '5',
      DB_RETRY_DELAY_MS: '250',
      DB_RETRY_BACKOFF: '1.5',
      DB_RETRY_MAX_DELAY_MS: '3000',
      DB_RETRY_SILENT: 'true',
    })).toEqual({
      maxRetries: 5,
      initialDelayMs: 250,
      backoffMultiplier: 1.5,
      maxDelayMs: 3000,
      silent: true,
    });
  });

  it('ignores invalid values', () => {
    expect(getRetryOptionsFromEnv({
      DB_RETRY_MAX: '-1',
      DB_RETRY_DELAY_MS: 'soon',
      DB_RETRY_BACKOFF: '0',
      DB_RETRY_SILENT: 'yes',
    })).toEqual({});
  });
});

describe('getDb', () => {
  it('shares one pool between concurrent callers', async () => {
    const pool = createFakePool();
    mysql.createPool.mockImplementation(() => pool);

    const [first, second, third] = await Promise.all([getDb(config), getDb(config), getDb(config)]);

    expect(mysql.createPool).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(await getDb(config)).toBe(first);

    await closeDb();
    expect(pool.end).toHaveBeenCalledTimes(1);
  });

  it('probes the pool with SELECT 1', async () => {
    const pool = createFakePool();
    mysql.createPool.mockImplementation(() => pool);

    await getDb(config);

    expect(pool.query).toHaveBeenCalledWith('SELECT 1');
    expect(mysql.createPool).toHaveBeenCalledWith(expect.objectContaining({
      host: 'localhost',
      database: 'MNMarketLink',
      connectionLimit: 10,
    }));
  });

  it('ends a pool whose probe fails and tries again on the next call', async () => {
    const refused = createFakePool(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:3306');
    });
    const healthy = createFakePool();
    mysql.createPool.mockImplementationOnce(() => refused).mockImplementationOnce(() => healthy);

    const attempts = await Promise.allSettled([
      getDb(config, { maxRetries: 0 }),
      getDb(config, { maxRetries: 0 }),
    ]);

    expect(attempts.map((a) => a.status)).toEqual(['rejected', 'rejected']);
    expect(refused.end).toHaveBeenCalledTimes(1);

    await getDb(config, { maxRetries: 0 });
    expect(mysql.createPool).toHaveBeenCalledTimes(2);
    expect(healthy.end).not.toHaveBeenCalled();
  });
});
