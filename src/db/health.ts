import type { IMarketStore } from '../storage/interface.js';

/**
 * Health check status
 */
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Database health check result
 */
export interface HealthCheckResult {
  status: HealthStatus;
  /** Whether the ping reached the database */
  connected: boolean;
  /** Ping round-trip in milliseconds, two decimals */
  responseTimeMs: number;
  /** Error message if the ping failed */
  error?: string;
}

export interface HealthCheckOptions {
  /** Response time threshold in milliseconds for warnings (default: 1000ms) */
  slowQueryThreshold?: number;
  /** Millisecond clock (default: performance.now) */
  clock?: () => number;
}

const DEFAULT_OPTIONS: Required<HealthCheckOptions> = {
  slowQueryThreshold: 1000,
  clock: () => performance.now(),
};

/**
 * Ping the store and grade the response
 *
 * - Failed ping → unhealthy, not connected
 * - Slower than the threshold → degraded
 * - Slower than twice the threshold → unhealthy
 *
 * @example
 * ```ts
 * const health = await checkHealth(store, { slowQueryThreshold: 500 });
 * if (health.status !== 'healthy') {
 *   console.warn(`Database is ${health.status}`);
 * }
 * ```
 */
export async function checkHealth(
  store: IMarketStore,
  options: HealthCheckOptions = {}
): Promise<HealthCheckResult> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const startTime = opts.clock();

  try {
    await store.ping();
    const responseTime = opts.clock() - startTime;

    if (responseTime > opts.slowQueryThreshold) {
      console.warn(
        `Database health check: Slow query detected (${responseTime.toFixed(2)}ms > ${opts.slowQueryThreshold}ms threshold)`
      );
    }

    let status: HealthStatus = 'healthy';
    if (responseTime > opts.slowQueryThreshold * 2) {
      status = 'unhealthy';
    } else if (responseTime > opts.slowQueryThreshold) {
      status = 'degraded';
    }

    return {
      status,
      connected: true,
      responseTimeMs: Math.round(responseTime * 100) / 100,
    };
  } catch (error) {
    const responseTime = opts.clock() - startTime;

    return {
      status: 'unhealthy',
      connected: false,
      responseTimeMs: Math.round(responseTime * 100) / 100,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
