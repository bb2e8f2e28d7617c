/**
 * Request Logging Middleware
 *
 * Logs every request with method, path, status, and timing.
 */

import type { Context, Next } from 'hono';

/**
 * Log entry structure for HTTP requests
 */
export interface RequestLogEntry {
  timestamp: string;
  method: string;
  path: string;
  status: number;
  duration_ms: number;
}

export type LogSink = (message: string, entry: string) => void;

/**
 * Create request logger middleware
 *
 * @param sink - Where log lines go (default: console.log)
 *
 * @example
 * ```ts
 * app.use('*', createRequestLogger());
 * ```
 */
export function createRequestLogger(sink: LogSink = console.log) {
  return async function requestLoggerMiddleware(c: Context, next: Next): Promise<void> {
    const startTime = performance.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = performance.now() - startTime;

    const logEntry: RequestLogEntry = {
      timestamp: new Date().toISOString(),
      method,
      path,
      status: c.res.status,
      duration_ms: Math.round(duration * 100) / 100, // Round to 2 decimal places
    };

    sink('HTTP Request:', JSON.stringify(logEntry));
  };
}

/**
 * Format request log entry as a human-readable line
 */
export function formatLogEntry(logEntry: RequestLogEntry): string {
  return `${logEntry.timestamp} | ${logEntry.method} ${logEntry.path} | ${logEntry.status} | ${logEntry.duration_ms}ms`;
}

function isRequestLogEntry(value: unknown): value is RequestLogEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'method' in value && typeof value.method === 'string' &&
    'path' in value && typeof value.path === 'string' &&
    'status' in value && typeof value.status === 'number' &&
    'duration_ms' in value && typeof value.duration_ms === 'number'
  );
}

/**
 * Parse log entry from JSON string
 *
 * @returns Parsed log entry or null if invalid
 */
export function parseLogEntry(json: string): RequestLogEntry | null {
  try {
    const parsed: unknown = JSON.parse(json);
    return isRequestLogEntry(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
