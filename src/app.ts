import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serveStatic } from '@hono/node-server/serve-static';
import { checkHealth, type HealthCheckOptions, type HealthCheckResult, type HealthStatus } from './db/health.js';
import { createRequestLogger } from './middleware/requestLogger.js';
import { createApiRoutes } from './routes/api.js';
import { createPageRoutes, renderErrorPage } from './routes/pages.js';
import type { IMarketStore } from './storage/interface.js';
import { ApiError, DatabaseUnavailableError, handleApiError, notFoundError } from './utils/errors.js';

export interface AppOptions {
  store: IMarketStore;
  /** Allowed origins for /api/* ('*' for any) */
  corsOrigins?: string[];
  /** Log one line per request (default: true) */
  logRequests?: boolean;
  /** Directory served under /static/*, relative to the working directory */
  staticRoot?: string;
  healthCheck?: HealthCheckOptions;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  database: HealthCheckResult;
  message: string;
}

const HEALTH_MESSAGES: Record<HealthStatus, string> = {
  healthy: 'All systems operational',
  degraded: 'Database is slow but operational',
  unhealthy: 'Database is unavailable',
};

function wantsJson(path: string): boolean {
  return path === '/api' || path.startsWith('/api/') || path === '/health';
}

/**
 * Build the MN MarketLink application
 *
 * @example
 * ```ts
 * const app = createApp({ store: createStore(getConfig().database) });
 * serve({ fetch: app.fetch, port: 8501 });
 * ```
 */
export function createApp(options: AppOptions): Hono {
  const { store, corsOrigins = ['*'], logRequests = true, staticRoot, healthCheck } = options;
  const app = new Hono();

  if (logRequests) {
    app.use('*', createRequestLogger());
  }

  app.use('/api/*', cors({
    origin: corsOrigins.includes('*') ? '*' : corsOrigins,
    allowMethods: ['GET', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }));

  if (staticRoot) {
    app.use('/static/*', serveStatic({ root: staticRoot }));
  }

  // Global error handler: JSON for the API, an error page for everything else
  app.onError((error, c) => {
    if (!(error instanceof ApiError) || error.type >= 500) {
      console.error('Request failed:', {
        message: error.message,
        stack: error instanceof ApiError ? undefined : error.stack,
        path: c.req.path,
        method: c.req.method,
      });
    }

    if (wantsJson(c.req.path)) {
      return handleApiError(c, error, 'An unexpected error occurred');
    }

    if (error instanceof DatabaseUnavailableError) {
      return c.html(renderErrorPage('Database unavailable', error.message), 503);
    }

    return c.html(
      renderErrorPage('Something went wrong', 'An unexpected error occurred. Please try again later.'),
      500
    );
  });

  app.notFound((c) => {
    if (wantsJson(c.req.path)) {
      return notFoundError(c, 'Route', `${c.req.method} ${c.req.path}`);
    }
    return c.html(renderErrorPage('Page not found', `There is no page at ${c.req.path}.`), 404);
  });

  app.get('/health', async (c) => {
    const database = await checkHealth(store, healthCheck);

    const health: HealthResponse = {
      status: database.status,
      timestamp: new Date().toISOString(),
      database,
      message: HEALTH_MESSAGES[database.status],
    };

    return c.json(health, database.status === 'unhealthy' ? 503 : 200);
  });

  app.route('/api', createApiRoutes(store));
  app.route('/', createPageRoutes(store));

  return app;
}
