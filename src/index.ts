import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { getConfig } from './config.js';
import { getRetryOptionsFromEnv } from './db/connection.js';
import { createStore } from './storage/index.js';

/**
 * MN MarketLink server entry point
 *
 * Loads .env, checks the database (retrying per DB_RETRY_*), then serves
 * the web UI. A database that is still down after the retries is logged and
 * reported on every page until it comes back.
 */
async function main(): Promise<void> {
  const config = getConfig();
  const store = createStore(config.database);
  const { host, port, database } = config.database;

  try {
    await store.initialize(getRetryOptionsFromEnv());
    console.log(`Connected to MySQL database ${database} at ${host}:${port}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`${message}. Pages will report the outage until the database is reachable.`);
  }

  const app = createApp({
    store,
    corsOrigins: config.corsOrigins,
    logRequests: config.logRequests,
    staticRoot: './public',
  });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`MN MarketLink running at http://${config.host}:${info.port}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`Received ${signal}, shutting down...`);
    server.close();
    store.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to close database connection:', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Failed to start MN MarketLink: ${message}`);
  process.exit(1);
});
