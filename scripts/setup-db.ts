/**
 * Database Setup CLI Script
 *
 * Creates the MNMarketLink database and loads db/schema.sql and db/data.sql.
 * Safe to re-run: an already populated database is left alone.
 *
 * Usage:
 *   npm run db:setup             # Create and load once
 *   npm run db:setup -- --reset  # Drop and reload the tables
 *   npm run db:setup -- --help
 */

import 'dotenv/config';
import { getConfig } from '../src/config.js';
import { createSetupClient, loadSqlScripts, setupDatabase } from '../src/db/setup.js';

const args = process.argv.slice(2);
let reset = false;

for (const arg of args) {
  if (arg === '--reset') {
    reset = true;
  } else if (arg === '--help' || arg === '-h') {
    showHelp();
    process.exit(0);
  } else {
    console.error(`Unknown argument: ${arg}`);
    showHelp();
    process.exit(1);
  }
}

function showHelp(): void {
  console.log(`
Database Setup - Create and populate the MN MarketLink database

Usage:
  npm run db:setup                Create the database and load schema + data once
  npm run db:setup -- --reset     Drop and reload all tables
  npm run db:setup -- --help      Show this help message

Environment Variables (see .env.example):
  DB_HOST, DB_PORT, DB_USER, DB_PASSWORD, DB_NAME
`);
}

async function main(): Promise<void> {
  const { database } = getConfig();
  const scripts = await loadSqlScripts();
  const client = await createSetupClient(database);

  try {
    await setupDatabase(client, { database: database.database, scripts, reset });
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Database setup failed: ${message}`);
  process.exit(1);
});
