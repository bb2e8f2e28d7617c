import { readFile } from 'node:fs/promises';
import { createConnection, type RowDataPacket } from 'mysql2/promise';
import type { DatabaseConfig } from '../config.js';

/**
 * Database setup
 *
 * Creates the MNMarketLink database and loads `db/schema.sql` followed by
 * `db/data.sql`. Once `OrderItems`, the last table data.sql fills, has
 * rows the load is skipped, so running setup twice is harmless. A load that
 * stopped partway leaves it empty and the next run starts over; `reset`
 * reloads both scripts regardless (the schema drops its tables first).
 */

/**
 * Minimal server-level client the setup routine needs
 */
export interface SetupClient {
  /** Run one or more `;`-separated statements */
  execute(statements: string): Promise<void>;
  /** Row count of a table, 0 when it does not exist */
  countRows(database: string, table: string): Promise<number>;
  close(): Promise<void>;
}

export interface SqlScripts {
  schema: string;
  data: string;
}

export interface SetupOptions {
  database: string;
  scripts: SqlScripts;
  /** Reload even if the tables already exist */
  reset?: boolean;
  log?: (message: string) => void;
}

export type SetupResult = 'loaded' | 'skipped';

/** Last table data.sql fills; rows here mean the load completed */
const MARKER_TABLE = 'OrderItems';

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

/**
 * Read the SQL scripts shipped in `db/`
 */
export async function loadSqlScripts(
  dir: URL = new URL('../../db/', import.meta.url)
): Promise<SqlScripts> {
  const [schema, data] = await Promise.all([
    readFile(new URL('schema.sql', dir), 'utf8'),
    readFile(new URL('data.sql', dir), 'utf8'),
  ]);
  return { schema, data };
}

/**
 * Create the database if needed and load the scripts unless already loaded
 */
export async function setupDatabase(
  client: SetupClient,
  options: SetupOptions
): Promise<SetupResult> {
  const log = options.log ?? console.log;
  const database = quoteIdentifier(options.database);

  await client.execute(`CREATE DATABASE IF NOT EXISTS ${database}`);
  await client.execute(`USE ${database}`);

  if (!options.reset && await client.countRows(options.database, MARKER_TABLE) > 0) {
    log(`Database ${options.database} is already set up; skipping schema and data load.`);
    return 'skipped';
  }

  log(`Loading schema into ${options.database}...`);
  await client.execute(options.scripts.schema);
  log(`Loading data into ${options.database}...`);
  await client.execute(options.scripts.data);
  log(`Database ${options.database} is ready.`);
  return 'loaded';
}

/**
 * Connect to the MySQL server (no default database) for setup
 */
export async function createSetupClient(config: DatabaseConfig): Promise<SetupClient> {
  const connection = await createConnection({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    multipleStatements: true,
  });

  return {
    execute: async (statements) => {
      await connection.query(statements);
    },
    countRows: async (database, table) => {
      const [tables] = await connection.query<RowDataPacket[]>(
        'SELECT COUNT(*) AS count FROM information_schema.tables WHERE table_schema = ? AND table_name = ?',
        [database, table]
      );
      if (Number(tables[0]?.count ?? 0) === 0) {
        return 0;
      }
      const [rows] = await connection.query<RowDataPacket[]>(
        `SELECT COUNT(*) AS count FROM ${quoteIdentifier(database)}.${quoteIdentifier(table)}`
      );
      return Number(rows[0]?.count ?? 0);
    },
    close: () => connection.end(),
  };
}
