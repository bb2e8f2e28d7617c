import type { Config } from 'drizzle-kit';

/**
 * Drizzle Kit Configuration
 *
 * Points drizzle-kit at the MySQL table definitions so `npm run db:generate`
 * can diff them against `db/schema.sql`.
 *
 * Environment variables:
 * - DB_HOST, DB_PORT, DB_USER, DB_PASSWORD, DB_NAME
 */

export default {
  schema: './src/db/schema.ts',
  out: './drizzle',
  dialect: 'mysql',
  dbCredentials: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    user: process.env.DB_USER || 'root',
    password: process.env.DB_PASSWORD || '',
    database: process.env.DB_NAME || 'MNMarketLink',
  },
  verbose: true,
  strict: true,
} satisfies Config;
