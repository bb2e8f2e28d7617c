/**
 * Schema Consistency Tests
 *
 * The Drizzle tables must name the same tables and columns as db/schema.sql.
 */

import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/mysql-core';
import { customer, market, orderItems, orders, product, vendor, vendorMarket } from '../../src/db/schema.js';
import { loadSqlScripts } from '../../src/db/setup.js';

const tables = [market, vendor, vendorMarket, product, customer, orders, orderItems];

/**
 * Body of one CREATE TABLE statement
 */
function createStatement(schemaSql: string, table: string): string {
  const start = schemaSql.indexOf(`CREATE TABLE ${table} (`);
  if (start === -1) {
    return '';
  }
  return schemaSql.slice(start, schemaSql.indexOf(');', start));
}

describe('schema', () => {
  it('defines the seven tables', () => {
    expect(tables.map((t) => getTableConfig(t).name)).toEqual([
      'Market',
      'Vendor',
      'VendorMarket',
      'Product',
      'Customer',
      'Orders',
      'OrderItems',
    ]);
  });

  it('columns match schema.sql', async () => {
    const { schema } = await loadSqlScripts();
    for (const table of tables) {
      const { name, columns } = getTableConfig(table);
      const statement = createStatement(schema, name);
      expect(statement, name).not.toBe('');
      for (const column of columns) {
        expect(statement, `${name}.${column.name}`).toMatch(new RegExp(`\\n\\s+${column.name} `));
      }
    }
  });

  it('leaves order dates nullable', () => {
    const columns = getTableConfig(orders).columns;
    expect(columns.find((c) => c.name === 'OrderDate')?.notNull).toBe(false);
    expect(columns.find((c) => c.name === 'PickupDate')?.notNull).toBe(false);
    expect(columns.find((c) => c.name === 'TotalPrice')?.notNull).toBe(true);
  });
});
