import { asc, desc, eq, like, sql } from 'drizzle-orm';
import type { DatabaseConfig } from '../config.js';
import { closeDb, getDb, type MarketDatabase, type RetryOptions } from '../db/connection.js';
import { customer, market, orderItems, orders, product, vendor, vendorMarket } from '../db/schema.js';
import {
  toCustomer,
  toMarket,
  toOrder,
  type Customer,
  type Market,
  type Order,
  type OrderItem,
  type ProductMatch,
  type Vendor,
} from '../models/index.js';
import { DatabaseUnavailableError } from '../utils/errors.js';
import type { IMarketStore } from './interface.js';

/**
 * mysql2 / MySQL error codes meaning "the database is not reachable"
 */
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'PROTOCOL_CONNECTION_LOST',
  'ER_ACCESS_DENIED_ERROR',
  'ER_BAD_DB_ERROR',
  'ER_CON_COUNT_ERROR',
]);

// Requests fail fast; only startup waits out a slow database.
const QUERY_RETRY_OPTIONS: RetryOptions = { maxRetries: 0, silent: true };

/**
 * Check whether an error (or its cause chain) is a connection failure
 */
export function isConnectionError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string' && CONNECTION_ERROR_CODES.has(error.code)) {
    return true;
  }
  if ('cause' in error) {
    return isConnectionError(error.cause);
  }
  return false;
}

/**
 * Escape LIKE wildcards so the keyword matches literally
 *
 * @example
 * ```ts
 * escapeLikePattern('50%_off'); // '50\\%\\_off'
 * ```
 */
export function escapeLikePattern(keyword: string): string {
  return keyword.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Drizzle queries behind `DatabaseStore`, unexecuted
 *
 * Each returns the query builder, so callers either await it or inspect
 * it with `.toSQL()`.
 */
export const marketQueries = {
  listMarkets: (db: MarketDatabase) =>
    db.select().from(market).orderBy(asc(market.name)),

  findMarket: (db: MarketDatabase, marketId: number) =>
    db.select().from(market).where(eq(market.marketId, marketId)).limit(1),

  listVendorsForMarket: (db: MarketDatabase, marketId: number) =>
    db
      .select({ id: vendor.vendorId, businessName: vendor.businessName })
      .from(vendorMarket)
      .innerJoin(vendor, eq(vendorMarket.vendorId, vendor.vendorId))
      .where(eq(vendorMarket.marketId, marketId))
      .orderBy(asc(vendor.businessName)),

  // One row per (product, market the vendor attends)
  searchProducts: (db: MarketDatabase, keyword: string) =>
    db
      .select({
        productId: product.productId,
        productName: product.name,
        price: product.price,
        vendorName: vendor.businessName,
        marketName: market.name,
        location: market.location,
      })
      .from(product)
      .innerJoin(vendor, eq(product.vendorId, vendor.vendorId))
      .innerJoin(vendorMarket, eq(vendor.vendorId, vendorMarket.vendorId))
      .innerJoin(market, eq(vendorMarket.marketId, market.marketId))
      .where(like(product.name, `%${escapeLikePattern(keyword)}%`))
      .orderBy(asc(product.name), asc(market.name)),

  listCustomers: (db: MarketDatabase) =>
    db.select().from(customer).orderBy(asc(customer.name)),

  findCustomer: (db: MarketDatabase, customerId: number) =>
    db.select().from(customer).where(eq(customer.customerId, customerId)).limit(1),

  // MySQL sorts NULL lowest, so undated orders land last under DESC
  listOrdersForCustomer: (db: MarketDatabase, customerId: number) =>
    db
      .select()
      .from(orders)
      .where(eq(orders.customerId, customerId))
      .orderBy(desc(orders.orderDate), desc(orders.orderId)),

  findOrder: (db: MarketDatabase, orderId: number) =>
    db.select().from(orders).where(eq(orders.orderId, orderId)).limit(1),

  listOrderItems: (db: MarketDatabase, orderId: number) =>
    db
      .select({
        id: orderItems.orderItemId,
        productName: product.name,
        quantity: orderItems.quantity,
        price: orderItems.price,
      })
      .from(orderItems)
      .innerJoin(product, eq(orderItems.productId, product.productId))
      .where(eq(orderItems.orderId, orderId))
      .orderBy(asc(orderItems.orderItemId)),
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * MySQL-backed store
 *
 * Shares the pooled connection from `getDb()`. Connection failures are
 * rethrown as `DatabaseUnavailableError`; any other query error propagates
 * unchanged.
 */
export class DatabaseStore implements IMarketStore {
  constructor(private readonly config: DatabaseConfig) {}

  /**
   * Open the pool up front, retrying per `retryOptions`
   *
   * @throws DatabaseUnavailableError once all attempts have failed
   */
  async initialize(retryOptions: RetryOptions = {}): Promise<void> {
    await this.connect(retryOptions);
  }

  private async connect(retryOptions: RetryOptions): Promise<MarketDatabase> {
    try {
      const { db } = await getDb(this.config, retryOptions);
      return db;
    } catch (error) {
      throw new DatabaseUnavailableError(errorMessage(error));
    }
  }

  private async run<T>(query: (db: MarketDatabase) => Promise<T>): Promise<T> {
    const db = await this.connect(QUERY_RETRY_OPTIONS);
    try {
      return await query(db);
    } catch (error) {
      if (isConnectionError(error)) {
        throw new DatabaseUnavailableError(errorMessage(error));
      }
      throw error;
    }
  }

  async listMarkets(): Promise<Market[]> {
    const rows = await this.run(marketQueries.listMarkets);
    return rows.map(toMarket);
  }

  async findMarket(marketId: number): Promise<Market | null> {
    const [row] = await this.run((db) => marketQueries.findMarket(db, marketId));
    return row ? toMarket(row) : null;
  }

  async listVendorsForMarket(marketId: number): Promise<Vendor[]> {
    return this.run((db) => marketQueries.listVendorsForMarket(db, marketId));
  }

  async searchProducts(keyword: string): Promise<ProductMatch[]> {
    const rows = await this.run((db) => marketQueries.searchProducts(db, keyword));
    return rows.map((row) => ({ ...row, price: Number(row.price) }));
  }

  async listCustomers(): Promise<Customer[]> {
    const rows = await this.run(marketQueries.listCustomers);
    return rows.map(toCustomer);
  }

  async findCustomer(customerId: number): Promise<Customer | null> {
    const [row] = await this.run((db) => marketQueries.findCustomer(db, customerId));
    return row ? toCustomer(row) : null;
  }

  async listOrdersForCustomer(customerId: number): Promise<Order[]> {
    const rows = await this.run((db) => marketQueries.listOrdersForCustomer(db, customerId));
    return rows.map(toOrder);
  }

  async findOrder(orderId: number): Promise<Order | null> {
    const [row] = await this.run((db) => marketQueries.findOrder(db, orderId));
    return row ? toOrder(row) : null;
  }

  async listOrderItems(orderId: number): Promise<OrderItem[]> {
    const rows = await this.run((db) => marketQueries.listOrderItems(db, orderId));
    return rows.map((row) => ({ ...row, price: Number(row.price) }));
  }

  async ping(): Promise<void> {
    await this.run((db) => db.execute(sql`SELECT 1`));
  }

  async close(): Promise<void> {
    await closeDb();
  }
}
