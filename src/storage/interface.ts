import type { Customer, Market, Order, OrderItem, ProductMatch, Vendor } from '../models/index.js';

/**
 * Read access to the MN MarketLink database
 *
 * Implemented by `DatabaseStore` (MySQL through Drizzle) and `MemoryStore`
 * (in-process, used by tests). Pages and API routes depend only on this
 * interface.
 *
 * @example
 * ```ts
 * const store = createStore(getConfig().database);
 * const markets = await store.listMarkets();
 * ```
 */
export interface IMarketStore {
  /** All markets ordered by name */
  listMarkets(): Promise<Market[]>;

  findMarket(marketId: number): Promise<Market | null>;

  /**
   * Vendors attending a market, ordered by business name
   *
   * An unknown market yields an empty list.
   */
  listVendorsForMarket(marketId: number): Promise<Vendor[]>;

  /**
   * Search products by name across all markets
   *
   * Case-insensitive substring match; `%`, `_` and `\` in the keyword match
   * literally. Returns one row per (product, market the vendor attends),
   * ordered by product name then market name.
   */
  searchProducts(keyword: string): Promise<ProductMatch[]>;

  /** All customers ordered by name */
  listCustomers(): Promise<Customer[]>;

  findCustomer(customerId: number): Promise<Customer | null>;

  /** A customer's orders, newest order date first, undated orders last */
  listOrdersForCustomer(customerId: number): Promise<Order[]>;

  findOrder(orderId: number): Promise<Order | null>;

  /** Line items of an order with product names, in item order */
  listOrderItems(orderId: number): Promise<OrderItem[]>;

  /**
   * Round-trip to the backing store
   *
   * @throws DatabaseUnavailableError if the store cannot be reached
   */
  ping(): Promise<void>;

  /** Release connections */
  close(): Promise<void>;
}
