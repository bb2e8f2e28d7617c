/**
 * JSON API Routes
 *
 * Read-only endpoints over the market store, mounted under /api.
 * Handlers throw `ApiError`s; the app's error handler turns them into
 * `{ error, details? }` responses.
 */

import { Hono } from 'hono';
import type { IMarketStore } from '../storage/interface.js';
import { createBadRequestError, createNotFoundError } from '../utils/errors.js';
import {
  formatValidationErrors,
  idParamsSchema,
  productSearchQuerySchema,
} from '../middleware/validation.js';

export const API_VERSION = '1.0.0';

/**
 * Validate an `:id` path parameter
 *
 * @throws ApiError (400) if it is not a positive integer
 */
function requireId(id: string): number {
  const result = idParamsSchema.safeParse({ id });
  if (!result.success) {
    throw createBadRequestError('Validation failed', formatValidationErrors(result.error));
  }
  return result.data.id;
}

export function createApiRoutes(store: IMarketStore): Hono {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({
      name: 'MN MarketLink',
      version: API_VERSION,
      endpoints: {
        markets: 'GET /api/markets',
        market: 'GET /api/markets/:id',
        market_vendors: 'GET /api/markets/:id/vendors',
        product_search: 'GET /api/products?q=<keyword>',
        customers: 'GET /api/customers',
        customer: 'GET /api/customers/:id',
        customer_orders: 'GET /api/customers/:id/orders',
        order_items: 'GET /api/orders/:id/items',
        health: 'GET /health',
      },
    });
  });

  /**
   * GET /api/markets
   *
   * @example
   * ```bash
   * curl http://localhost:8501/api/markets
   * ```
   */
  app.get('/markets', async (c) => {
    const markets = await store.listMarkets();
    return c.json({ markets, total: markets.length });
  });

  app.get('/markets/:id', async (c) => {
    const id = requireId(c.req.param('id'));
    const market = await store.findMarket(id);
    if (!market) {
      throw createNotFoundError('Market', `ID ${id}`);
    }
    return c.json(market);
  });

  app.get('/markets/:id/vendors', async (c) => {
    const id = requireId(c.req.param('id'));
    const market = await store.findMarket(id);
    if (!market) {
      throw createNotFoundError('Market', `ID ${id}`);
    }
    const vendors = await store.listVendorsForMarket(id);
    return c.json({ market, vendors, total: vendors.length });
  });

  /**
   * GET /api/products?q=<keyword>
   *
   * @example
   * ```bash
   * curl "http://localhost:8501/api/products?q=honey"
   * ```
   */
  app.get('/products', async (c) => {
    const result = productSearchQuerySchema.safeParse(c.req.query());
    if (!result.success) {
      throw createBadRequestError('Validation failed', formatValidationErrors(result.error));
    }
    const keyword = result.data.q;
    const products = await store.searchProducts(keyword);
    return c.json({ keyword, products, total: products.length });
  });

  app.get('/customers', async (c) => {
    const customers = await store.listCustomers();
    return c.json({ customers, total: customers.length });
  });

  app.get('/customers/:id', async (c) => {
    const id = requireId(c.req.param('id'));
    const customer = await store.findCustomer(id);
    if (!customer) {
      throw createNotFoundError('Customer', `ID ${id}`);
    }
    return c.json(customer);
  });

  app.get('/customers/:id/orders', async (c) => {
    const id = requireId(c.req.param('id'));
    const customer = await store.findCustomer(id);
    if (!customer) {
      throw createNotFoundError('Customer', `ID ${id}`);
    }
    const orders = await store.listOrdersForCustomer(id);
    return c.json({ customer, orders, total: orders.length });
  });

  app.get('/orders/:id/items', async (c) => {
    const id = requireId(c.req.param('id'));
    const order = await store.findOrder(id);
    if (!order) {
      throw createNotFoundError('Order', `ID ${id}`);
    }
    const items = await store.listOrderItems(id);
    return c.json({ order, items, total: items.length });
  });

  return app;
}
