/**
 * Shared test dataset and helpers
 */

import type { MarketDataset } from '../src/db/schema.js';
import { MemoryStore } from '../src/storage/memory.js';
import type { IMarketStore } from '../src/storage/interface.js';
import { DatabaseUnavailableError } from '../src/utils/errors.js';
import { createApp } from '../src/app.js';

export const dataset: MarketDataset = {
  markets: [
    { marketId: 1, name: 'Mill City Farmers Market', location: 'Minneapolis' },
    { marketId: 2, name: 'St. Paul Farmers Market', location: 'St. Paul' },
    { marketId: 3, name: 'Duluth Farmers Market', location: 'Duluth' },
    { marketId: 4, name: 'Empty Lot Market', location: 'Bemidji' },
  ],
  vendors: [
    { vendorId: 1, businessName: 'Prairie Hollow Farm' },
    { vendorId: 2, businessName: 'Cedar Creek Orchard' },
    { vendorId: 3, businessName: 'North Star Honey Co.' },
    { vendorId: 4, businessName: 'Lakeside Greens' },
  ],
  vendorMarkets: [
    { vendorId: 1, marketId: 1 },
    { vendorId: 1, marketId: 2 },
    { vendorId: 2, marketId: 2 },
    { vendorId: 3, marketId: 1 },
    { vendorId: 3, marketId: 3 },
    { vendorId: 4, marketId: 1 },
  ],
  products: [
    { productId: 1, vendorId: 1, name: 'Heirloom Tomato', price: '4.50' },
    { productId: 2, vendorId: 1, name: 'Cherry Tomato Pint', price: '5.00' },
    { productId: 3, vendorId: 2, name: 'Honeycrisp Apples', price: '8.00' },
    { productId: 4, vendorId: 3, name: 'Wildflower Honey', price: '12.00' },
    { productId: 5, vendorId: 4, name: 'Green Tomato Relish', price: '7.25' },
    { productId: 6, vendorId: 4, name: 'Salad Mix', price: '6.00' },
  ],
  customers: [
    { customerId: 1, name: 'Alex Lindqvist', email: 'alex@example.com' },
    { customerId: 2, name: 'Jordan Okafor', email: 'jordan@example.com' },
    { customerId: 3, name: 'Sam Thao', email: 'sam@example.com' },
  ],
  orders: [
    { orderId: 1, customerId: 1, orderDate: '2024-06-01 08:15:00', pickupDate: '2024-06-08 09:00:00', totalPrice: '21.00' },
    { orderId: 2, customerId: 1, orderDate: '2024-06-10 19:42:00', pickupDate: null, totalPrice: '18.50' },
    { orderId: 3, customerId: 1, orderDate: null, pickupDate: null, totalPrice: '5.00' },
    { orderId: 4, customerId: 2, orderDate: '2024-06-05 12:00:00', pickupDate: '2024-06-06 10:00:00', totalPrice: '24.00' },
  ],
  orderItems: [
    { orderItemId: 1, orderId: 1, productId: 1, quantity: 2, price: '4.50' },
    { orderItemId: 2, orderId: 1, productId: 4, quantity: 1, price: '12.00' },
    { orderItemId: 3, orderId: 2, productId: 3, quantity: 1, price: '8.00' },
    { orderItemId: 4, orderId: 4, productId: 3, quantity: 3, price: '8.00' },
  ],
};

export function createTestStore(): MemoryStore {
  return new MemoryStore(dataset);
}

/**
 * Store whose every call fails as if MySQL were down
 */
export class UnavailableStore implements IMarketStore {
  constructor(private readonly cause = 'connect ECONNREFUSED 127.0.0.1:3306') {}

  private fail(): Promise<never> {
    return Promise.reject(new DatabaseUnavailableError(this.cause));
  }

  listMarkets() { return this.fail(); }
  findMarket() { return this.fail(); }
  listVendorsForMarket() { return this.fail(); }
  searchProducts() { return this.fail(); }
  listCustomers() { return this.fail(); }
  findCustomer() { return this.fail(); }
  listOrdersForCustomer() { return this.fail(); }
  findOrder() { return this.fail(); }
  listOrderItems() { return this.fail(); }
  ping() { return this.fail(); }
  async close(): Promise<void> {}
}

export function createTestApp(store: IMarketStore = createTestStore()) {
  return createApp({ store, logRequests: false });
}
