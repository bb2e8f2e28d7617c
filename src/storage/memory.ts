import type { MarketDataset } from '../db/schema.js';
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
import type { IMarketStore } from './interface.js';

const byText = (a: string, b: string): number => a.localeCompare(b);

/**
 * In-process store over a `MarketDataset`
 *
 * Mirrors the ordering and matching rules of `DatabaseStore` so pages and
 * routes behave the same against either. Used by the test suite.
 */
export class MemoryStore implements IMarketStore {
  private readonly data: MarketDataset;

  constructor(data: Partial<MarketDataset> = {}) {
    this.data = {
      markets: data.markets ?? [],
      vendors: data.vendors ?? [],
      vendorMarkets: data.vendorMarkets ?? [],
      products: data.products ?? [],
      customers: data.customers ?? [],
      orders: data.orders ?? [],
      orderItems: data.orderItems ?? [],
    };
  }

  async listMarkets(): Promise<Market[]> {
    return this.data.markets.map(toMarket).sort((a, b) => byText(a.name, b.name));
  }

  async findMarket(marketId: number): Promise<Market | null> {
    const row = this.data.markets.find((m) => m.marketId === marketId);
    return row ? toMarket(row) : null;
  }

  async listVendorsForMarket(marketId: number): Promise<Vendor[]> {
    const vendorIds = new Set(
      this.data.vendorMarkets.filter((vm) => vm.marketId === marketId).map((vm) => vm.vendorId)
    );
    return this.data.vendors
      .filter((v) => vendorIds.has(v.vendorId))
      .map((v) => ({ id: v.vendorId, businessName: v.businessName }))
      .sort((a, b) => byText(a.businessName, b.businessName));
  }

  async searchProducts(keyword: string): Promise<ProductMatch[]> {
    const needle = keyword.toLowerCase();
    const matches: ProductMatch[] = [];

    for (const p of this.data.products) {
      if (!p.name.toLowerCase().includes(needle)) continue;

      const seller = this.data.vendors.find((v) => v.vendorId === p.vendorId);
      if (!seller) continue;

      for (const vm of this.data.vendorMarkets) {
        if (vm.vendorId !== seller.vendorId) continue;
        const m = this.data.markets.find((row) => row.marketId === vm.marketId);
        if (!m) continue;

        matches.push({
          productId: p.productId,
          productName: p.name,
          price: Number(p.price),
          vendorName: seller.businessName,
          marketName: m.name,
          location: m.location,
        });
      }
    }

    return matches.sort(
      (a, b) => byText(a.productName, b.productName) || byText(a.marketName, b.marketName)
    );
  }

  async listCustomers(): Promise<Customer[]> {
    return this.data.customers.map(toCustomer).sort((a, b) => byText(a.name, b.name));
  }

  async findCustomer(customerId: number): Promise<Customer | null> {
    const row = this.data.customers.find((c) => c.customerId === customerId);
    return row ? toCustomer(row) : null;
  }

  async listOrdersForCustomer(customerId: number): Promise<Order[]> {
    return this.data.orders
      .filter((o) => o.customerId === customerId)
      .sort((a, b) => {
        if (a.orderDate !== b.orderDate) {
          if (a.orderDate === null) return 1;
          if (b.orderDate === null) return -1;
          return byText(b.orderDate, a.orderDate);
        }
        return b.orderId - a.orderId;
      })
      .map(toOrder);
  }

  async findOrder(orderId: number): Promise<Order | null> {
    const row = this.data.orders.find((o) => o.orderId === orderId);
    return row ? toOrder(row) : null;
  }

  async listOrderItems(orderId: number): Promise<OrderItem[]> {
    const items: OrderItem[] = [];
    for (const item of this.data.orderItems) {
      if (item.orderId !== orderId) continue;
      const p = this.data.products.find((row) => row.productId === item.productId);
      if (!p) continue;
      items.push({
        id: item.orderItemId,
        productName: p.name,
        quantity: item.quantity,
        price: Number(item.price),
      });
    }
    return items.sort((a, b) => a.id - b.id);
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
