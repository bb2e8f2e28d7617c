/**
 * In-Memory Store Tests
 */

import { describe, it, expect } from 'vitest';
import { MemoryStore } from '../../src/storage/memory.js';
import { createTestStore } from '../fixtures.js';

describe('MemoryStore', () => {
  const store = createTestStore();

  describe('markets', () => {
    it('lists markets by name', async () => {
      const markets = await store.listMarkets();
      expect(markets.map((m) => m.name)).toEqual([
        'Duluth Farmers Market',
        'Empty Lot Market',
        'Mill City Farmers Market',
        'St. Paul Farmers Market',
      ]);
    });

    it('finds a market by id', async () => {
      expect(await store.findMarket(1)).toEqual({
        id: 1,
        name: 'Mill City Farmers Market',
        location: 'Minneapolis',
      });
      expect(await store.findMarket(99)).toBeNull();
    });

    it('lists the vendors attending a market by name', async () => {
      const vendors = await store.listVendorsForMarket(1);
      expect(vendors).toEqual([
        { id: 4, businessName: 'Lakeside Greens' },
        { id: 3, businessName: 'North Star Honey Co.' },
        { id: 1, businessName: 'Prairie Hollow Farm' },
      ]);
    });

    it('returns no vendors for an empty market', async () => {
      expect(await store.listVendorsForMarket(4)).toEqual([]);
    });
  });

  describe('searchProducts', () => {
    it('matches case-insensitively on a substring', async () => {
      const matches = await store.searchProducts('tomato');
      expect(matches.map((m) => [m.productName, m.marketName])).toEqual([
        ['Cherry Tomato Pint', 'Mill City Farmers Market'],
        ['Cherry Tomato Pint', 'St. Paul Farmers Market'],
        ['Green Tomato Relish', 'Mill City Farmers Market'],
        ['Heirloom Tomato', 'Mill City Farmers Market'],
        ['Heirloom Tomato', 'St. Paul Farmers Market'],
      ]);
    });

    it('returns vendor, market and numeric price', async () => {
      const [first] = await store.searchProducts('Wildflower');
      expect(first).toEqual({
        productId: 4,
        productName: 'Wildflower Honey',
        price: 12,
        vendorName: 'North Star Honey Co.',
        marketName: 'Duluth Farmers Market',
        location: 'Duluth',
      });
    });

    it('treats wildcard characters literally', async () => {
      expect(await store.searchProducts('%')).toEqual([]);
      expect(await store.searchProducts('_')).toEqual([]);
    });

    it('returns nothing for unknown products', async () => {
      expect(await store.searchProducts('Kohlrabi')).toEqual([]);
    });
  });

  describe('customers and orders', () => {
    it('lists customers by name', async () => {
      const customers = await store.listCustomers();
      expect(customers.map((c) => c.name)).toEqual(['Alex Lindqvist', 'Jordan Okafor', 'Sam Thao']);
    });

    it('finds a customer by id', async () => {
      expect(await store.findCustomer(2)).toEqual({
        id: 2,
        name: 'Jordan Okafor',
        email: 'jordan@example.com',
      });
      expect(await store.findCustomer(42)).toBeNull();
    });

    it('lists orders newest first with undated orders last', async () => {
      const orders = await store.listOrdersForCustomer(1);
      expect(orders).toEqual([
        { id: 2, orderDate: '2024-06-10 19:42:00', pickupDate: null, totalPrice: 18.5 },
        { id: 1, orderDate: '2024-06-01 08:15:00', pickupDate: '2024-06-08 09:00:00', totalPrice: 21 },
        { id: 3, orderDate: null, pickupDate: null, totalPrice: 5 },
      ]);
    });

    it('returns no orders for a customer without any', async () => {
      expect(await store.listOrdersForCustomer(3)).toEqual([]);
    });

    it('finds an order by id', async () => {
      expect((await store.findOrder(4))?.totalPrice).toBe(24);
      expect(await store.findOrder(100)).toBeNull();
    });

    it('lists order items with product names', async () => {
      expect(await store.listOrderItems(1)).toEqual([
        { id: 1, productName: 'Heirloom Tomato', quantity: 2, price: 4.5 },
        { id: 2, productName: 'Wildflower Honey', quantity: 1, price: 12 },
      ]);
      expect(await store.listOrderItems(3)).toEqual([]);
    });
  });

  it('is empty by default', async () => {
    const empty = new MemoryStore();
    expect(await empty.listMarkets()).toEqual([]);
    expect(await empty.searchProducts('Tomato')).toEqual([]);
    await expect(empty.ping()).resolves.toBeUndefined();
  });
});
