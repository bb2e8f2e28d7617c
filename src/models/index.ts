/**
 * Domain records served by the store
 *
 * Prices are numbers (MySQL DECIMAL arrives as a string and is converted
 * here). Datetimes stay in the database's `YYYY-MM-DD HH:MM:SS` form, or
 * `null` when unset.
 */

import type { CustomerRow, MarketRow, OrderRow } from '../db/schema.js';

export interface Market {
  id: number;
  name: string;
  location: string;
}

export interface Vendor {
  id: number;
  businessName: string;
}

/**
 * One product offered at one market (a vendor attending several markets
 * yields one match per market)
 */
export interface ProductMatch {
  productId: number;
  productName: string;
  price: number;
  vendorName: string;
  marketName: string;
  location: string;
}

export interface Customer {
  id: number;
  name: string;
  email: string;
}

export interface Order {
  id: number;
  orderDate: string | null;
  pickupDate: string | null;
  totalPrice: number;
}

export interface OrderItem {
  id: number;
  productName: string;
  quantity: number;
  price: number;
}

export function toMarket(row: MarketRow): Market {
  return { id: row.marketId, name: row.name, location: row.location };
}

export function toCustomer(row: CustomerRow): Customer {
  return { id: row.customerId, name: row.name, email: row.email };
}

export function toOrder(row: Pick<OrderRow, 'orderId' | 'orderDate' | 'pickupDate' | 'totalPrice'>): Order {
  return {
    id: row.orderId,
    orderDate: row.orderDate,
    pickupDate: row.pickupDate,
    totalPrice: Number(row.totalPrice),
  };
}
