/**
 * Table rows for the pages
 *
 * Each builder turns domain records into display strings keyed by column
 * heading, in the column order the page shows.
 */

import type { Order, OrderItem, ProductMatch, Vendor } from '../models/index.js';
import { formatDateTime, formatPrice } from './format.js';

export type TableRow<C extends string> = Record<C, string>;

export const VENDOR_COLUMNS = ['Vendor Name'] as const;
export const PRODUCT_COLUMNS = ['Product', 'Price', 'Vendor', 'Market', 'Location'] as const;
export const ORDER_COLUMNS = ['Order', 'Order Date', 'Pickup Time', 'Total'] as const;
export const ORDER_ITEM_COLUMNS = ['Item', 'Quantity', 'Price per Item'] as const;

export type VendorColumn = (typeof VENDOR_COLUMNS)[number];
export type ProductColumn = (typeof PRODUCT_COLUMNS)[number];
export type OrderColumn = (typeof ORDER_COLUMNS)[number];
export type OrderItemColumn = (typeof ORDER_ITEM_COLUMNS)[number];

export function vendorRows(vendors: Vendor[]): TableRow<VendorColumn>[] {
  return vendors.map((v) => ({ 'Vendor Name': v.businessName }));
}

export function productRows(products: ProductMatch[]): TableRow<ProductColumn>[] {
  return products.map((p) => ({
    Product: p.productName,
    Price: formatPrice(p.price),
    Vendor: p.vendorName,
    Market: p.marketName,
    Location: p.location,
  }));
}

export function orderRows(orders: Order[]): TableRow<OrderColumn>[] {
  return orders.map((o) => ({
    Order: `#${o.id}`,
    'Order Date': formatDateTime(o.orderDate),
    'Pickup Time': formatDateTime(o.pickupDate),
    Total: formatPrice(o.totalPrice),
  }));
}

export function orderItemRows(items: OrderItem[]): TableRow<OrderItemColumn>[] {
  return items.map((i) => ({
    Item: i.productName,
    Quantity: String(i.quantity),
    'Price per Item': formatPrice(i.price),
  }));
}
