/**
 * Display formatting for prices, datetimes and select labels
 */

import type { Customer, Market, Order } from '../models/index.js';

const DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})/;

/**
 * Format a price as dollars with two decimals
 *
 * @example
 * ```ts
 * formatPrice(4.5); // '$4.50'
 * ```
 */
export function formatPrice(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Format a database datetime as `YYYY-MM-DD HH:MM`, or `N/A` when unset
 *
 * Values that are not datetimes are shown as they are.
 */
export function formatDateTime(value: string | null): string {
  if (!value) {
    return 'N/A';
  }
  const match = DATETIME_PATTERN.exec(value);
  return match ? `${match[1]} ${match[2]}` : value;
}

export function marketLabel(market: Market): string {
  return `${market.name} (${market.location})`;
}

export function customerLabel(customer: Customer): string {
  return `${customer.name} (${customer.email})`;
}

export function orderLabel(order: Order): string {
  return `Order ${order.id} (${formatDateTime(order.orderDate)})`;
}
