import {
  mysqlTable,
  int,
  varchar,
  decimal,
  datetime,
  primaryKey,
  index,
} from 'drizzle-orm/mysql-core';

// Column names match db/schema.sql exactly; TypeScript keys are camelCase.

export const market = mysqlTable('Market', {
  marketId: int('MarketID').autoincrement().primaryKey(),
  name: varchar('Name', { length: 100 }).notNull(),
  location: varchar('Location', { length: 150 }).notNull(),
}, (table) => ({
  nameIdx: index('idx_market_name').on(table.name),
}));

export const vendor = mysqlTable('Vendor', {
  vendorId: int('VendorID').autoincrement().primaryKey(),
  businessName: varchar('BusinessName', { length: 120 }).notNull(),
});

// Which vendors attend which markets
export const vendorMarket = mysqlTable('VendorMarket', {
  vendorId: int('VendorID').notNull().references(() => vendor.vendorId, { onDelete: 'cascade' }),
  marketId: int('MarketID').notNull().references(() => market.marketId, { onDelete: 'cascade' }),
}, (table) => ({
  pk: primaryKey({ columns: [table.vendorId, table.marketId] }),
  marketIdx: index('idx_vendormarket_market').on(table.marketId),
}));

export const product = mysqlTable('Product', {
  productId: int('ProductID').autoincrement().primaryKey(),
  vendorId: int('VendorID').notNull().references(() => vendor.vendorId, { onDelete: 'cascade' }),
  name: varchar('Name', { length: 120 }).notNull(),
  price: decimal('Price', { precision: 10, scale: 2 }).notNull(),
}, (table) => ({
  nameIdx: index('idx_product_name').on(table.name),
}));

export const customer = mysqlTable('Customer', {
  customerId: int('CustomerID').autoincrement().primaryKey(),
  name: varchar('Name', { length: 100 }).notNull(),
  email: varchar('Email', { length: 150 }).notNull().unique(),
});

export const orders = mysqlTable('Orders', {
  orderId: int('OrderID').autoincrement().primaryKey(),
  customerId: int('CustomerID').notNull().references(() => customer.customerId, { onDelete: 'cascade' }),
  orderDate: datetime('OrderDate', { mode: 'string' }),
  pickupDate: datetime('PickupDate', { mode: 'string' }),
  totalPrice: decimal('TotalPrice', { precision: 10, scale: 2 }).notNull(),
}, (table) => ({
  customerIdx: index('idx_orders_customer').on(table.customerId),
}));

export const orderItems = mysqlTable('OrderItems', {
  orderItemId: int('OrderItemID').autoincrement().primaryKey(),
  orderId: int('OrderID').notNull().references(() => orders.orderId, { onDelete: 'cascade' }),
  productId: int('ProductID').notNull().references(() => product.productId),
  quantity: int('Quantity').notNull(),
  price: decimal('Price', { precision: 10, scale: 2 }).notNull(),
}, (table) => ({
  orderIdx: index('idx_orderitems_order').on(table.orderId),
}));

export type MarketRow = typeof market.$inferSelect;
export type VendorRow = typeof vendor.$inferSelect;
export type VendorMarketRow = typeof vendorMarket.$inferSelect;
export type ProductRow = typeof product.$inferSelect;
export type CustomerRow = typeof customer.$inferSelect;
export type OrderRow = typeof orders.$inferSelect;
export type OrderItemRow = typeof orderItems.$inferSelect;

/**
 * Full contents of the database, table by table
 */
export interface MarketDataset {
  markets: MarketRow[];
  vendors: VendorRow[];
  vendorMarkets: VendorMarketRow[];
  products: ProductRow[];
  customers: CustomerRow[];
  orders: OrderRow[];
  orderItems: OrderItemRow[];
}
