import React from 'react';
import type { Customer, Order, OrderItem } from '../models/index.js';
import { customerLabel, orderLabel } from '../utils/format.js';
import { ORDER_COLUMNS, ORDER_ITEM_COLUMNS, orderItemRows, orderRows } from '../utils/tables.js';
import DataTable from './DataTable.js';
import Layout from './Layout.js';
import Notice from './Notice.js';
import SelectForm from './SelectForm.js';

interface CustomerOrdersPageProps {
  customers: Customer[];
  /** null only when there are no customers */
  selected: Customer | null;
  orders: Order[];
  /** Order whose items are listed; null when the customer has no orders */
  selectedOrder: Order | null;
  items: OrderItem[];
}

/**
 * Customers & Orders page: pick a customer, review their orders, drill
 * into one order's items
 */
export default function CustomerOrdersPage({
  customers,
  selected,
  orders,
  selectedOrder,
  items,
}: CustomerOrdersPageProps): React.JSX.Element {
  if (customers.length === 0 || !selected) {
    return (
      <Layout page="customers">
        <h2>Customer Orders</h2>
        <Notice kind="info">No customers found.</Notice>
      </Layout>
    );
  }

  return (
    <Layout page="customers">
      <h2>Customer Orders</h2>
      <SelectForm
        action="/customers"
        name="customer"
        label="Choose a customer:"
        options={customers.map((c) => ({ value: String(c.id), label: customerLabel(c) }))}
        selected={String(selected.id)}
      />

      <h3>Customer Info</h3>
      <p><strong>Name:</strong> {selected.name}</p>
      <p><strong>Email:</strong> {selected.email}</p>

      <h3>Orders</h3>
      {orders.length === 0 || !selectedOrder ? (
        <Notice kind="info">This customer has not placed any orders yet.</Notice>
      ) : (
        <>
          <DataTable columns={ORDER_COLUMNS} rows={orderRows(orders)} />

          <h3>View Order Items</h3>
          <SelectForm
            action="/customers"
            name="order"
            label="Select an order:"
            options={orders.map((o) => ({ value: String(o.id), label: orderLabel(o) }))}
            selected={String(selectedOrder.id)}
            hidden={{ customer: String(selected.id) }}
          />
          {items.length > 0 ? (
            <DataTable columns={ORDER_ITEM_COLUMNS} rows={orderItemRows(items)} />
          ) : (
            <Notice kind="info">No items found for this order.</Notice>
          )}
        </>
      )}
    </Layout>
  );
}
