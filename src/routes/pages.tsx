/**
 * HTML Page Routes
 *
 * Server-rendered pages. Selections travel as query parameters; a missing,
 * malformed or unknown id falls back to the first entry in the list.
 */

import { Hono } from 'hono';
import CustomerOrdersPage from '../components/CustomerOrdersPage.js';
import ErrorPage from '../components/ErrorPage.js';
import MarketsPage from '../components/MarketsPage.js';
import ProductSearchPage, { DEFAULT_KEYWORD, type SearchOutcome } from '../components/ProductSearchPage.js';
import { parseOptionalId } from '../middleware/validation.js';
import type { IMarketStore } from '../storage/interface.js';
import { renderPage } from '../utils/render.js';

function pickById<T extends { id: number }>(list: T[], id: number | undefined): T | null {
  return list.find((entry) => entry.id === id) ?? list[0] ?? null;
}

export function renderErrorPage(title: string, message: string): string {
  return renderPage(<ErrorPage title={title} message={message} />);
}

export function createPageRoutes(store: IMarketStore): Hono {
  const app = new Hono();

  app.get('/', (c) => c.redirect('/markets'));

  app.get('/markets', async (c) => {
    const markets = await store.listMarkets();
    const selected = pickById(markets, parseOptionalId(c.req.query('market')));
    const vendors = selected ? await store.listVendorsForMarket(selected.id) : [];

    return c.html(renderPage(
      <MarketsPage markets={markets} selected={selected} vendors={vendors} />
    ));
  });

  app.get('/products', async (c) => {
    const keyword = c.req.query('q') ?? DEFAULT_KEYWORD;
    let outcome: SearchOutcome = { kind: 'idle' };

    // Search only runs when the button was pressed
    if (c.req.query('search') !== undefined) {
      const trimmed = keyword.trim();
      outcome = trimmed
        ? { kind: 'results', results: await store.searchProducts(trimmed) }
        : { kind: 'blank' };
    }

    return c.html(renderPage(<ProductSearchPage keyword={keyword} outcome={outcome} />));
  });

  app.get('/customers', async (c) => {
    const customers = await store.listCustomers();
    const selected = pickById(customers, parseOptionalId(c.req.query('customer')));
    const orders = selected ? await store.listOrdersForCustomer(selected.id) : [];
    const selectedOrder = pickById(orders, parseOptionalId(c.req.query('order')));
    const items = selectedOrder ? await store.listOrderItems(selectedOrder.id) : [];

    return c.html(renderPage(
      <CustomerOrdersPage
        customers={customers}
        selected={selected}
        orders={orders}
        selectedOrder={selectedOrder}
        items={items}
      />
    ));
  });

  return app;
}
