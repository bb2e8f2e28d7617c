import React from 'react';
import type { ProductMatch } from '../models/index.js';
import { PRODUCT_COLUMNS, productRows } from '../utils/tables.js';
import DataTable from './DataTable.js';
import Layout from './Layout.js';
import Notice from './Notice.js';

export const DEFAULT_KEYWORD = 'Tomato';

/**
 * What the page shows below the search box
 */
export type SearchOutcome =
  | { kind: 'idle' }
  | { kind: 'blank' }
  | { kind: 'results'; results: ProductMatch[] };

interface ProductSearchPageProps {
  /** Value shown in the search box */
  keyword: string;
  outcome: SearchOutcome;
}

/**
 * Product search page: keyword box and results across all markets
 */
export default function ProductSearchPage({ keyword, outcome }: ProductSearchPageProps): React.JSX.Element {
  return (
    <Layout page="products">
      <h2>Search for Products</h2>
      <form method="get" action="/products" className="search-form">
        <label htmlFor="search-keyword">Search by product name:</label>
        <input id="search-keyword" type="text" name="q" defaultValue={keyword} />
        <button type="submit" name="search" value="1" className="btn btn-primary">Search</button>
      </form>

      {outcome.kind === 'blank' && (
        <Notice kind="warning">Please enter a product name to search.</Notice>
      )}

      {outcome.kind === 'results' && (
        <>
          <p className="result-count">
            Found <strong>{outcome.results.length}</strong> result(s).
          </p>
          {outcome.results.length > 0 ? (
            <DataTable columns={PRODUCT_COLUMNS} rows={productRows(outcome.results)} />
          ) : (
            <Notice kind="info">No products matched your search.</Notice>
          )}
        </>
      )}
    </Layout>
  );
}
