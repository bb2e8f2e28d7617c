import React from 'react';
import type { Market, Vendor } from '../models/index.js';
import { marketLabel } from '../utils/format.js';
import { VENDOR_COLUMNS, vendorRows } from '../utils/tables.js';
import DataTable from './DataTable.js';
import Layout from './Layout.js';
import Notice from './Notice.js';
import SelectForm from './SelectForm.js';

interface MarketsPageProps {
  markets: Market[];
  /** Market whose details are shown; null only when there are no markets */
  selected: Market | null;
  vendors: Vendor[];
}

/**
 * Markets page: pick a market, see its details and attending vendors
 */
export default function MarketsPage({ markets, selected, vendors }: MarketsPageProps): React.JSX.Element {
  return (
    <Layout page="markets">
      <h2>Find a Farmers Market</h2>
      {markets.length === 0 || !selected ? (
        <Notice kind="info">No markets found.</Notice>
      ) : (
        <>
          <SelectForm
            action="/markets"
            name="market"
            label="Choose a market:"
            options={markets.map((m) => ({ value: String(m.id), label: marketLabel(m) }))}
            selected={String(selected.id)}
          />

          <h3>Market Details</h3>
          <p><strong>Name:</strong> {selected.name}</p>
          <p><strong>Location:</strong> {selected.location}</p>

          <h3>Vendors at this Market</h3>
          {vendors.length > 0 ? (
            <DataTable columns={VENDOR_COLUMNS} rows={vendorRows(vendors)} />
          ) : (
            <p>No vendors are currently listed for this market.</p>
          )}
        </>
      )}
    </Layout>
  );
}
