import React from 'react';
import type { TableRow } from '../utils/tables.js';

interface DataTableProps<C extends string> {
  columns: readonly C[];
  rows: TableRow<C>[];
}

/**
 * Full-width table of preformatted string cells
 */
export default function DataTable<C extends string>({
  columns,
  rows,
}: DataTableProps<C>): React.JSX.Element {
  return (
    <table className="data-table">
      <thead>
        <tr>
          {columns.map((column) => (
            <th key={column} scope="col">{column}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {rows.map((row, index) => (
          <tr key={index}>
            {columns.map((column) => (
              <td key={column}>{row[column]}</td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}
