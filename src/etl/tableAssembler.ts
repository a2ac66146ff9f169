/**
 * Builds a ResultTable from normalized records: discover columns in
 * first-seen order, infer and apply one type per column, then order the
 * columns (columnOrder.ts). Every row gets every column; absent cells are
 * null (false in boolean columns).
 */
import type { ColumnSpec, NormalizedRecord, ResultTable, TableRow } from '@domain/entities/ResultTable';

import { orderColumns } from './columnOrder';
import { coerceColumn, inferColumnType } from './columnTypes';

export function discoverColumns(records: readonly NormalizedRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  return [...seen];
}

export function assembleTable(
  records: readonly NormalizedRecord[],
  maxContextDepth: number,
): ResultTable {
  const names = discoverColumns(records);
  const rows: TableRow[] = records.map(() => ({}));
  const columns: ColumnSpec[] = [];

  for (const name of names) {
    const values = records.map((record) => record[name] ?? null);
    const type = inferColumnType(values);
    coerceColumn(type, values).forEach((value, index) => {
      rows[index][name] = value;
    });
    columns.push({ name, type });
  }

  return reorderTable({ columns, rows, maxContextDepth });
}

/** Re-applies the canonical column order; rows are rebuilt with keys in that order. */
export function reorderTable(table: ResultTable): ResultTable {
  const columns = orderColumns(table.columns, table.rows, table.maxContextDepth);
  const rows = table.rows.map((row) =>
    Object.fromEntries(columns.map(({ name }) => [name, row[name] ?? null] as const)),
  );
  return { columns, rows, maxContextDepth: table.maxContextDepth };
}
