/**
 * Cosmetic column ordering, so every table from the API reads the same way:
 *
 *   1. DEFAULT_FIRST_COLUMNS, then "Context (1..maxDepth)", when present
 *   2. text columns, fewest distinct values first (low-cardinality facets
 *      up front; ties keep their current order)
 *   3. boolean columns, by name
 *   4. everything else, by name
 *
 * Ordering an already ordered table changes nothing.
 */
import type { ColumnSpec, TableRow } from '@domain/entities/ResultTable';
import { contextColumnName, DEFAULT_FIRST_COLUMNS } from '@shared/constants';
import type { CellValue } from '@shared/types';

function cellKey(value: CellValue | undefined): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return `date:${value.getTime()}`;
  return `${typeof value}:${String(value)}`;
}

/** Distinct values in a column; missing counts as one value. */
export function distinctCount(rows: readonly TableRow[], column: string): number {
  return new Set(rows.map((row) => cellKey(row[column]))).size;
}

const byName = (a: ColumnSpec, b: ColumnSpec): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

export function orderColumns(
  columns: readonly ColumnSpec[],
  rows: readonly TableRow[],
  maxContextDepth: number,
): ColumnSpec[] {
  const byColumnName = new Map(columns.map((column) => [column.name, column]));

  const preferred = [
    ...DEFAULT_FIRST_COLUMNS,
    ...Array.from({ length: maxContextDepth }, (_, i) => contextColumnName(i + 1)),
  ];
  const first = preferred.flatMap((name) => {
    const column = byColumnName.get(name);
    return column ? [column] : [];
  });
  const firstNames = new Set(first.map((column) => column.name));
  const others = columns.filter((column) => !firstNames.has(column.name));

  const text = others
    .filter((column) => column.type === 'text')
    .map((column) => ({ column, count: distinctCount(rows, column.name) }))
    .sort((a, b) => a.count - b.count)
    .map(({ column }) => column);
  const booleans = others.filter((column) => column.type === 'boolean').sort(byName);
  const rest = others
    .filter((column) => column.type !== 'text' && column.type !== 'boolean')
    .sort(byName);

  return [...first, ...text, ...booleans, ...rest];
}
