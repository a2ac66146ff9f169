/**
 * Result Table — Flat, Typed View of a Query's Records
 * Layer: Domain
 *
 * NormalizedRecord is one raw API record after multi-value and context-path
 * resolution: column name → scalar. ResultTable is what the TableService
 * builds from all of them: ordered columns with one inferred type each, and
 * one row per record with every column present (missing cells are null,
 * except boolean columns where missing means false).
 *
 * Tables are built fresh per query and never persisted; only the JSON pages
 * underneath are cached.
 */
import type { CellValue } from '@shared/types';

export type NormalizedRecord = Record<string, CellValue>;

export type ColumnType = 'integer' | 'float' | 'datetime' | 'boolean' | 'text';

export interface ColumnSpec {
  name: string;
  type: ColumnType;
}

export type TableRow = Record<string, CellValue>;

export interface ResultTable {
  columns: ColumnSpec[];
  rows: TableRow[];
  /** Deepest context path seen while normalizing these records. */
  maxContextDepth: number;
}
