/**
 * Column type inference. Missing cells (null) are ignored while inferring:
 *
 *   all numbers, all integral, nothing missing → integer
 *   all numbers                                → float
 *   all booleans                               → boolean (missing → false)
 *   all ISO-8601 timestamp strings             → datetime (converted to Date)
 *   anything else, including all-missing       → text (left untouched)
 *
 * An integral column with gaps is a float column: it cannot hold "missing"
 * as an integer.
 */
import type { ColumnType } from '@domain/entities/ResultTable';
import type { CellValue } from '@shared/types';

const ISO_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export function isTimestamp(value: CellValue): value is string {
  return typeof value === 'string' && ISO_TIMESTAMP.test(value) && !Number.isNaN(Date.parse(value));
}

export function inferColumnType(values: readonly CellValue[]): ColumnType {
  const present = values.filter((value) => value !== null);
  if (present.length === 0) return 'text';

  if (present.every((value) => typeof value === 'number')) {
    const integral = present.every((value) => Number.isInteger(value));
    return integral && present.length === values.length ? 'integer' : 'float';
  }
  if (present.every((value) => typeof value === 'boolean')) return 'boolean';
  if (present.every(isTimestamp)) return 'datetime';
  return 'text';
}

/** Converts a column's cells to its inferred type. */
export function coerceColumn(type: ColumnType, values: readonly CellValue[]): CellValue[] {
  switch (type) {
    case 'boolean':
      return values.map((value) => value ?? false);
    case 'datetime':
      return values.map((value) => (isTimestamp(value) ? new Date(value) : value));
    default:
      return [...values];
  }
}
