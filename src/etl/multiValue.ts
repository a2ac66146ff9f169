/**
 * Applies a MultiValuePolicy to one attribute of a record under construction.
 * A lone scalar is handled as a one-element list.
 */
import type { MultiValuePolicy } from '@domain/entities/MultiValuePolicy';
import type { NormalizedRecord } from '@domain/entities/ResultTable';
import type { CellValue } from '@shared/types';

export function columnValueKey(key: string, value: CellValue): string {
  return `${key} :: ${formatCell(value)}`;
}

function formatCell(value: CellValue): string {
  if (value === null) return 'null';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function applyMultiValuePolicy(
  record: NormalizedRecord,
  key: string,
  values: CellValue | CellValue[],
  policy: MultiValuePolicy,
): NormalizedRecord {
  const list: CellValue[] = Array.isArray(values) ? values : [values];
  if (list.length === 0) return record;

  switch (policy.kind) {
    case 'first':
      record[key] = list[0];
      break;
    case 'last':
      record[key] = list[list.length - 1];
      break;
    case 'json':
      record[key] = JSON.stringify(list);
      break;
    case 'concat':
      record[key] = list.map(formatCell).join(policy.delimiter);
      break;
    case 'column_val':
      for (const value of list) {
        record[columnValueKey(key, value)] = true;
      }
      break;
  }
  return record;
}
