/**
 * Record Normalizer — Raw API Record → Flat Table Row
 * Layer: ETL
 * Pattern: Adapter Pattern (implements IDataSourceAdapter<RawRecord>)
 *
 * Every key of a raw record goes through exactly one branch:
 *
 *   1. "context label" — a path like "Site/Trench/Locus" becomes
 *      "Context (1)", "Context (2)", ... and the deepest path seen so far is
 *      tracked in `maxContextDepth` (the column ordering needs it).
 *   2. A key with a per-key policy override uses that policy.
 *   3. A single value is copied through.
 *   4. A list uses the numeric default policy when every element parses as a
 *      number (elements are converted to numbers), otherwise the non-numeric
 *      default policy.
 *
 * Depth tracking accumulates across calls; TableService creates a new
 * normalizer for each table build.
 */
import type { MultiValueOptions } from '@core/clientOptions';
import type { NormalizedRecord } from '@domain/entities/ResultTable';
import type { RawRecord } from '@domain/entities/SearchPage';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import { CONTEXT_PATH_KEY, contextColumnName } from '@shared/constants';
import type { CellValue } from '@shared/types';

import { applyMultiValuePolicy } from './multiValue';

/** Scalars pass through; nested objects are kept as their JSON text. */
export function toCell(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

// Decimal and exponent notation only; "0x1A", "0b101" and "0o7" are codes, not numbers.
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INFINITY_LITERAL = /^[+-]?(inf|infinity)$/i;

/** The numeric reading of a cell, or null when it is not a number. */
export function parseNumber(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (DECIMAL_LITERAL.test(trimmed)) return Number(trimmed);
  if (INFINITY_LITERAL.test(trimmed)) {
    return trimmed.startsWith('-') ? -Infinity : Infinity;
  }
  return null;
}

export class RecordNormalizer implements IDataSourceAdapter<RawRecord> {
  private depth = 0;

  constructor(private readonly policies: MultiValueOptions) {}

  get maxContextDepth(): number {
    return this.depth;
  }

  normalize(raw: RawRecord): NormalizedRecord {
    const record: NormalizedRecord = {};

    for (const [key, value] of Object.entries(raw)) {
      if (key === CONTEXT_PATH_KEY && typeof value === 'string') {
        this.splitContext(record, value);
        continue;
      }

      const override = this.policies.overrides.get(key);
      if (override) {
        const values = Array.isArray(value) ? value.map(toCell) : toCell(value);
        applyMultiValuePolicy(record, key, values, override);
        continue;
      }

      if (!Array.isArray(value)) {
        record[key] = toCell(value);
        continue;
      }

      const cells = value.map(toCell);
      const numbers = cells.map(parseNumber);
      if (numbers.every((n): n is number => n !== null)) {
        applyMultiValuePolicy(record, key, numbers, this.policies.numberPolicy);
      } else {
        applyMultiValuePolicy(record, key, cells, this.policies.nonNumberPolicy);
      }
    }

    return record;
  }

  private splitContext(record: NormalizedRecord, path: string): void {
    const contexts = path.split('/');
    if (contexts.length > this.depth) {
      this.depth = contexts.length;
    }
    contexts.forEach((context, index) => {
      record[contextColumnName(index + 1)] = context;
    });
  }
}
