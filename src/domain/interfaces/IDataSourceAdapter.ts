import type { NormalizedRecord } from '@domain/entities/ResultTable';

/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Converts one raw record shape into a flat NormalizedRecord. The table
 * pipeline only calls `normalize()`, so it does not care how the raw shape
 * looks:
 *   - RecordNormalizer implements IDataSourceAdapter<RawRecord>
 *
 * `maxContextDepth` is the deepest hierarchical context seen so far; the
 * table assembler needs it to order the "Context (n)" columns.
 */
export interface IDataSourceAdapter<TRaw = unknown> {
  normalize(raw: TRaw): NormalizedRecord;
  readonly maxContextDepth: number;
}
