/**
 * Table Service — Search URL → Typed, Ordered Table
 * Layer: Application
 * Pattern: Facade over walker + normalizer + assembler
 *
 * `buildTable(url, attributeSlugs)`:
 *   1. walks every page of the search (PaginationWalker),
 *   2. normalizes each record with a fresh RecordNormalizer, so context-depth
 *      tracking starts from zero for every table,
 *   3. infers column types and orders the columns (etl/tableAssembler).
 *
 * The options (page size, multi-value policies...) are fixed for the life of
 * the service, so a table build never sees settings change halfway through.
 */
import type { ClientOptions } from '@core/clientOptions';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { NormalizedRecord, ResultTable } from '@domain/entities/ResultTable';
import { RecordNormalizer } from '@etl/RecordNormalizer';
import { assembleTable } from '@etl/tableAssembler';
import { RESPONSE_KEYS } from '@shared/constants';
import { inject, injectable } from 'tsyringe';

import { PaginationWalker } from './PaginationWalker';

@injectable()
export class TableService {
  constructor(
    @inject(TOKENS.PaginationWalker) private walker: PaginationWalker,
    @inject(TOKENS.ClientOptions) private options: ClientOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  createNormalizer(): RecordNormalizer {
    return new RecordNormalizer(this.options.multiValue);
  }

  async buildTable(url: string, attributeSlugs: readonly string[] = []): Promise<ResultTable> {
    const normalizer = this.createNormalizer();
    const records: NormalizedRecord[] = [];

    for await (const page of this.walker.walkPages(url, attributeSlugs, true)) {
      for (const raw of page[RESPONSE_KEYS.RESULTS]) {
        records.push(normalizer.normalize(raw));
      }
    }

    const table = assembleTable(records, normalizer.maxContextDepth);
    this.log.info(
      { url, rows: table.rows.length, columns: table.columns.length },
      'Built result table',
    );
    return table;
  }
}
