/**
 * Record Controller — Raw Records and Result Tables
 * Layer: Interfaces (HTTP)
 *
 *   records: every raw record of a search, in page order (or the first page
 *            only with paginate=false)
 *   table:   the flattened, typed, ordered ResultTable
 *
 * A failure on any page surfaces as the FetchFailure's 502; no partial data
 * is ever returned.
 */
import { PaginationWalker } from '@application/services/PaginationWalker';
import { TableService } from '@application/services/TableService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Request, Response } from 'express';

import { parseInput } from '../validation/parseInput';
import { recordsQuerySchema, tableQuerySchema } from '../validation/schemas';
import { timingMeta } from './timing';

export class RecordController {
  private walker: PaginationWalker;
  private tables: TableService;

  constructor() {
    this.walker = container.resolve<PaginationWalker>(TOKENS.PaginationWalker);
    this.tables = container.resolve<TableService>(TOKENS.TableService);
  }

  records = async (req: Request, res: Response): Promise<void> => {
    const { url, attributes, paginate } = parseInput(recordsQuerySchema, req.query);
    const records = await this.walker.fetchAllPages(url, attributes, paginate);
    const meta = timingMeta(req);

    res.status(200).json({
      status: 'success',
      data: records,
      total: records.length,
      ...(meta != null && { meta }),
    });
  };

  table = async (req: Request, res: Response): Promise<void> => {
    const { url, attributes } = parseInput(tableQuerySchema, req.query);
    const table = await this.tables.buildTable(url, attributes);
    const meta = timingMeta(req);

    res.status(200).json({
      status: 'success',
      data: table,
      ...(meta != null && { meta }),
    });
  };
}
