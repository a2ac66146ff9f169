/**
 * Cache Controller — Explicit Cache Eviction
 * Layer: Interfaces (HTTP)
 *
 *   DELETE /api/v1/cache?keepPrefix=true   drop entries from other prefixes
 *   DELETE /api/v1/cache?keepPrefix=false  drop entries of the active prefix
 */
import { ApiClient } from '@application/services/ApiClient';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Request, Response } from 'express';

import { parseInput } from '../validation/parseInput';
import { clearCacheQuerySchema } from '../validation/schemas';

export class CacheController {
  private api: ApiClient;

  constructor() {
    this.api = container.resolve<ApiClient>(TOKENS.ApiClient);
  }

  clear = async (req: Request, res: Response): Promise<void> => {
    const { keepPrefix } = parseInput(clearCacheQuerySchema, req.query);
    const deleted = await this.api.clearCache(keepPrefix);

    res.status(200).json({
      status: 'success',
      data: { deleted, keepPrefix, prefix: this.api.cachePrefix },
    });
  };
}
