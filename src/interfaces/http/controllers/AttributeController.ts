/**
 * Attribute Controller — HTTP Boundary for Attribute Discovery
 * Layer: Interfaces (HTTP)
 *
 * Thin: validate the query, call FacetAttributeService, send JSON. A null
 * from the service means the upstream fetch failed, which is reported as
 * 502 rather than an empty list. Arrow functions keep `this` bound when
 * Express invokes them as route handlers.
 */
import { FacetAttributeService } from '@application/services/FacetAttributeService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { AppError } from '@shared/errors/AppError';
import type { SlugLabel } from '@shared/types';
import type { Request, Response } from 'express';

import { parseInput } from '../validation/parseInput';
import { commonAttributesQuerySchema, standardAttributesQuerySchema } from '../validation/schemas';
import { timingMeta } from './timing';

export class AttributeController {
  private service: FacetAttributeService;

  constructor() {
    this.service = container.resolve<FacetAttributeService>(TOKENS.FacetAttributeService);
  }

  standard = async (req: Request, res: Response): Promise<void> => {
    const { url, boneMeasures } = parseInput(standardAttributesQuerySchema, req.query);
    const attributes = await this.service.standardAttributes(url, boneMeasures);
    this.send(req, res, url, attributes);
  };

  common = async (req: Request, res: Response): Promise<void> => {
    const { url, minPortion } = parseInput(commonAttributesQuerySchema, req.query);
    const attributes = await this.service.commonAttributes(url, minPortion);
    this.send(req, res, url, attributes);
  };

  private send(req: Request, res: Response, url: string, attributes: SlugLabel[] | null): void {
    if (attributes === null) {
      throw new AppError(`Could not fetch facets from: ${url}`, 502);
    }
    const meta = timingMeta(req);
    res.status(200).json({
      status: 'success',
      data: attributes,
      ...(meta != null && { meta }),
    });
  }
}
