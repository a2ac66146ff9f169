/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps the moment a request enters the pipeline; controllers report
 * meta.totalTimeMs from it. Table builds that page through a large search
 * can take a while, so the figure is worth surfacing. Registered first.
 */
import '@shared/express';
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
