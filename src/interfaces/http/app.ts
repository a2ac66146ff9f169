/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app instance per call, so integration tests can build one
 * after overriding container registrations.
 *
 * Middleware order:
 *   1. requestTimer  — req.requestStartTime for meta.totalTimeMs
 *   2. helmet, cors, compression
 *   3. express.json()
 *   4. requestLogger — pino-http, one line per request/response
 *   5. routes        — health, attribute discovery, records/table, cache
 *   6. errorHandler  — last; turns thrown errors into JSON responses
 *
 * The `import '@core/container'` side effect bootstraps the DI container
 * before any controller resolves a service from it.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { attributeRoutes } from '@interfaces/http/routes/attributeRoutes';
import { cacheRoutes } from '@interfaces/http/routes/cacheRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { recordRoutes } from '@interfaces/http/routes/recordRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/attributes', attributeRoutes);
  app.use('/api/v1', recordRoutes);
  app.use('/api/v1', cacheRoutes);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
