/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http over the shared logger from core/logger.ts: one line per
 * request/response with method, URL, status and response time, in the same
 * format (JSON in prod, pretty in dev) as the rest of the app.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({ logger });
