/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', uptime, timestamp, cachePrefix }
 *
 * Confirms the process is up; it never calls the upstream API.
 */
import { ApiClient } from '@application/services/ApiClient';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  const api = container.resolve<ApiClient>(TOKENS.ApiClient);
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    cachePrefix: api.cachePrefix,
  });
});

export { router as healthRoutes };
