/**
 * Server Entry Point
 * Layer: Entry Point (top of the dependency tree)
 *
 * Starts the HTTP API with `npm start` / `npm run dev`. One process: the
 * work is bound by the upstream API's pacing, not by local CPU, and the
 * file cache needs no coordination between writers.
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop accepting new connections (server.close()).
 *   2. Let in-flight requests finish.
 *   3. Exit with code 0, or 1 if closing failed.
 */
import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info({ pid: process.pid, port: config.port }, `Listening on :${config.port}`);
});

const shutdown = (signal: string): void => {
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing the HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
