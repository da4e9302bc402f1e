/**
 * API Server
 *
 * Hono server for:
 * - Access-controlled retrieval (/v1/query)
 * - Ingestion operations (/v1/ingestion/*)
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from '@/app';
import { createRuntime } from '@/bootstrap';
import { loadEnv } from '@/config/env';
import { closeDatabase } from '@/db/client';
import { startIngestionScheduler, stopIngestionScheduler } from '@/services/ingestionSync.service';
import { logger } from '@/utils/logger';

const env = loadEnv();
const runtime = createRuntime(env);
const app = createApp(runtime.services);

const server = serve({
  fetch: app.fetch,
  port: env.PORT,
});

logger.info('API server listening', {
  url: `http://localhost:${env.PORT}`,
  backends: runtime.services.query.adapters.map((adapter) => adapter.name),
});

if (runtime.syncDeps) {
  startIngestionScheduler(runtime.syncDeps, env.INGESTION_SYNC_INTERVAL_MINUTES);
}

// Graceful shutdown with request drain
function gracefulShutdown(signal: string) {
  logger.info(`${signal} received: shutting down gracefully...`);
  stopIngestionScheduler();
  server.close(() => {
    logger.info('HTTP server closed, draining connections');
    closeDatabase()
      .then(() => {
        logger.info('Database connections closed');
        process.exit(0);
      })
      .catch((err) => {
        logger.error('Error closing database', { error: String(err) });
        process.exit(1);
      });
  });
  // Force exit after 10 seconds if drain takes too long
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
