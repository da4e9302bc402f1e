/**
 * Ingestion Routes
 *
 * Operator endpoints, guarded by the INGESTION_TOKEN bearer token:
 * - POST /v1/ingestion/sync  copy the secondary index into the object store
 * - POST /v1/ingestion/pdf   split (or move) an uploaded PDF
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { ConfigurationError } from '@/errors/gateway';
import { requireIngestionToken } from '@/middleware/auth';
import { errorBody, formatZodError } from '@/middleware/errorHandler';
import type { ObjectStore } from '@/services/backends/types';
import { runIngestionSync, type IngestionSyncDeps } from '@/services/ingestionSync.service';
import { processUploadedPdf } from '@/services/pdfChunking.service';
import { pdfRequestSchema } from '@/validators/ingestion';

export interface IngestionServices {
  token?: string;
  /** Null when the keyword index or object store is not configured */
  sync: IngestionSyncDeps | null;
  store: ObjectStore | null;
  pdfMaxPages: number;
}

export function createIngestionRoutes(services: IngestionServices): Hono<HonoEnv> {
  const routes = new Hono<HonoEnv>();

  routes.use('*', requireIngestionToken(services.token));

  routes.post('/sync', async (c) => {
    if (!services.sync) {
      throw new ConfigurationError('Ingestion sync requires KEYWORD_INDEX_URL and DATABASE_URL');
    }
    const report = await runIngestionSync({ ...services.sync, log: c.get('log') });
    return c.json({ status: 'success', data: report, timestamp: new Date().toISOString() });
  });

  routes.post(
    '/pdf',
    zValidator('json', pdfRequestSchema, (result, c) => {
      if (!result.success) {
        return c.json(errorBody(formatZodError(result.error)), 400);
      }
    }),
    async (c) => {
      if (!services.store) {
        throw new ConfigurationError('PDF processing requires DATABASE_URL');
      }
      const { key } = c.req.valid('json');
      const report = await processUploadedPdf(services.store, key, {
        maxPages: services.pdfMaxPages,
        log: c.get('log'),
      });
      return c.json({ status: 'success', data: report, timestamp: new Date().toISOString() });
    }
  );

  return routes;
}
