/**
 * Application Factory
 *
 * Builds the Hono app around injected services, so tests can run the
 * full middleware chain against in-process fakes.
 */

import { Hono } from 'hono';
import { securityHeaders } from '@/middleware/securityHeaders';
import { createCorsMiddleware } from '@/middleware/cors';
import { errorBody, errorHandler, respondWithError } from '@/middleware/errorHandler';
import { requestContext } from '@/middleware/requestContext';
import { createIngestionRoutes, type IngestionServices } from '@/routes/ingestion';
import { createQueryRoutes } from '@/routes/query';
import type { QueryServices } from '@/services/retrieval.service';
import type { HonoEnv } from '@/types/hono';

export const API_VERSION = '1.0.0';

export interface AppServices {
  query: QueryServices;
  ingestion: IngestionServices;
  corsOrigin?: string;
}

export function createApp(services: AppServices): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>();

  // Global middleware chain
  app.use('*', securityHeaders);
  app.use('*', createCorsMiddleware(services.corsOrigin));
  app.use('*', requestContext);
  app.use('*', errorHandler);

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      backends: services.query.adapters.map((adapter) => adapter.name),
    });
  });

  app.route('/v1/query', createQueryRoutes(services.query));
  app.route('/v1/ingestion', createIngestionRoutes(services.ingestion));

  // Global error handler (catches errors that escape middleware)
  app.onError((error, c) => respondWithError(c, error));

  app.notFound((c) => c.json(errorBody('Endpoint not found'), 404));

  return app;
}
