/**
 * Query Routes
 *
 * POST /v1/query — access-controlled retrieval, optionally with a
 * generated answer
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { errorBody, formatZodError } from '@/middleware/errorHandler';
import { handleQuery, type QueryServices } from '@/services/retrieval.service';
import { queryRequestSchema } from '@/validators/query';

export function createQueryRoutes(services: QueryServices): Hono<HonoEnv> {
  const routes = new Hono<HonoEnv>();

  routes.post(
    '/',
    zValidator('json', queryRequestSchema, (result, c) => {
      if (!result.success) {
        return c.json(errorBody(formatZodError(result.error)), 400);
      }
    }),
    async (c) => {
      const request = c.req.valid('json');
      const response = await handleQuery({ ...services, log: c.get('log') }, request);
      return c.json(response);
    }
  );

  return routes;
}
