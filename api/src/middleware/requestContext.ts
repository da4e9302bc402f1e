/**
 * Request Context Middleware
 *
 * Assigns a request id (honouring an incoming X-Request-ID), exposes it
 * on the response and binds it to a per-request logger.
 */

import crypto from 'crypto';
import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

export const requestContext: MiddlewareHandler<HonoEnv> = async (c, next) => {
  const incoming = c.req.header('X-Request-ID');
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : crypto.randomUUID();

  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId }));
  c.header('X-Request-ID', requestId);

  await next();
};
