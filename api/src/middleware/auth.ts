/**
 * Ingestion Authentication Middleware
 *
 * Ingestion routes accept a single shared bearer token (INGESTION_TOKEN).
 * Without a configured token the routes reject every request.
 */

import type { Context, MiddlewareHandler, Next } from 'hono';
import { tokensMatch } from '@/utils/crypto';
import { logger } from '@/utils/logger';
import { errorBody } from './errorHandler';

function bearerToken(c: Context): string | undefined {
  const authHeader = c.req.header('Authorization');
  if (!authHeader?.startsWith('Bearer ')) return undefined;
  return authHeader.substring(7).trim() || undefined;
}

export function requireIngestionToken(expectedToken: string | undefined): MiddlewareHandler {
  if (!expectedToken) {
    logger.warn('INGESTION_TOKEN is not set; ingestion routes are disabled');
  }

  return async (c: Context, next: Next) => {
    if (!expectedToken || !tokensMatch(expectedToken, bearerToken(c))) {
      c.header('WWW-Authenticate', 'Bearer');
      return c.json(errorBody('Authentication required'), 401);
    }
    return next();
  };
}
