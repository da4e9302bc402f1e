/**
 * Error Handler Middleware
 *
 * Global error handling for the API. Every error leaves as
 * `{ error, timestamp }` with the status its class maps to.
 * Internal details are only shown in development and test.
 */

import type { Context, MiddlewareHandler, Next } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { describeError, isGatewayError } from '@/errors/gateway';
import { logger } from '@/utils/logger';

export interface ErrorResponse {
  error: string;
  timestamp: string;
}

export function errorBody(message: string): ErrorResponse {
  return { error: message, timestamp: new Date().toISOString() };
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// Only show verbose errors in development and test
function verbose(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

export function respondWithError(c: Context, error: unknown): Response {
  if (isGatewayError(error)) {
    if (error.status >= 500) {
      logger.error('Request failed', { code: error.code, error: error.message, path: c.req.path });
    }
    const message = error.status < 500 || verbose() ? error.message : 'An internal error occurred';
    return c.json(errorBody(message), error.status);
  }

  if (error instanceof ZodError) {
    return c.json(errorBody(`Invalid request: ${formatZodError(error)}`), 400);
  }

  if (error instanceof HTTPException) {
    return c.json(errorBody(error.message || 'Request failed'), error.status);
  }

  logger.error('Unhandled error', {
    error: describeError(error),
    stack: error instanceof Error ? error.stack : undefined,
    cause: error instanceof Error && error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
  });
  return c.json(errorBody(verbose() ? describeError(error) : 'An internal error occurred'), 500);
}

/**
 * Global error handler middleware
 *
 * Catches errors from route handlers and formats them consistently
 */
export const errorHandler: MiddlewareHandler = async (c: Context, next: Next) => {
  try {
    return await next();
  } catch (error) {
    return respondWithError(c, error);
  }
};
