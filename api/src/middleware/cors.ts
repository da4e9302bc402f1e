/**
 * CORS Middleware
 *
 * The query API is called from browsers on any origin and from
 * server-side clients with no origin at all. Only POST and OPTIONS
 * are advertised.
 */

import type { Context, Next } from 'hono';

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-Request-ID',
  'Access-Control-Expose-Headers': 'Content-Length, X-Request-ID',
  'Access-Control-Max-Age': '86400',
};

export function corsHeaders(configuredOrigin?: string): Record<string, string> {
  return { ...CORS_HEADERS, 'Access-Control-Allow-Origin': configuredOrigin || '*' };
}

export function createCorsMiddleware(configuredOrigin?: string) {
  const headers = corsHeaders(configuredOrigin);

  return async (c: Context, next: Next) => {
    // Preflight: return 204 with CORS headers directly
    if (c.req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers });
    }

    for (const [key, value] of Object.entries(headers)) {
      c.header(key, value);
    }
    return next();
  };
}
