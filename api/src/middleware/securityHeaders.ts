/**
 * Security Headers Middleware
 *
 * Sets standard security headers on all responses. The API only serves
 * JSON, so the content security policy blocks everything.
 */

import type { Context, Next } from 'hono';

export async function securityHeaders(c: Context, next: Next) {
  c.header('X-Frame-Options', 'DENY');
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
  c.header('Referrer-Policy', 'no-referrer');
  c.header('Cache-Control', 'no-store');
  return next();
}
