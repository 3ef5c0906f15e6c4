/**
 * Security Headers Middleware
 *
 * Sets standard security headers on all responses:
 * - Clickjacking (X-Frame-Options, frame-ancestors)
 * - MIME sniffing (X-Content-Type-Options)
 * - Protocol downgrade (Strict-Transport-Security, when served over HTTPS)
 * - Content-Security-Policy: scripts only from self, post images from any https host,
 *   the Bootstrap stylesheet from its CDN
 * - Referrer leakage (Referrer-Policy)
 * - Unnecessary browser features (Permissions-Policy)
 */

import type { MiddlewareHandler } from 'hono';

export interface SecurityHeadersOptions {
  strictTransport: boolean;
}

export function createSecurityHeaders(options: SecurityHeadersOptions): MiddlewareHandler {
  return async (c, next) => {
    await next();
    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    if (options.strictTransport) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    c.header(
      'Content-Security-Policy',
      "default-src 'self'; script-src 'self'; style-src 'self' https://cdn.jsdelivr.net; img-src 'self' https: data:; form-action 'self'; frame-ancestors 'none'"
    );
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
    c.header('Permissions-Policy', 'camera=(), microphone=(), geolocation=()');
  };
}
