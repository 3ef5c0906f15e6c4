/**
 * Authentication Middleware
 *
 * Resolves the principal from the signed session cookie and sets:
 * - c.get('principal') - the logged-in user, or anonymous
 * - c.get('sessionToken') - raw token, when a validly signed cookie is present
 *
 * Guards:
 * - requireAuth - anonymous requests are sent to the login page
 * - adminOnly - everyone but the administrator gets a 403
 */

import type { Context, MiddlewareHandler } from 'hono';
import { deleteCookie, getSignedCookie, setSignedCookie } from 'hono/cookie';
import type { HonoEnv } from '@/types/hono';
import { ANONYMOUS } from '@/types/blog';
import type { AuthService, LoginResult } from '@/services/auth.service';
import { requireAdmin } from '@/services/accessControl';
import { ForbiddenError, UnauthenticatedError } from '@/errors/blog';
import { logger } from '@/utils/logger';

export const SESSION_COOKIE = 'blog_session';

export interface SessionCookieOptions {
  secret: string;
  secure: boolean;
}

/**
 * Session resolver middleware
 *
 * A cookie with a bad signature is treated as no cookie.
 */
export function createSessionResolver(
  auth: AuthService,
  cookies: SessionCookieOptions
): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    const token = await getSignedCookie(c, cookies.secret, SESSION_COOKIE);

    if (token === false) {
      logger.warn('Session cookie failed signature check', { path: c.req.path });
    }

    if (typeof token === 'string' && token.length > 0) {
      c.set('sessionToken', token);
      c.set('principal', await auth.currentPrincipal(token));
    } else {
      c.set('principal', ANONYMOUS);
    }

    await next();
  };
}

/**
 * Require a logged-in user
 *
 * Throws UnauthenticatedError; the error handler redirects to /login with a notice.
 */
export const requireAuth: MiddlewareHandler<HonoEnv> = async (c, next) => {
  if ((c.get('principal') ?? ANONYMOUS).kind === 'anonymous') {
    throw new UnauthenticatedError('You need to login first.');
  }
  await next();
};

/**
 * Require the administrator
 *
 * Runs before any handler that shows or submits a post form.
 */
export const adminOnly: MiddlewareHandler<HonoEnv> = async (c, next) => {
  const check = requireAdmin(c.get('principal') ?? ANONYMOUS);
  if (!check.ok) {
    logger.warn('Admin route refused', { path: c.req.path, method: c.req.method });
    throw new ForbiddenError();
  }
  await next();
};

/**
 * Write the session cookie after a successful login
 */
export async function startSession(
  c: Context<HonoEnv>,
  login: LoginResult,
  cookies: SessionCookieOptions
): Promise<void> {
  const maxAge = Math.max(0, Math.floor((login.expiresAt.getTime() - Date.now()) / 1000));
  await setSignedCookie(c, SESSION_COOKIE, login.token, cookies.secret, {
    httpOnly: true,
    secure: cookies.secure,
    sameSite: 'Lax',
    maxAge,
    path: '/',
  });
}

export function endSession(c: Context<HonoEnv>): void {
  deleteCookie(c, SESSION_COOKIE, { path: '/' });
}
