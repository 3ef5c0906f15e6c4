/**
 * One-shot notices carried across a redirect in a short-lived cookie
 */

import type { Context } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';

export const FLASH_COOKIE = 'blog_flash';

export function setFlash(c: Context, message: string): void {
  setCookie(c, FLASH_COOKIE, message, {
    path: '/',
    httpOnly: true,
    sameSite: 'Lax',
    maxAge: 60,
  });
}

/**
 * Read the pending notice and clear it
 */
export function takeFlash(c: Context): string | undefined {
  const message = getCookie(c, FLASH_COOKIE);
  if (message === undefined) {
    return undefined;
  }
  deleteCookie(c, FLASH_COOKIE, { path: '/' });
  return message || undefined;
}
