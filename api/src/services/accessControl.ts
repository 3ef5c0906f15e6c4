/**
 * Access Control
 *
 * The blog has a single administrator: the first registered account.
 * There is no role table; the check is on the user id.
 */

import type { Principal, User } from '@/types/blog';

export const ADMIN_USER_ID = 1;

export type AdminCheck =
  | { ok: true; admin: User }
  | { ok: false; error: 'FORBIDDEN' };

export function requireAdmin(principal: Principal): AdminCheck {
  if (principal.kind === 'user' && principal.user.id === ADMIN_USER_ID) {
    return { ok: true, admin: principal.user };
  }
  return { ok: false, error: 'FORBIDDEN' };
}

export function isAdmin(principal: Principal): boolean {
  return requireAdmin(principal).ok;
}
