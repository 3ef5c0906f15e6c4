import { describe, it, expect } from 'vitest';
import { ADMIN_USER_ID, isAdmin, requireAdmin } from '@/services/accessControl';
import { ANONYMOUS, type User } from '@/types/blog';

function user(id: number): User {
  return { id, email: `user${id}@example.com`, passwordHash: 'x', name: `User ${id}` };
}

describe('requireAdmin', () => {
  it('admits the first account', () => {
    const admin = user(ADMIN_USER_ID);
    expect(requireAdmin({ kind: 'user', user: admin })).toEqual({ ok: true, admin });
  });

  it('refuses every other account', () => {
    expect(requireAdmin({ kind: 'user', user: user(2) })).toEqual({ ok: false, error: 'FORBIDDEN' });
  });

  it('refuses anonymous visitors', () => {
    expect(requireAdmin(ANONYMOUS)).toEqual({ ok: false, error: 'FORBIDDEN' });
  });
});

describe('isAdmin', () => {
  it('matches requireAdmin', () => {
    expect(isAdmin({ kind: 'user', user: user(1) })).toBe(true);
    expect(isAdmin({ kind: 'user', user: user(7) })).toBe(false);
    expect(isAdmin(ANONYMOUS)).toBe(false);
  });
});
