/**
 * Session Store (Postgres)
 */

import { and, eq, gt, lt } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { sessions } from '@/db/schema';
import type { SessionStore } from './types';

const sessionColumns = {
  id: sessions.id,
  tokenHash: sessions.tokenHash,
  userId: sessions.userId,
  expiresAt: sessions.expiresAt,
};

export function createPgSessionStore(db: Database): SessionStore {
  return {
    async create(input) {
      const [session] = await db.insert(sessions).values(input).returning(sessionColumns);
      return session;
    },

    async findActive(tokenHash, now) {
      const [session] = await db
        .select(sessionColumns)
        .from(sessions)
        .where(and(eq(sessions.tokenHash, tokenHash), gt(sessions.expiresAt, now)))
        .limit(1);
      return session ?? null;
    },

    async delete(tokenHash) {
      await db.delete(sessions).where(eq(sessions.tokenHash, tokenHash));
    },

    async deleteExpired(now) {
      const removed = await db
        .delete(sessions)
        .where(lt(sessions.expiresAt, now))
        .returning({ id: sessions.id });
      return removed.length;
    },
  };
}
