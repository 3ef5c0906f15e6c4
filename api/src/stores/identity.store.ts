/**
 * Identity Store (Postgres)
 */

import { eq } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { users } from '@/db/schema';
import { DuplicateEmailError } from '@/errors/blog';
import type { IdentityStore } from './types';
import { isUniqueViolation } from './pgErrors';

export function createPgIdentityStore(db: Database): IdentityStore {
  return {
    async create(input) {
      try {
        const [user] = await db.insert(users).values(input).returning();
        return user;
      } catch (error) {
        // The unique index is the arbiter when two registrations race
        if (isUniqueViolation(error)) {
          throw new DuplicateEmailError(input.email);
        }
        throw error;
      }
    },

    async findById(id) {
      const [user] = await db.select().from(users).where(eq(users.id, id)).limit(1);
      return user ?? null;
    },

    async findByEmail(email) {
      const [user] = await db.select().from(users).where(eq(users.email, email)).limit(1);
      return user ?? null;
    },
  };
}
