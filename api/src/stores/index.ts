import type { Database } from '@/db/client';
import { createPgContentStore } from './content.store';
import { createPgIdentityStore } from './identity.store';
import { createPgSessionStore } from './session.store';
import type { Stores } from './types';

export type { ContentStore, IdentityStore, SessionStore, Stores } from './types';

export function createPgStores(db: Database): Stores {
  return {
    identity: createPgIdentityStore(db),
    content: createPgContentStore(db),
    sessions: createPgSessionStore(db),
  };
}
