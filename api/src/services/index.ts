import type { Stores } from '@/stores';
import type { AppConfig } from '@/utils/config';
import { createAuthService, type AuthService } from './auth.service';
import { createContentService, type ContentService } from './content.service';

export interface Services {
  auth: AuthService;
  content: ContentService;
}

export function createServices(
  stores: Stores,
  config: Pick<AppConfig, 'passwordHashIterations' | 'sessionTtlDays'>,
  now?: () => Date
): Services {
  return {
    auth: createAuthService({
      identity: stores.identity,
      sessions: stores.sessions,
      passwordHashIterations: config.passwordHashIterations,
      sessionTtlDays: config.sessionTtlDays,
      now,
    }),
    content: createContentService({
      content: stores.content,
      identity: stores.identity,
      now,
    }),
  };
}
