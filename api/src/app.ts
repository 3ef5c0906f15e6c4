/**
 * Blog Application
 *
 * Hono app for the server-rendered blog:
 * - Post listing, post pages and comments
 * - Registration, login and logout
 * - Admin-only post management
 */

import { Hono } from 'hono';
import { csrf } from 'hono/csrf';
import type { HonoEnv } from '@/types/hono';
import type { Services } from '@/services';
import type { AppConfig } from '@/utils/config';
import { createSecurityHeaders } from '@/middleware/securityHeaders';
import { requestLogger } from '@/middleware/requestLogger';
import { createSessionResolver } from '@/middleware/auth';
import { createErrorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createAuthRoutes } from '@/routes/auth';
import { createPostRoutes } from '@/routes/posts';
import pageRoutes from '@/routes/pages';

export interface AppDeps {
  services: Services;
  config: Pick<AppConfig, 'sessionSecret' | 'nodeEnv' | 'publicOrigin'>;
}

export function createApp({ services, config }: AppDeps) {
  const app = new Hono<HonoEnv>();
  const cookies = {
    secret: config.sessionSecret,
    secure: config.nodeEnv === 'production',
  };

  // Global middleware chain
  app.use('*', createSecurityHeaders({ strictTransport: config.nodeEnv === 'production' }));
  app.use('*', requestLogger);
  // Form posts must come from the public origin, or the request's own when unset
  app.use('*', config.publicOrigin ? csrf({ origin: config.publicOrigin }) : csrf());
  app.use('*', createSessionResolver(services.auth, cookies));

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/', createPostRoutes({ content: services.content }));
  app.route('/', createAuthRoutes({ auth: services.auth, cookies }));
  app.route('/', pageRoutes);

  app.onError(
    createErrorHandler({
      verbose: config.nodeEnv === 'development' || config.nodeEnv === 'test',
    })
  );
  app.notFound(notFoundHandler);

  return app;
}

export type BlogApp = ReturnType<typeof createApp>;
