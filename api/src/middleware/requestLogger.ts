import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

const httpLogger = logger.child({ component: 'http' });

/**
 * One info line per request with its outcome and duration
 */
export const requestLogger: MiddlewareHandler<HonoEnv> = async (c, next) => {
  const started = performance.now();
  await next();

  const principal = c.get('principal');
  httpLogger.info('Request completed', {
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    durationMs: Math.round(performance.now() - started),
    userId: principal?.kind === 'user' ? principal.user.id : undefined,
  });
};
