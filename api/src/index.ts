/**
 * Blog Server
 *
 * Loads configuration, connects to Postgres, creates the tables if needed
 * and serves the Hono app on Node.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from '@/app';
import { connectDatabase } from '@/db/client';
import { ensureSchema } from '@/db/bootstrap';
import { createPgStores } from '@/stores';
import { createServices } from '@/services';
import { ConfigError } from '@/errors/blog';
import { loadConfig, type AppConfig } from '@/utils/config';
import { logger } from '@/utils/logger';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Refusing to start: invalid configuration', { problems: error.problems });
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const database = connectDatabase(config);

  await ensureSchema(database.db);

  const services = createServices(createPgStores(database.db), config);
  await services.auth.purgeExpiredSessions();

  const app = createApp({ services, config });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });

  logger.info('Blog server running', { url: `http://localhost:${config.port}` });

  // Graceful shutdown with request drain
  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);
    server.close(() => {
      logger.info('HTTP server closed, draining connections');
      database.close().then(() => {
        logger.info('Database connections closed');
        process.exit(0);
      }).catch((err) => {
        logger.error('Error closing database', { error: String(err) });
        process.exit(1);
      });
    });
    // Force exit after 10 seconds if drain takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after 10s timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error) => {
  logger.error('Server failed to start', {
    error: String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
