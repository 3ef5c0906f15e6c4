/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from './schema';
import type { AppConfig } from '@/utils/config';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  sql: postgres.Sql;
  db: Database;
  close(): Promise<void>;
}

/**
 * Open the connection pool
 *
 * No connection is made until the first query.
 */
export function connectDatabase(
  config: Pick<AppConfig, 'databaseUrl' | 'dbPoolSize' | 'nodeEnv'>
): DatabaseConnection {
  const sql = postgres(config.databaseUrl, {
    max: config.dbPoolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: config.nodeEnv === 'production' ? 'require' : false,
  });

  const db = drizzle(sql, { schema });

  return {
    sql,
    db,
    // Used during graceful shutdown
    close: () => sql.end(),
  };
}
