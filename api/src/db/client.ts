/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries. The pool is opened on first
 * use so that a gateway without a primary store never connects.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { loadEnv } from '@/config/env';
import { ConfigurationError } from '@/errors/gateway';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

let sqlClient: postgres.Sql | null = null;
let database: Database | null = null;

export function getSql(): postgres.Sql {
  if (sqlClient) return sqlClient;

  const env = loadEnv();
  if (!env.DATABASE_URL) {
    throw new ConfigurationError('DATABASE_URL environment variable is required');
  }

  sqlClient = postgres(env.DATABASE_URL, {
    max: env.DB_POOL_SIZE,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: env.NODE_ENV === 'production' ? 'require' : false,
  });
  return sqlClient;
}

export function getDb(): Database {
  if (!database) {
    database = drizzle(getSql(), { schema });
  }
  return database;
}

/**
 * Close the database connection pool
 * Used during graceful shutdown
 */
export async function closeDatabase(): Promise<void> {
  if (!sqlClient) return;
  await sqlClient.end();
  sqlClient = null;
  database = null;
}
