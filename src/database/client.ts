import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { config } from '@config/app.config.js';
import * as schema from './schema.js';

export const pool = new pg.Pool({
  connectionString: config.DATABASE_URL,
  max: config.database.poolSize,
  idleTimeoutMillis: 10000,
  connectionTimeoutMillis: 5000,
});

export const db = drizzle(pool, {
  schema,
  logger: config.isDevelopment,
});

/**
 * Database handle accepted by helpers: the pooled client, a transaction,
 * or any other Postgres driver over the same schema.
 */
export type DbClient = PgDatabase<PgQueryResultHKT, typeof schema>;
