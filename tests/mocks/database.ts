import { afterAll, beforeAll, beforeEach, vi } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { sql } from 'drizzle-orm';
import * as schema from '@/database/schema.js';
import { runMigrations } from '@/database/migrations.js';

/**
 * In-process Postgres for service tests.
 * Importing this module swaps the pooled client for a PGlite-backed one
 * with the real migrations applied.
 */
const pglite = new PGlite();

export const testDb = drizzle(pglite, { schema });

vi.mock('@/database/client.js', () => ({
  db: testDb,
  pool: { end: vi.fn() },
}));

const TABLES = [
  'sales',
  'no_shirts',
  'old_mpoint_exchanges',
  'mpoints_for_cash',
  'merch_pickups',
  'merch_discounts',
  'arbitrary_charges',
  'receipt_transactions',
  'receipt_items',
  'model_receipts',
  'attendees',
  'groups',
  'audit_logs',
  'users',
  'access_groups',
];

beforeAll(async () => {
  await runMigrations(testDb);
});

beforeEach(async () => {
  await testDb.execute(
    sql.raw(`TRUNCATE ${TABLES.map((table) => `"${table}"`).join(', ')} CASCADE`)
  );
});

afterAll(async () => {
  await pglite.close();
});
