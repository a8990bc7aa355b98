import { readdirSync, readFileSync } from 'fs';
import path from 'path';
import { sql } from 'drizzle-orm';
import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import type { DbClient } from './client.js';

const schemaMigrations = pgTable('schema_migrations', {
  name: text('name').primaryKey(),
  appliedAt: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
});

export const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');

/**
 * Split a migration file into single statements.
 * Statements end with a semicolon at the end of a line.
 */
export function splitStatements(content: string): string[] {
  return content
    .split(/;\s*$/m)
    .map((chunk) => chunk.trim())
    .filter((chunk) =>
      chunk
        .split('\n')
        .some((line) => line.trim() !== '' && !line.trim().startsWith('--'))
    );
}

/**
 * List migration files in apply order.
 */
export function listMigrationFiles(dir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * Apply every migration not yet recorded in schema_migrations.
 * Returns the names of the files applied by this run.
 */
export async function runMigrations(
  database: DbClient,
  dir: string = DEFAULT_MIGRATIONS_DIR
): Promise<string[]> {
  await database.execute(
    sql.raw(
      'CREATE TABLE IF NOT EXISTS "schema_migrations" ("name" text PRIMARY KEY, "applied_at" timestamptz NOT NULL DEFAULT now())'
    )
  );

  const rows = await database.select({ name: schemaMigrations.name }).from(schemaMigrations);
  const applied = new Set(rows.map((row) => row.name));

  const appliedNow: string[] = [];

  for (const file of listMigrationFiles(dir)) {
    if (applied.has(file)) continue;

    const statements = splitStatements(readFileSync(path.join(dir, file), 'utf-8'));

    await database.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(schemaMigrations).values({ name: file });
    });

    appliedNow.push(file);
  }

  return appliedNow;
}
