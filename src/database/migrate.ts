import { db, pool } from './client.js';
import { runMigrations } from './migrations.js';
import { logger } from '@shared/utils/logger.js';

async function main() {
  const applied = await runMigrations(db);

  if (applied.length === 0) {
    logger.info('Database schema is up to date');
  } else {
    logger.info({ applied }, `Applied ${applied.length} migration(s)`);
  }

  await pool.end();
}

main().catch((err) => {
  logger.fatal(err, 'Migration failed');
  process.exit(1);
});
