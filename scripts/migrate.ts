#!/usr/bin/env node
/**
 * Apply sql/schema.sql to the configured database.
 * Run with: npm run build && npm run migrate
 */
import { loadConfig } from '../src/infra/config/config.js';
import { migrate } from '../src/infra/db/migrate.js';
import { createPostgresPool } from '../src/infra/db/postgres.js';
import { createLogger } from '../src/infra/logger/logger.js';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  if (cfg.database.driver !== 'postgres') {
    logger.warn('migrate', `Driver is "${cfg.database.driver}", nothing to migrate`);
    return;
  }
  const pool = createPostgresPool(cfg.database, logger);
  try {
    await migrate(pool, logger);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
