import { closePool, getPool } from '../db/client';
import { runMigration } from '../db/migrations';
import { logger } from '../utils/logger';

/**
 * Database migration script
 * Applies db/schema.sql to DATABASE_URL
 */
async function migrate(): Promise<void> {
  try {
    await runMigration(getPool());
    await closePool();
    process.exit(0);
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exit(1);
  }
}

void migrate();
