import { readFile } from 'fs/promises';
import { join } from 'path';
import type { Queryable } from './jobs';
import { logger } from '../utils/logger';

export const SCHEMA_FILE = join(process.cwd(), 'db', 'schema.sql');

/**
 * Runs the schema file; every statement is idempotent
 */
export async function runMigration(db: Queryable, schemaFile: string = SCHEMA_FILE): Promise<void> {
  logger.info('Starting database migration...', { schemaFile });

  const schema = await readFile(schemaFile, 'utf-8');
  await db.query(schema);

  logger.info('Database migration completed successfully');
}
