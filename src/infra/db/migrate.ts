import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from '../logger/logger.js';
import type { SqlPool } from './postgres.js';

export const SCHEMA_PATH = resolve(process.cwd(), 'sql', 'schema.sql');

export async function migrate(pool: SqlPool, logger: Logger, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf-8');
  await pool.query(sql);
  logger.info('migrate', `Schema applied from ${schemaPath}`);
}
