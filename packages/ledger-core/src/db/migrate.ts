import { readFileSync } from 'fs';
import { join } from 'path';
import { query } from './client';
import { logger } from '../utils/logger';

export const SCHEMA_PATH = join(__dirname, 'schema.sql');

// Statements are idempotent (IF NOT EXISTS), so this is safe on every boot
export async function applySchema(path: string = SCHEMA_PATH): Promise<void> {
  const sql = readFileSync(path, 'utf-8');
  await query(sql);
  logger.info('Marketplace schema applied', { path });
}
