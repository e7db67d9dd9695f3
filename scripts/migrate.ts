#!/usr/bin/env tsx
/**
 * Apply the marketplace schema to the database in DATABASE_URL / DB_*.
 *
 * Usage: tsx scripts/migrate.ts
 */
import { config } from 'dotenv';
import { applySchema, closePool, logger } from 'ledger-core';

config({ path: '.env.local' });
config();

applySchema()
  .then(() => closePool())
  .catch(async (err: unknown) => {
    logger.error('Migration failed', {}, err instanceof Error ? err : new Error(String(err)));
    await closePool();
    process.exit(1);
  });
