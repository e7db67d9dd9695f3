// Database client for PostgreSQL
// Uses the pg library; the pool is created on first use

import { Pool, type PoolClient, type PoolConfig, type QueryResultRow } from 'pg';
import { logger } from '../utils/logger';

/** Minimal query surface shared by Pool, PoolClient and test doubles. */
export type SqlClient = {
  query: (
    text: string,
    params?: unknown[]
  ) => Promise<{ rows: Record<string, unknown>[]; rowCount?: number | null }>;
};

// Support both DATABASE_URL (hosted) and individual env vars (local dev)
function poolConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const isProduction = env.NODE_ENV === 'production';
  const shared = {
    max: parseInt(env.DB_POOL_MAX || '20', 10),
    idleTimeoutMillis: 10000,
    connectionTimeoutMillis: 5000,
  };

  if (env.DATABASE_URL) {
    return {
      ...shared,
      connectionString: env.DATABASE_URL,
      ssl: isProduction ? { rejectUnauthorized: false } : false,
    };
  }

  return {
    ...shared,
    host: env.DB_HOST || 'localhost',
    port: parseInt(env.DB_PORT || '5432', 10),
    database: env.DB_NAME || 'marketplace',
    user: env.DB_USER || 'postgres',
    password: env.DB_PASSWORD || '',
  };
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(poolConfig());
    pool.on('error', (err) => {
      logger.error('Unexpected error on idle client', {}, err);
    });
  }
  return pool;
}

// Query helper with automatic client release
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const start = Date.now();
  const result = await getPool().query<T>(text, params);
  const duration = Date.now() - start;

  if (process.env.DB_DEBUG === '1') {
    logger.debug('Executed query', { text: text.substring(0, 50), duration, rows: result.rowCount });
  }

  return result.rows;
}

// Transaction helper
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
  }
}

export { poolConfig };
