import { Pool } from 'pg';
import type { AppConfig } from '../config';
import type { SqlClient } from '../cache/pgCacheStore';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

/**
 * Get or create the database connection pool
 */
export function getPool(database: AppConfig['database']): Pool {
  if (!pool) {
    pool = new Pool({
      host: database.host,
      port: database.port,
      database: database.name,
      user: database.user,
      password: database.password,
      max: 2, // one run issues at most a handful of cache queries
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected database pool error', err);
    });

    logger.info('Database connection pool initialized');
  }

  return pool;
}

export function asSqlClient(dbPool: Pool): SqlClient {
  return {
    query: (text, values) => dbPool.query(text, values),
  };
}

/**
 * Close the database connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}
