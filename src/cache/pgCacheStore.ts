import { isRecord } from '../utils/guards';
import { logger } from '../utils/logger';
import type { CacheStore } from './cacheStore';
import { parseEntry } from './cacheStore';

/** The subset of a pg Pool the store needs. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const TABLE_NAME = /^[a-z_][a-z0-9_]*$/;

/**
 * Auth cache kept in Postgres, for runs that share a database instead of a
 * local directory. One row per stage key, upserted on write.
 */
export class PgCacheStore implements CacheStore {
  constructor(
    private readonly client: SqlClient,
    private readonly table = 'auth_cache'
  ) {
    if (!TABLE_NAME.test(table)) {
      throw new Error(`Invalid cache table name: ${table}`);
    }
  }

  async ensureSchema(): Promise<void> {
    await this.client.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at TIMESTAMPTZ,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    logger.info(`Auth cache table "${this.table}" ready`);
  }

  async get(key: string): Promise<string | undefined> {
    const result = await this.client.query(`SELECT value FROM ${this.table} WHERE key = $1`, [key]);
    const row = result.rows[0];
    if (row === undefined) {
      return undefined;
    }
    if (!isRecord(row) || typeof row.value !== 'string') {
      throw new Error(`Unexpected row shape for cache key ${key}`);
    }
    return row.value;
  }

  async put(key: string, value: string): Promise<void> {
    // expires_at is informational (for operators); freshness is decided from the entry itself
    const expiresAt = expiresAtOf(value);

    // Parameterized UPSERT keeps exactly one row per key
    const query = `
      INSERT INTO ${this.table} (key, value, expires_at, updated_at)
      VALUES ($1, $2, $3, NOW())
      ON CONFLICT (key)
      DO UPDATE SET
        value = EXCLUDED.value,
        expires_at = EXCLUDED.expires_at,
        updated_at = NOW()
    `;

    await this.client.query(query, [key, value, expiresAt]);
  }
}

function expiresAtOf(value: string): Date | null {
  try {
    return new Date(parseEntry(value).expiresAt * 1000);
  } catch {
    return null;
  }
}
