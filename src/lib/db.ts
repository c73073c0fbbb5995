import { Pool, PoolClient, types } from 'pg';
import { getConfig } from '../config/env';

// DATE columns stay as YYYY-MM-DD strings instead of local-midnight Date objects
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

// Singleton pool instance
let pool: Pool | null = null;

/**
 * Get the shared connection pool
 * Creates a new pool if one doesn't exist
 */
export function getPool(): Pool {
  if (!pool) {
    const config = getConfig();
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: config.DB_POOL_MAX,
    });
    pool.on('error', (error) => {
      console.error('Unexpected error on idle database client:', error);
    });
  }
  return pool;
}

/**
 * Close the pool
 * Should be called when shutting down the application
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client, rolling back if it throws.
 * The original failure is always the one rethrown. A client whose ROLLBACK
 * fails is released with that error so the pool discards it.
 */
export async function withTransaction<T>(
  source: Pick<Pool, 'connect'>,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await source.connect();
  let releaseError: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('Failed to roll back transaction:', rollbackError);
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw error;
  } finally {
    client.release(releaseError);
  }
}
