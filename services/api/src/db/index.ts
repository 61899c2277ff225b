import pg from 'pg';
import type { DatabaseConfig } from '../config/index.js';

const { Pool } = pg;

/**
 * Translate validated settings into pg pool options.
 */
export function toPoolConfig(config: DatabaseConfig): pg.PoolConfig {
  const limits = {
    max: config.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  };

  if (config.connectionString) {
    return {
      connectionString: config.connectionString,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      ...limits,
    };
  }

  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    ...limits,
  };
}

let pool: pg.Pool | null = null;

/**
 * Shared, process-wide connection pool, opened by `initializeDatabase`.
 */
export function getPool(): pg.Pool {
  if (!pool) {
    throw new Error('Database pool is not initialized; call initializeDatabase() first');
  }
  return pool;
}

/**
 * Open the pool and check that the server answers.
 */
export async function initializeDatabase(config: DatabaseConfig): Promise<pg.Pool> {
  if (!pool) {
    pool = new Pool(toPoolConfig(config));
    pool.on('error', (err) => {
      // Idle clients can fail after a server restart; the next checkout reconnects.
      process.stderr.write(`Unexpected error on idle database client: ${err.message}\n`);
    });
  }

  const client = await pool.connect();
  try {
    await client.query('SELECT NOW()');
  } finally {
    client.release();
  }
  return pool;
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Execute a query with automatic client acquisition and release.
 */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/**
 * Execute a transaction with automatic commit/rollback.
 * The client is held only for the duration of the callback.
 */
export async function transaction<T>(callback: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * SQLSTATE 23505: a unique index rejected the row.
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === '23505'
  );
}

export { pg };
