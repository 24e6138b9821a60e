import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';
import { DB_QUERY_LIMITS } from '@/config/businessRules';

/**
 * PostgreSQL connection pool
 * Pool settings come from database.config.ts
 */
const pool = new Pool({
  host: env.DB_HOST,
  port: env.DB_PORT,
  database: env.DB_NAME,
  user: env.DB_USER,
  password: env.DB_PASSWORD,
  ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
  min: DATABASE_POOL_CONFIG.min,
  max: DATABASE_POOL_CONFIG.max,
  idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
  connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
  maxUses: DATABASE_POOL_CONFIG.maxUses,
});

// Idle client errors are logged; the pool recycles the client
pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
});

pool.on('connect', (client) => {
  logger.debug('New PostgreSQL client connected to pool');

  client
    .query(`SET statement_timeout = ${DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS}`)
    .catch((error: unknown) => {
      logger.error({ error }, 'Failed to set statement timeout');
    });
});

/**
 * Execute a SQL query on a pooled connection
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await pool.query<T>(text, params);

    logger.debug(
      {
        query: text,
        duration: Date.now() - start,
        rows: result.rowCount,
      },
      'Executed SQL query'
    );

    return result;
  } catch (error) {
    logger.error(
      {
        error,
        query: text,
        paramCount: params?.length ?? 0,
      },
      'Database query error'
    );
    throw error;
  }
}

/**
 * Get a client from the pool
 * IMPORTANT: Remember to call client.release() when done
 */
export async function getClient(): Promise<PoolClient> {
  return await pool.connect();
}

/**
 * SQLSTATE codes of conflicts that a replay of the same transaction can
 * resolve: serialization failure, deadlock, and a unique violation raised
 * by a concurrent insert (e.g. a second current entry for the same ticker).
 */
const TRANSIENT_CONFLICT_CODES = new Set(['40001', '40P01', '23505']);

export function isTransientConflict(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return typeof error.code === 'string' && TRANSIENT_CONFLICT_CODES.has(error.code);
}

export interface TransactionOptions {
  /** Times the whole callback is replayed after a transient conflict */
  retryOnConflict?: number;
}

/**
 * Execute a function within a database transaction
 * Commits on success, rolls back on any error
 *
 * Isolation Level: READ COMMITTED (PostgreSQL default), combined with
 * FOR UPDATE row locks taken by the callback where reads feed a write.
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const retries = options.retryOnConflict ?? 0;

  for (let attempt = 0; ; attempt++) {
    try {
      return await runTransaction(callback);
    } catch (error) {
      if (attempt >= retries || !isTransientConflict(error)) {
        throw error;
      }
      logger.warn({ attempt: attempt + 1, error }, 'Transaction conflict, retrying');
    }
  }
}

async function runTransaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getClient();

  try {
    await client.query('BEGIN TRANSACTION ISOLATION LEVEL READ COMMITTED');
    logger.debug('Transaction started with READ COMMITTED isolation');

    const result = await callback(client);

    await client.query('COMMIT');
    logger.debug('Transaction committed');

    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    logger.debug({ error }, 'Transaction rolled back');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Test database connection
 * Used at startup
 */
export async function testConnection(): Promise<boolean> {
  try {
    const result = await query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ time: result.rows[0]?.now }, 'Database connection successful');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

/**
 * Close all connections in the pool
 * Called during graceful shutdown
 */
export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}

export { pool };

/**
 * Run a query on the transaction client when one is given, otherwise on
 * the pool. Lets repository methods join an ongoing transaction.
 */
export async function runQuery<T extends QueryResultRow = QueryResultRow>(
  client: PoolClient | undefined,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return client ? client.query<T>(text, params) : query<T>(text, params);
}
