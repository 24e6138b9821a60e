/**
 * Database Connection Pool Configuration
 *
 * See: https://node-postgres.com/apis/pool
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Connections kept warm. Portfolio traffic is bursty (a user records
   * several trades in a row), so a couple of idle connections is enough.
   */
  min: 2,

  /**
   * Upper bound per app instance. PostgreSQL defaults to 100 connections,
   * leave headroom for admin and migration sessions.
   */
  max: env.DB_MAX_CONNECTIONS,

  /** Idle connections are closed after 5 minutes */
  idleTimeoutMillis: 300_000,

  /** Fail the request if no connection frees up within 10 seconds */
  connectionTimeoutMillis: 10_000,

  /** Recycle a connection after this many queries */
  maxUses: 7_500,
} as const;

export type DatabasePoolConfig = typeof DATABASE_POOL_CONFIG;
