import { cleanEnv, str, num, bool } from 'envalid';
import dotenv from 'dotenv';

dotenv.config();

/**
 * Validated environment variables
 *
 * envalid fails fast on startup when a value has the wrong type or is
 * outside its allowed choices. Defaults target local development.
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging, error messages, CORS)',
  }),
  PORT: num({
    default: 3000,
    desc: 'HTTP server port',
  }),

  // ==========================================
  // Database Configuration
  // ==========================================
  DB_HOST: str({
    default: 'localhost',
    desc: 'PostgreSQL host',
  }),
  DB_PORT: num({
    default: 5432,
    desc: 'PostgreSQL port',
  }),
  DB_NAME: str({
    default: 'portfolio_ledger',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    default: 'postgres', // production must set this explicitly
    desc: 'PostgreSQL password',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 20,
    desc: 'Maximum database connection pool size',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect to PostgreSQL over TLS (managed cloud databases)',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development',
  }),
  LOGGER_TYPE: str({
    choices: ['console', 'cloudwatch'],
    default: 'console',
    desc: 'Logger adapter',
  }),

  // ==========================================
  // Metrics Configuration
  // ==========================================
  METRICS_TYPE: str({
    choices: ['memory', 'cloudwatch', 'noop'],
    default: 'memory',
    desc: 'Metrics adapter (memory is exposed at /api/metrics)',
  }),
  AWS_REGION: str({
    default: 'us-east-1',
    desc: 'AWS region for CloudWatch',
  }),
  CLOUDWATCH_METRICS_NAMESPACE: str({
    default: 'PortfolioLedger',
    desc: 'CloudWatch Metrics namespace',
  }),
});

export type Env = typeof env;
