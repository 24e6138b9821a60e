import { Server } from 'http';
import app from './app';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { testConnection, closePool } from '@/config/database';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

const SHUTDOWN_TIMEOUT_MS = 10_000;

let server: Server | undefined;

async function startServer(): Promise<void> {
  logger.info('Testing database connection...');
  const dbConnected = await testConnection();

  if (!dbConnected) {
    logger.error('Failed to connect to database. Exiting...');
    process.exit(1);
  }

  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, `Server running on http://localhost:${env.PORT}`);
    logger.info(`API docs at http://localhost:${env.PORT}/api-docs`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.error(`Port ${env.PORT} is already in use`);
    } else {
      logger.error({ error }, 'Server error');
    }
    process.exit(1);
  });
}

async function releaseResources(): Promise<void> {
  try {
    await metrics.flush();
  } catch (error) {
    logger.error({ error }, 'Error flushing metrics');
  }

  try {
    await closePool();
  } catch (error) {
    logger.error({ error }, 'Error closing database connections');
  }
}

function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (!server) {
    process.exit(0);
  }

  server.close(() => {
    logger.info('HTTP server closed');
    releaseResources()
      .then(() => {
        logger.info('Graceful shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Graceful shutdown failed');
        process.exit(1);
      });
  });

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught Exception');
  process.exit(1);
});

startServer().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});
