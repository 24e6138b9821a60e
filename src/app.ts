import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi, { JsonObject } from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// One reverse proxy in front; req.ip is the address it forwarded
app.set('trust proxy', 1);

app.use(helmet());

// No browser clients in production
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

app.use(express.json({ limit: '10kb' }));
app.use(express.urlencoded({ extended: true, limit: '10kb' }));

app.use(metricsMiddleware);

app.use(globalRateLimiter);

app.use(requestLogger);

// ============================================
// Routes
// ============================================

function loadOpenApiDocument(): JsonObject | null {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const document = yaml.load(readFileSync(openapiPath, 'utf8'));
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    return null;
  }
  return Object.fromEntries(Object.entries(document));
}

try {
  const openapiDocument = loadOpenApiDocument();
  if (openapiDocument) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  } else {
    logger.warn('OpenAPI document is not an object, /api-docs disabled');
  }
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

app.use('/api', apiRoutes);

app.get('/', (_req, res) => {
  res.json({
    name: 'Portfolio Ledger API',
    version: '1.0.0',
    description: 'Stock portfolio trade ledger',
    documentation: '/api-docs',
    endpoints: {
      health: '/api/health',
      metrics: '/api/metrics',
      portfolios: '/api/v1/users/:userId/portfolios',
      positions: '/api/v1/users/:userId/portfolios/:portfolioName/positions',
      securities: '/api/v1/securities',
    },
  });
});

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
