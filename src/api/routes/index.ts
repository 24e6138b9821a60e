import { Router } from 'express';
import portfoliosRoutes from './portfolios.routes';
import securitiesRoutes from './securities.routes';
import { getMetrics } from '@/api/controllers/metrics.controller';

const router = Router();

/**
 * API Routes
 * Base path: /api
 *
 * Versioned resources live under /api/v1; health and metrics stay
 * unversioned.
 */

router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'portfolio-ledger-api',
    version: 'v1',
  });
});

// Prometheus text format
router.get('/metrics', getMetrics);

const v1Router = Router();

// No authentication: the owner is taken from the path.
v1Router.use('/users/:userId/portfolios', portfoliosRoutes);
v1Router.use('/securities', securitiesRoutes);

router.use('/v1', v1Router);

export default router;
