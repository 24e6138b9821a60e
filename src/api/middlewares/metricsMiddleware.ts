/**
 * HTTP Metrics Middleware
 *
 * Feeds the shared IMetrics adapter:
 * - http_requests_total{method,path,status}
 * - http_request_duration_ms{method,path}
 */

import { Request, Response, NextFunction } from 'express';
import { metrics } from '@/adapters/metrics/MetricsFactory';

const UNTRACKED_PATHS = new Set(['/api/metrics', '/api/health']);

/**
 * Collapse path parameters to keep label cardinality bounded
 * e.g. /api/v1/users/7/portfolios/Growth/positions/ABC
 *   -> /api/v1/users/:userId/portfolios/:portfolioName/positions/:ticker
 */
export function normalizePath(path: string): string {
  return path
    .replace(/\/users\/[^/]+/, '/users/:userId')
    .replace(/\/portfolios\/[^/]+/, '/portfolios/:portfolioName')
    .replace(/\/positions\/[^/]+/, '/positions/:ticker')
    .replace(/\/securities\/[^/]+/, '/securities/:ticker');
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const path = normalizePath(req.path);

  if (UNTRACKED_PATHS.has(path)) {
    next();
    return;
  }

  const startTime = Date.now();

  res.on('finish', () => {
    metrics.incrementCounter('http_requests_total', 1, {
      method: req.method,
      path,
      status: res.statusCode,
    });
    metrics.recordHistogram('http_request_duration_ms', Date.now() - startTime, {
      method: req.method,
      path,
    });
  });

  next();
}
