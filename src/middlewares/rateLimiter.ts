/**
 * Rate Limiting Middleware (express-rate-limit)
 *
 * - Global: every endpoint except /api/health
 * - Mutations: stricter budget for trades and portfolio/price writes
 *
 * Requests are counted per client IP in a fixed window, in process memory.
 * A multi-instance deployment needs a shared store.
 */

import rateLimit from 'express-rate-limit';
import { Request } from 'express';
import { RATE_LIMITS } from '@/config/businessRules';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Client IP; relies on `trust proxy` being set in app.ts so req.ip honours
 * X-Forwarded-For from the first proxy only.
 */
function getClientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  skip: (req) => req.path === '/api/health',
});

export const mutationRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.MUTATIONS.WINDOW_MS,
  limit: RATE_LIMITS.MUTATIONS.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many write requests. Please slow down. Limit: ${RATE_LIMITS.MUTATIONS.MAX_REQUESTS} per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  handler: (req, res, _next, options) => {
    logger.warn(
      {
        type: 'RATE_LIMIT_EXCEEDED',
        method: req.method,
        path: req.originalUrl,
        ip: getClientIp(req),
        limit: options.limit,
      },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  },
});
