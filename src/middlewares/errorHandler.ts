import { Request, Response, NextFunction } from 'express';
import { AppError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

// Trade amounts reveal what a user holds; kept out of the logs
const SENSITIVE_FIELDS = new Set(['price', 'quantity', 'close']);

/**
 * Copy of a request body with trade amounts redacted, for logging
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }
  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.has(key) ? '[REDACTED]' : sanitizeRequestBody(value);
  }
  return sanitized;
}

interface ErrorBody {
  success: false;
  error: {
    message: string;
    code?: string;
    details?: unknown;
  };
}

/**
 * Global error handler middleware
 * AppError messages are written for users and go out as they are;
 * anything else is a 500 whose message never leaves the logs
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const known = err instanceof AppError;
  const request = {
    method: req.method,
    url: req.originalUrl,
    body: sanitizeRequestBody(req.body),
  };

  if (known && err.statusCode < 500) {
    logger.warn({ code: err.code, message: err.message, request }, 'Request rejected');
  } else {
    logger.error(
      { error: { name: err.name, message: err.message, stack: err.stack }, request },
      'Error occurred'
    );
  }

  if (known) {
    const body: ErrorBody = {
      success: false,
      error: { message: err.message },
    };
    if (err.code) {
      body.error.code = err.code;
    }
    if (err.details !== undefined) {
      body.error.details = err.details;
    }

    res.status(err.statusCode).json(body);
    return;
  }

  const body: ErrorBody = {
    success: false,
    error: { message: 'Internal server error' },
  };
  res.status(500).json(body);
}
