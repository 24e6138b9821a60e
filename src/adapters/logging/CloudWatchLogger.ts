/**
 * CloudWatch Logger Adapter
 *
 * JSON lines on stdout with upper-case levels and service metadata, the
 * shape CloudWatch Logs Insights queries expect. Shipping is left to the
 * CloudWatch agent or the container log driver.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLoggerAdapter } from './PinoLoggerAdapter';

export class CloudWatchLogger extends PinoLoggerAdapter {
  constructor(context?: string) {
    super(
      pino({
        name: context ?? 'app',
        level: env.LOG_LEVEL,
        formatters: {
          level: (label) => ({ level: label.toUpperCase() }),
        },
        base: {
          env: env.NODE_ENV,
          region: env.AWS_REGION,
          service: 'portfolio-ledger-api',
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      })
    );
  }
}
