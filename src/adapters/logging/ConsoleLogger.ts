/**
 * Console Logger Adapter
 *
 * Structured stdout logging through the shared pino instance, pretty-printed
 * in development. Used unless LOGGER_TYPE=cloudwatch.
 */

import { logger as baseLogger } from '@/utils/logger';
import { PinoLoggerAdapter } from './PinoLoggerAdapter';

export class ConsoleLogger extends PinoLoggerAdapter {
  constructor(context?: string) {
    super(baseLogger.child({ context: context ?? 'app' }));
  }
}
