import type { Logger, LevelWithSilent } from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

type LogMethod = Exclude<LevelWithSilent, 'silent' | 'trace'>;

/**
 * Shared pino-backed implementation of ILogger.
 * Adapters differ only in how they build the underlying pino instance.
 */
export class PinoLoggerAdapter implements ILogger {
  constructor(protected readonly logger: Logger) {}

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('debug', messageOrMetadata, message);
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('info', messageOrMetadata, message);
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('warn', messageOrMetadata, message);
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('error', messageOrMetadata, message);
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('fatal', messageOrMetadata, message);
  }

  private write(
    level: LogMethod,
    messageOrMetadata: string | LogMetadata,
    message?: string
  ): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger[level](messageOrMetadata);
    } else {
      this.logger[level](messageOrMetadata, message);
    }
  }
}
