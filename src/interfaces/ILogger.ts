/**
 * Logger Interface
 *
 * Application code depends on this interface, never on pino directly
 * (the HTTP request logger is the one exception, pino-http needs a pino
 * instance). LoggerFactory picks the adapter from LOGGER_TYPE.
 */

/**
 * Structured fields attached to a log entry
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /** Diagnostic detail: queries executed, transaction boundaries */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /** Business events: portfolio created, trade recorded */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /** Rejected actions and recoverable conditions */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /** Failed operations that need attention */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /** Unrecoverable errors, the process is about to exit */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

export interface ILoggerFactory {
  /**
   * @param context - Component name bound to every entry (e.g. "PositionService")
   */
  createLogger(context?: string): ILogger;
}
