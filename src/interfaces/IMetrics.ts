/**
 * Metrics Interface
 *
 * Application and business metrics behind an adapter, so services never
 * know whether counters end up in memory, in CloudWatch or nowhere.
 */

/**
 * Dimensions (labels) used to slice a metric
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter
   *
   * @example
   * metrics.incrementCounter('trades_rejected_total', 1, { reason: 'WEEKEND_TRADE' });
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record a duration in milliseconds
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer; calling the returned function records the elapsed time
   * as a histogram sample.
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Push buffered samples to the backend (no-op for pull-based adapters)
   */
  flush(): Promise<void>;
}

export interface IMetricsFactory {
  createMetrics(namespace?: string): IMetrics;
}
