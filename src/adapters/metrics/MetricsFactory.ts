/**
 * Metrics Factory
 *
 * METRICS_TYPE=memory (default) → InMemoryMetrics, exposed at /api/metrics
 * METRICS_TYPE=cloudwatch → CloudWatchMetrics
 * METRICS_TYPE=noop → NoOpMetrics
 */

import { env } from '@/config/env';
import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { NoOpMetrics } from './NoOpMetrics';
import { InMemoryMetrics } from './InMemoryMetrics';
import { CloudWatchMetrics } from './CloudWatchMetrics';

export class MetricsFactory implements IMetricsFactory {
  constructor(private readonly metricsType: string = env.METRICS_TYPE) {}

  createMetrics(namespace?: string): IMetrics {
    switch (this.metricsType) {
      case 'cloudwatch':
        return new CloudWatchMetrics(namespace);
      case 'noop':
        return new NoOpMetrics();
      case 'memory':
      default:
        return new InMemoryMetrics();
    }
  }
}

/**
 * Default metrics instance for application use
 */
export const metrics = new MetricsFactory().createMetrics(env.CLOUDWATCH_METRICS_NAMESPACE);
