/**
 * AWS CloudWatch Metrics Adapter
 *
 * Buffers samples and pushes them with PutMetricData every minute
 * (20 data points per request, the API limit). Requires the
 * cloudwatch:PutMetricData permission.
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

const FLUSH_INTERVAL_MS = 60_000;
const MAX_DATUMS_PER_REQUEST = 20;

export class CloudWatchMetrics implements IMetrics {
  private buffer: MetricDatum[] = [];
  private client: CloudWatchClient;

  constructor(private readonly namespace: string = env.CLOUDWATCH_METRICS_NAMESPACE) {
    this.client = new CloudWatchClient({ region: env.AWS_REGION });

    const flushInterval = setInterval(() => {
      this.flush().catch((err: unknown) => {
        logger.error({ err }, 'Failed to flush CloudWatch metrics');
      });
    }, FLUSH_INTERVAL_MS);
    flushInterval.unref();
  }

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Count, dimensions);
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Milliseconds, dimensions);
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => this.recordHistogram(name, Date.now() - start, dimensions);
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const pending = this.buffer.splice(0);

    try {
      for (let i = 0; i < pending.length; i += MAX_DATUMS_PER_REQUEST) {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: pending.slice(i, i + MAX_DATUMS_PER_REQUEST),
          })
        );
      }

      logger.debug(
        { count: pending.length, namespace: this.namespace },
        'Flushed metrics to CloudWatch'
      );
    } catch (error) {
      // Metrics loss is logged, never propagated to request handling
      logger.error({ error, count: pending.length }, 'Failed to send metrics to CloudWatch');
    }
  }

  private push(
    name: string,
    value: number,
    unit: StandardUnit,
    dimensions?: MetricDimensions
  ): void {
    this.buffer.push({
      MetricName: name,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
      Dimensions: Object.entries(dimensions ?? {}).map(([key, dimensionValue]) => ({
        Name: key,
        Value: String(dimensionValue),
      })),
    });
  }
}
