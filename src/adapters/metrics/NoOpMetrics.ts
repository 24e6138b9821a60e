/**
 * No-Op Metrics Adapter
 *
 * Discards every sample. Selected with METRICS_TYPE=noop.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _dimensions?: MetricDimensions): void {}

  recordHistogram(_name: string, _value: number, _dimensions?: MetricDimensions): void {}

  startTimer(_name: string, _dimensions?: MetricDimensions): () => void {
    return () => {};
  }

  async flush(): Promise<void> {}
}
