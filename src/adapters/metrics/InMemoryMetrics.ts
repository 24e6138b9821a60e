/**
 * In-Memory Metrics Adapter
 *
 * Keeps counters and duration samples in process and renders them
 * in the Prometheus text exposition format for GET /api/metrics.
 * Default adapter (METRICS_TYPE=memory).
 *
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

// Samples kept per histogram series
const MAX_SAMPLES = 1000;

interface Series<T> {
  labels: string;
  value: T;
}

export class InMemoryMetrics implements IMetrics {
  private counters = new Map<string, Map<string, Series<number>>>();
  private histograms = new Map<string, Map<string, Series<number[]>>>();

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    const series = this.series(this.counters, name, dimensions, () => 0);
    series.value += value;
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    const series = this.series(this.histograms, name, dimensions, (): number[] => []);
    series.value.push(value);
    if (series.value.length > MAX_SAMPLES) {
      series.value.shift();
    }
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => this.recordHistogram(name, Date.now() - start, dimensions);
  }

  async flush(): Promise<void> {}

  /**
   * Render every series in Prometheus text format
   */
  render(): string[] {
    const lines: string[] = [];

    for (const [name, byLabels] of this.counters) {
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, value } of byLabels.values()) {
        lines.push(`${name}${labels} ${value}`);
      }
    }

    for (const [name, byLabels] of this.histograms) {
      lines.push(`# TYPE ${name} summary`);
      for (const { labels, value } of byLabels.values()) {
        if (value.length === 0) continue;
        const sorted = [...value].sort((a, b) => a - b);
        const sum = sorted.reduce((a, b) => a + b, 0);
        for (const quantile of [0.5, 0.95, 0.99]) {
          const sample = sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * quantile))] ?? 0;
          lines.push(`${name}${withLabel(labels, 'quantile', String(quantile))} ${sample}`);
        }
        lines.push(`${name}_sum${labels} ${sum}`);
        lines.push(`${name}_count${labels} ${sorted.length}`);
      }
    }

    return lines;
  }

  private series<T>(
    store: Map<string, Map<string, Series<T>>>,
    name: string,
    dimensions: MetricDimensions | undefined,
    initial: () => T
  ): Series<T> {
    let byLabels = store.get(name);
    if (!byLabels) {
      byLabels = new Map();
      store.set(name, byLabels);
    }

    const labels = formatLabels(dimensions);
    let series = byLabels.get(labels);
    if (!series) {
      series = { labels, value: initial() };
      byLabels.set(labels, series);
    }
    return series;
  }
}

function formatLabels(dimensions?: MetricDimensions): string {
  if (!dimensions) return '';
  const entries = Object.entries(dimensions).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) return '';
  return `{${entries.map(([key, value]) => `${key}="${escapeLabel(String(value))}"`).join(',')}}`;
}

function withLabel(labels: string, key: string, value: string): string {
  const pair = `${key}="${value}"`;
  return labels ? `${labels.slice(0, -1)},${pair}}` : `{${pair}}`;
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
