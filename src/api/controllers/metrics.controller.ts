/**
 * Metrics Controller
 *
 * Prometheus text exposition of the in-memory metrics adapter plus process
 * gauges. Only available with METRICS_TYPE=memory; other adapters push
 * their samples elsewhere.
 *
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { Request, Response } from 'express';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { InMemoryMetrics } from '@/adapters/metrics/InMemoryMetrics';
import { env } from '@/config/env';

function processMetrics(): string[] {
  const memory = process.memoryUsage();
  const cpu = process.cpuUsage();

  return [
    '# TYPE process_uptime_seconds gauge',
    `process_uptime_seconds ${process.uptime()}`,
    '# TYPE process_heap_used_bytes gauge',
    `process_heap_used_bytes ${memory.heapUsed}`,
    '# TYPE process_rss_bytes gauge',
    `process_rss_bytes ${memory.rss}`,
    '# TYPE process_cpu_user_seconds_total counter',
    `process_cpu_user_seconds_total ${cpu.user / 1_000_000}`,
    '# TYPE process_cpu_system_seconds_total counter',
    `process_cpu_system_seconds_total ${cpu.system / 1_000_000}`,
    '# TYPE app_info gauge',
    `app_info{env="${env.NODE_ENV}",node_version="${process.version}"} 1`,
  ];
}

/**
 * GET /api/metrics
 */
export function getMetrics(_req: Request, res: Response): void {
  if (!(metrics instanceof InMemoryMetrics)) {
    res.status(404).json({
      success: false,
      error: { message: 'Metrics are not exposed by this instance', code: 'NOT_FOUND' },
    });
    return;
  }

  const lines = [...metrics.render(), ...processMetrics()];

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(`${lines.join('\n')}\n`);
}
