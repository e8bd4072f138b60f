// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  constructor(config: MetricsConfig = {}) {
    // Per-client registry, so several clients can coexist in one process
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP sends, retries and replays included',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP send duration',
        labelNames: ['method', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'in_flight_requests',
      new Gauge({
        name: 'in_flight_requests',
        help: 'Logical calls currently executing',
        registers: [this.registry],
      })
    );

    // Retry metrics
    this.counters.set(
      'http_retries',
      new Counter({
        name: 'http_retries_total',
        help: 'Retries scheduled by the retry policy',
        labelNames: ['classification'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_retry_wait',
      new Histogram({
        name: 'http_retry_wait_seconds',
        help: 'Backoff wait before a retry',
        labelNames: ['classification'],
        buckets: [0.1, 0.5, 1, 5, 15, 60],
        registers: [this.registry],
      })
    );

    // Token metrics
    this.counters.set(
      'token_refresh_total',
      new Counter({
        name: 'token_refresh_total',
        help: 'Token acquisitions',
        labelNames: ['grant', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_refresh_dedup',
      new Counter({
        name: 'token_refresh_dedup_total',
        help: 'Token refreshes joined instead of started',
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number> = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  adjustGauge(name: string, delta: number): void {
    const gauge = this.gauges.get(name);
    if (!gauge) return;
    if (delta >= 0) gauge.inc(delta);
    else gauge.dec(-delta);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
