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
        help: 'Total HTTP requests',
        labelNames: ['account', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['account', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['account', 'status'],
        registers: [this.registry],
      })
    );

    // Rate limiting metrics
    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Current rate limit queue size',
        labelNames: ['account'],
        registers: [this.registry],
      })
    );

    // Reconciliation metrics
    this.histograms.set(
      'snapshot_fetch_duration',
      new Histogram({
        name: 'snapshot_fetch_duration_seconds',
        help: 'Time to drain one category listing',
        labelNames: ['category', 'status'],
        buckets: [0.5, 1, 5, 15, 60, 300],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'sync_items_total',
      new Counter({
        name: 'sync_items_total',
        help: 'Items processed by the reconciler',
        labelNames: ['category', 'action', 'outcome'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'sync_runs_total',
      new Counter({
        name: 'sync_runs_total',
        help: 'Completed sync runs',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>, value: number = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number>): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
