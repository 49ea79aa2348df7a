/**
 * Metrics Collection with Prometheus
 * Tracks provider traffic for the gateway
 */

import { Registry, Counter, Histogram } from 'prom-client';

export const metricsRegistry = new Registry();

export type CallMode = 'full' | 'stream';

export const providerRequestsTotal = new Counter({
  name: 'chatgate_provider_requests_total',
  help: 'Total number of provider requests',
  labelNames: ['provider', 'model', 'mode', 'status'] as const,
  registers: [metricsRegistry],
});

export const providerLatency = new Histogram({
  name: 'chatgate_provider_latency_seconds',
  help: 'Provider request latency in seconds, until the last chunk for streams',
  labelNames: ['provider', 'model', 'mode'] as const,
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [metricsRegistry],
});

export const providerErrorsTotal = new Counter({
  name: 'chatgate_provider_errors_total',
  help: 'Total number of failed provider requests by error kind',
  labelNames: ['provider', 'kind'] as const,
  registers: [metricsRegistry],
});

export const streamChunksTotal = new Counter({
  name: 'chatgate_stream_chunks_total',
  help: 'Total number of text chunks relayed to stream consumers',
  labelNames: ['provider'] as const,
  registers: [metricsRegistry],
});

export const tokensTotal = new Counter({
  name: 'chatgate_tokens_total',
  help: 'Total number of tokens reported by providers',
  labelNames: ['provider', 'model', 'type'] as const,
  registers: [metricsRegistry],
});

/**
 * Get all metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

export function metricsContentType(): string {
  return metricsRegistry.contentType;
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}

/**
 * Tracks one provider call from start to its terminal outcome
 */
export class MetricsTracker {
  private startTime: number;
  private labels: { provider: string; model: string; mode: CallMode };

  constructor(provider: string, model: string, mode: CallMode) {
    this.labels = { provider, model, mode };
    this.startTime = Date.now();
  }

  success(): number {
    const duration = this.elapsed();
    providerRequestsTotal.inc({ ...this.labels, status: 'success' });
    providerLatency.observe(this.labels, duration);
    return duration;
  }

  failure(kind: string): number {
    const duration = this.elapsed();
    providerRequestsTotal.inc({ ...this.labels, status: 'failure' });
    providerErrorsTotal.inc({ provider: this.labels.provider, kind });
    return duration;
  }

  elapsed(): number {
    return (Date.now() - this.startTime) / 1000;
  }
}
