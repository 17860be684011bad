/**
 * @windlog/metrics
 *
 * Prometheus instrumentation for windlog: per-route HTTP request metrics,
 * optional process metrics and the ingestion pipeline counters.
 */

import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { FastifyInstance } from 'fastify';

export { Registry };
export { IngestionMetrics, type IngestionMetricsConfig } from './ingestion-metrics';

export interface MetricsOptions {
  serviceName: string;
  registry: Registry;
  /** Prefix for all metric names (default: windlog) */
  prefix?: string;
  collectDefaultMetrics?: boolean;
  /** Path of the exposition route (default: /metrics) */
  path?: string;
}

/**
 * Request count and latency, labelled by route pattern so `/records?limit=5`
 * and `/records?limit=10` share one series.
 */
export class HttpMetrics {
  readonly requests: Counter;
  readonly duration: Histogram;

  constructor(registry: Registry, prefix = 'windlog') {
    this.requests = new Counter({
      name: `${prefix}_http_requests_total`,
      help: 'HTTP requests served, by route and status',
      labelNames: ['service', 'method', 'route', 'status_code'],
      registers: [registry],
    });

    // Live-view reads are expected well under a refresh tick
    this.duration = new Histogram({
      name: `${prefix}_http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['service', 'method', 'route'],
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.5, 1],
      registers: [registry],
    });
  }

  observe(service: string, method: string, route: string, statusCode: number, seconds: number): void {
    this.requests.inc({ service, method, route, status_code: String(statusCode) });
    this.duration.observe({ service, method, route }, seconds);
  }
}

/**
 * Instruments every response and serves the registry in Prometheus text format.
 * Hijacked routes such as server-sent event streams are not observed.
 */
export function registerMetrics(app: FastifyInstance, options: MetricsOptions): HttpMetrics {
  const { serviceName, registry, prefix = 'windlog', path = '/metrics' } = options;

  if (options.collectDefaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix: `${prefix}_`, labels: { service: serviceName } });
  }

  const http = new HttpMetrics(registry, prefix);

  app.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url || 'unmatched';
    http.observe(serviceName, request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  app.get(path, async (_request, reply) => {
    reply.header('Content-Type', registry.contentType);
    return registry.metrics();
  });

  return http;
}
