import { afterEach, describe, expect, it } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { IngestionMetrics, Registry, registerMetrics } from '../src/index';

describe('Metrics Library', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('labels requests by route pattern', async () => {
    const registry = new Registry();
    app = Fastify({ logger: false });
    registerMetrics(app, { serviceName: 'ingestion', registry });
    app.get('/records', async () => []);

    await app.inject({ method: 'GET', url: '/records?limit=5' });
    await app.inject({ method: 'GET', url: '/records?limit=10' });

    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe(registry.contentType);
    expect(res.body).toContain(
      'windlog_http_requests_total{service="ingestion",method="GET",route="/records",status_code="200"} 2'
    );
    expect(res.body).toContain('# TYPE windlog_http_request_duration_seconds histogram');
  });

  it('collects process metrics when asked', async () => {
    const registry = new Registry();
    app = Fastify({ logger: false });
    registerMetrics(app, { serviceName: 'ingestion', registry, collectDefaultMetrics: true });

    const output = await registry.metrics();
    expect(output).toContain('windlog_process_cpu_user_seconds_total');
  });

  it('records ingestion counters under a custom prefix', async () => {
    const registry = new Registry();
    app = Fastify({ logger: false });
    registerMetrics(app, { serviceName: 'ingestion', registry, prefix: 'custom', path: '/prom' });
    const metrics = new IngestionMetrics({ registry, prefix: 'custom' });

    metrics.linesReceived.inc(3);
    metrics.nonNumericFields.inc();
    metrics.schemaColumns.set(4);

    const res = await app.inject({ method: 'GET', url: '/prom' });
    expect(res.body).toContain('custom_lines_received_total 3');
    expect(res.body).toContain('custom_non_numeric_fields_total 1');
    expect(res.body).toContain('custom_schema_columns 4');
    expect(res.body).toContain('custom_records_written_total 0');
  });
});
