import { afterEach, describe, expect, it, vi } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { assessReadiness, registerHealthChecks, setupGracefulShutdown, type PipelineStatus } from '../src/index';

describe('assessReadiness', () => {
  it('is ready only while taking data without an error', () => {
    expect(assessReadiness({ state: 'STREAMING' })).toEqual({ ready: true, state: 'STREAMING' });
    expect(assessReadiness({ state: 'IDLE' })).toEqual({ ready: false, state: 'IDLE' });
    expect(assessReadiness({ state: 'CLOSED' })).toEqual({ ready: false, state: 'CLOSED' });
    expect(assessReadiness({ state: 'STREAMING', lastError: 'disk full' })).toEqual({
      ready: false,
      state: 'STREAMING',
      lastError: 'disk full',
    });
    expect(assessReadiness({ state: 'CLOSED' }, ['CLOSED']).ready).toBe(true);
  });
});

describe('Health routes', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  function build(status: PipelineStatus): FastifyInstance {
    app = Fastify({ logger: false });
    registerHealthChecks(app, { serviceName: 'windlog-test', status: () => status });
    return app;
  }

  it('reports liveness with the service name', async () => {
    const res = await build({ state: 'CLOSED' }).inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'healthy', service: 'windlog-test' });
  });

  it('is ready while the pipeline streams', async () => {
    const res = await build({ state: 'STREAMING' }).inject({ method: 'GET', url: '/ready' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ready: true, state: 'STREAMING', service: 'windlog-test' });
  });

  it('is not ready once the session has ended cleanly', async () => {
    const res = await build({ state: 'CLOSED' }).inject({ method: 'GET', url: '/ready' });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ ready: false, state: 'CLOSED' });
  });

  it('reports the pipeline error', async () => {
    const res = await build({ state: 'CLOSED', lastError: 'Failed to write /tmp/data.csv' }).inject({
      method: 'GET',
      url: '/ready',
    });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ ready: false, lastError: 'Failed to write /tmp/data.csv' });
  });
});

describe('setupGracefulShutdown', () => {
  it('drains before closing the server and exits once', async () => {
    const app = Fastify({ logger: false });
    const order: string[] = [];
    app.addHook('onClose', async () => {
      order.push('close');
    });
    const exit = vi.fn();
    const shutdown = setupGracefulShutdown(app, {
      signals: [],
      trapFatalErrors: false,
      exit,
      drain: async (signal) => {
        order.push(`drain:${signal}`);
      },
    });

    await shutdown('SIGTERM');
    await shutdown('SIGINT');

    expect(order).toEqual(['drain:SIGTERM', 'close']);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('exits non-zero when draining fails', async () => {
    const app = Fastify({ logger: false });
    const exit = vi.fn();
    const shutdown = setupGracefulShutdown(app, {
      signals: [],
      trapFatalErrors: false,
      exit,
      drain: async () => {
        throw new Error('stats log unwritable');
      },
    });

    await shutdown('SIGTERM');

    expect(exit).toHaveBeenCalledWith(1);
    await app.close();
  });
});
