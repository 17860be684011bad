import type { FastifyInstance } from 'fastify';

/**
 * What the owner of a long-running pipeline reports about it
 */
export interface PipelineStatus {
  state: string;
  lastError?: string;
}

export interface ReadinessOptions {
  serviceName: string;
  status: () => PipelineStatus;
  /** States in which the pipeline is taking data (default: CONNECTED, STREAMING) */
  readyStates?: readonly string[];
}

export interface Readiness {
  ready: boolean;
  state: string;
  lastError?: string;
}

const DEFAULT_READY_STATES = ['CONNECTED', 'STREAMING'];

/**
 * Ready only while the pipeline is taking data and has not failed.
 * A session that has drained, cleanly or not, is no longer ready.
 */
export function assessReadiness(status: PipelineStatus, readyStates: readonly string[] = DEFAULT_READY_STATES): Readiness {
  const readiness: Readiness = {
    ready: readyStates.includes(status.state) && !status.lastError,
    state: status.state,
  };
  if (status.lastError) {
    readiness.lastError = status.lastError;
  }
  return readiness;
}

/**
 * /health - liveness, 200 while the process serves requests
 * /ready - readiness of the pipeline, 503 when it is not taking data
 */
export function registerHealthChecks(app: FastifyInstance, options: ReadinessOptions): void {
  const startedAt = Date.now();
  const uptime = (): number => (Date.now() - startedAt) / 1000;

  app.get('/health', async () => ({
    status: 'healthy',
    service: options.serviceName,
    timestamp: new Date().toISOString(),
    uptime: uptime(),
  }));

  app.get('/ready', async (_request, reply) => {
    const readiness = assessReadiness(options.status(), options.readyStates);
    reply.status(readiness.ready ? 200 : 503);
    return { ...readiness, service: options.serviceName, uptime: uptime() };
  });
}

export interface GracefulShutdownOptions {
  /** Cancels the pipeline and resolves once its outputs are closed; runs before the server closes */
  drain: (signal: string) => Promise<void>;
  timeoutMs?: number;
  signals?: NodeJS.Signals[];
  /** Also shut down on uncaughtException and unhandledRejection (default: true) */
  trapFatalErrors?: boolean;
  exit?: (code: number) => void;
}

/**
 * Wires process signals to drain the pipeline, then close the server.
 * Returns the shutdown routine; only its first call has any effect.
 */
export function setupGracefulShutdown(
  app: FastifyInstance,
  options: GracefulShutdownOptions
): (signal: string) => Promise<void> {
  const {
    timeoutMs = 10000,
    signals = ['SIGTERM', 'SIGINT'],
    trapFatalErrors = true,
    exit = (code: number) => process.exit(code),
  } = options;

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      app.log.info({ signal }, 'shutdown already in progress');
      return;
    }
    shuttingDown = true;
    app.log.info({ signal }, 'draining pipeline before shutdown');

    const timer = setTimeout(() => {
      app.log.error({ timeoutMs }, 'shutdown timed out, forcing exit');
      exit(1);
    }, timeoutMs);
    timer.unref();

    let code = 0;
    try {
      await options.drain(signal);
      await app.close();
    } catch (error) {
      app.log.error({ err: error }, 'shutdown failed');
      code = 1;
    }
    clearTimeout(timer);
    exit(code);
  };

  for (const signal of signals) {
    process.on(signal, () => void shutdown(signal));
  }

  if (trapFatalErrors) {
    process.on('uncaughtException', (error) => {
      app.log.error({ err: error }, 'uncaught exception');
      void shutdown('uncaughtException');
    });
    process.on('unhandledRejection', (reason) => {
      app.log.error({ reason: String(reason) }, 'unhandled rejection');
      void shutdown('unhandledRejection');
    });
  }

  return shutdown;
}
