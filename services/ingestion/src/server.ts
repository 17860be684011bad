import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { registerHealthChecks } from "@windlog/health";
import { IngestionMetrics, Registry, registerMetrics } from "@windlog/metrics";
import type { LineTransport } from "@windlog/driver-core";
import { loadConfig, type WindlogConfig } from "./config";
import { FileSink } from "./core/output";
import { createSession, type LoggingSession } from "./core/pipeline";
import { buildSessionPaths } from "./core/session";
import { loadTransport, transportConfigFor } from "./core/transports";
import { registerSessionRoutes } from "./routes/session";
import { registerStatsRoutes } from "./routes/stats";
import { registerRecordRoutes } from "./routes/records";
import { registerLiveRoutes } from "./routes/live";
import { registerStreamRoutes } from "./routes/stream";

declare module "fastify" {
  interface FastifyInstance {
    ingestion: LoggingSession;
  }
}

interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  config?: WindlogConfig;
  /** Prebuilt session; when absent one is opened on the configured transport and log directory. */
  session?: LoggingSession;
  transport?: LineTransport;
  registry?: Registry;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const config = options.config ?? loadConfig();

  const registry = options.registry ?? new Registry();
  registerMetrics(app, { serviceName: "ingestion", registry, collectDefaultMetrics: true });

  const session = options.session ?? openSession(app, config, registry, options.transport);
  app.decorate("ingestion", session);

  registerHealthChecks(app, { serviceName: "ingestion", status: () => session.loop.status() });
  registerSessionRoutes(app, { session });
  registerStatsRoutes(app, { statistics: session.statistics });
  registerRecordRoutes(app, { buffer: session.buffer });
  registerLiveRoutes(app, { session });
  registerStreamRoutes(app, { session, refreshMs: session.context.config.refreshMs });

  app.addHook("onClose", async () => {
    session.context.cancel("server closing");
    // A session that never started still drains, so both logs get closed.
    await session.loop.run();
  });

  return app;
}

function openSession(
  app: FastifyInstance,
  config: WindlogConfig,
  registry: Registry,
  transport?: LineTransport
): LoggingSession {
  const startedAt = new Date();
  const paths = buildSessionPaths(config.logDir, startedAt);
  const dataSink = new FileSink(paths.dataLog);
  const statsSink = config.saveStatistics ? new FileSink(paths.statsLog) : null;
  const resolvedTransport = transport ?? loadTransport(config.transport.name)(transportConfigFor(config.transport));

  app.log.info({ dataLog: paths.dataLog, statsLog: statsSink?.path ?? null }, "ingestion: opened session logs");

  return createSession({
    config: config.pipeline,
    transport: resolvedTransport,
    dataSink,
    statsSink,
    readTimeoutMs: config.readTimeoutMs,
    clock: () => new Date(),
    logger: app.log,
    metrics: new IngestionMetrics({ registry })
  });
}
