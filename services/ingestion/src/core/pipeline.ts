import type { FastifyBaseLogger } from "fastify";
import type { LineTransport } from "@windlog/driver-core";
import type { IngestionMetrics } from "@windlog/metrics";
import type { PipelineConfig } from "@windlog/schemas";
import { Checkpointer } from "./checkpointer";
import { IngestionLoop } from "./ingestion-loop";
import type { OutputSink } from "./output";
import { RecordWriter } from "./record-writer";
import { SampleBuffer } from "./sample-buffer";
import { SchemaRegistry } from "./schema-registry";
import { SessionContext, type Clock } from "./session";
import { StatisticsEngine } from "./statistics-engine";

export interface SessionOptions {
  config: PipelineConfig;
  transport: LineTransport;
  dataSink: OutputSink;
  /** null disables the statistics log. */
  statsSink: OutputSink | null;
  readTimeoutMs?: number;
  clock?: Clock;
  sessionId?: string;
  logger?: FastifyBaseLogger;
  metrics?: IngestionMetrics;
}

export interface LoggingSession {
  context: SessionContext;
  registry: SchemaRegistry;
  writer: RecordWriter;
  statistics: StatisticsEngine;
  buffer: SampleBuffer;
  checkpointer: Checkpointer;
  loop: IngestionLoop;
}

/** Wires one session's components from a pipeline config. Nothing runs until `loop.run()`. */
export function createSession(options: SessionOptions): LoggingSession {
  const { config, logger, metrics } = options;
  const context = new SessionContext(config, options.clock, options.sessionId);
  const registry = new SchemaRegistry();
  const writer = new RecordWriter({
    sink: options.dataSink,
    registry,
    headerMode: config.headerMode,
    logger
  });
  const statistics = new StatisticsEngine(config.windowCapacity);
  const buffer = new SampleBuffer({
    recordCapacity: config.recordCapacity,
    seriesCapacity: config.seriesCapacity
  });
  const checkpointer = new Checkpointer({
    statistics,
    sink: options.statsSink,
    cadence: config.checkpoint,
    now: () => context.now(),
    logger,
    onFlush: (rows) => metrics?.checkpointRows.inc(rows),
    onError: (error) => loop.abort(error)
  });
  checkpointer.open();

  const loop = new IngestionLoop({
    context,
    transport: options.transport,
    registry,
    writer,
    statistics,
    buffer,
    checkpointer,
    outputs: { data: options.dataSink, stats: options.statsSink },
    readTimeoutMs: options.readTimeoutMs,
    logger,
    metrics
  });

  return { context, registry, writer, statistics, buffer, checkpointer, loop };
}
