import type { FastifyBaseLogger } from "fastify";
import { TransportError, type LineTransport } from "@windlog/driver-core";
import type { IngestionMetrics } from "@windlog/metrics";
import type { LoopState, SessionStatus, SessionSummary, TelemetryRecord } from "@windlog/schemas";
import type { Checkpointer } from "./checkpointer";
import { parseLine } from "./line-parser";
import type { OutputSink } from "./output";
import type { RecordWriter } from "./record-writer";
import type { SampleBuffer } from "./sample-buffer";
import { TIMESTAMP_COLUMN, type SchemaRegistry } from "./schema-registry";
import type { SessionContext } from "./session";
import type { StatisticsEngine } from "./statistics-engine";

export const DEFAULT_READ_TIMEOUT_MS = 1000;

export interface IngestionLoopDeps {
  context: SessionContext;
  transport: LineTransport;
  registry: SchemaRegistry;
  writer: RecordWriter;
  statistics: StatisticsEngine;
  buffer: SampleBuffer;
  checkpointer: Checkpointer;
  outputs: { data: OutputSink; stats: OutputSink | null };
  readTimeoutMs?: number;
  logger?: FastifyBaseLogger;
  metrics?: IngestionMetrics;
}

// A device field under the synthetic column name is never logged, so it is not tracked either.
const UNTRACKED_FIELDS: ReadonlySet<string> = new Set([TIMESTAMP_COLUMN]);

const TRANSITIONS: Record<LoopState, readonly LoopState[]> = {
  IDLE: ["CONNECTED", "DRAINING"],
  CONNECTED: ["STREAMING", "DRAINING"],
  STREAMING: ["DRAINING"],
  DRAINING: ["CLOSED"],
  CLOSED: []
};

/**
 * Drives one session: reads lines from the transport and pushes each through
 * parse, schema, data log, statistics and live buffer, in that order.
 *
 * Each cycle's pipeline work is synchronous, so anything scheduled on the event loop
 * (HTTP reads, render ticks, interval checkpoints) only sees state between cycles.
 */
export class IngestionLoop {
  private current: LoopState = "IDLE";
  private points = 0;
  private linesReceived = 0;
  private lastRecordAt: number | null = null;
  private updateRateHz = 0;
  private lastError: string | undefined;
  private running: Promise<SessionSummary> | null = null;

  constructor(private readonly deps: IngestionLoopDeps) {}

  get state(): LoopState {
    return this.current;
  }

  get pointCount(): number {
    return this.points;
  }

  status(): SessionStatus {
    const status: SessionStatus = {
      sessionId: this.deps.context.sessionId,
      state: this.current,
      startedAt: this.deps.context.startedAt.toISOString(),
      points: this.points,
      linesReceived: this.linesReceived,
      updateRateHz: this.updateRateHz
    };
    if (this.lastError !== undefined) {
      status.lastError = this.lastError;
    }
    return status;
  }

  /** Starts the session; resolves once it has drained and closed. Repeated calls share one run. */
  run(): Promise<SessionSummary> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /** Records a failure raised outside the read cycle and stops the session. */
  abort(error: unknown): void {
    this.recordError(error);
    this.deps.context.cancel("aborted");
  }

  /**
   * One pipeline step for a line already read from the transport.
   * Returns the record, or null for blank lines and (when configured) lines with no fields.
   */
  ingestLine(line: string): TelemetryRecord | null {
    const rawLine = line.trim();
    if (!rawLine) return null;
    this.linesReceived += 1;
    this.deps.metrics?.linesReceived.inc();

    const fields = parseLine(rawLine);
    if (fields.size === 0 && this.deps.context.config.skipEmptyRecords) {
      return null;
    }

    const now = this.deps.context.now();
    const record: TelemetryRecord = Object.freeze({ ts: now.toISOString(), rawLine, fields });

    if (this.deps.registry.observe(fields)) {
      this.deps.metrics?.schemaColumns.set(this.deps.registry.size);
    }
    this.deps.writer.write(record);
    this.deps.metrics?.recordsWritten.inc();

    const numeric = this.deps.statistics.ingest(fields, UNTRACKED_FIELDS);
    const tracked = fields.has(TIMESTAMP_COLUMN) ? fields.size - 1 : fields.size;
    if (tracked > numeric) {
      this.deps.metrics?.nonNumericFields.inc(tracked - numeric);
    }
    this.deps.metrics?.parametersTracked.set(this.deps.statistics.size);

    this.deps.buffer.push(record);
    this.points += 1;
    this.trackRate(now.getTime());
    this.deps.checkpointer.onPoint(this.points);
    return record;
  }

  private async execute(): Promise<SessionSummary> {
    const { context, transport, checkpointer, logger } = this.deps;
    const timeoutMs = this.deps.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

    try {
      await transport.connect();
      this.transition("CONNECTED");
      this.transition("STREAMING");
      checkpointer.start();
      logger?.info({ sessionId: context.sessionId }, "ingestion: streaming");

      while (!context.cancelled) {
        const line = await transport.readLine(timeoutMs);
        this.ingestLine(line);
      }
      logger?.info({ reason: String(context.signal.reason) }, "ingestion: cancellation requested");
    } catch (error) {
      this.recordError(error);
    }

    this.transition("DRAINING");
    await this.drain();
    this.transition("CLOSED");
    return this.summary();
  }

  private async drain(): Promise<void> {
    const { checkpointer, transport, outputs, logger } = this.deps;
    checkpointer.stop();
    try {
      checkpointer.flush("final");
    } catch (error) {
      this.recordError(error);
    }

    await transport.close().catch((error: unknown) => {
      logger?.error({ err: error }, "ingestion: failed to close transport");
    });
    await outputs.data.close().catch((error: unknown) => {
      this.recordError(error);
    });
    if (outputs.stats) {
      await outputs.stats.close().catch((error: unknown) => {
        this.recordError(error);
      });
    }
  }

  private recordError(error: unknown): void {
    if (error instanceof TransportError && error.code === "ENDED") {
      this.deps.logger?.info({ endpoint: error.endpoint }, "ingestion: transport ended");
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.lastError = message;
    this.deps.logger?.error({ err: error, state: this.current }, "ingestion: failure");
  }

  private transition(next: LoopState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid ingestion state transition ${this.current} -> ${next}`);
    }
    this.deps.logger?.debug({ from: this.current, to: next }, "ingestion: state change");
    this.current = next;
  }

  private trackRate(nowMs: number): void {
    if (this.lastRecordAt !== null && nowMs > this.lastRecordAt) {
      this.updateRateHz = 1000 / (nowMs - this.lastRecordAt);
    }
    this.lastRecordAt = nowMs;
  }

  private summary(): SessionSummary {
    const { context, outputs, statistics } = this.deps;
    const endedAt = context.now();
    const runtimeSeconds = Math.max(0, (endedAt.getTime() - context.startedAt.getTime()) / 1000);
    const summary: SessionSummary = {
      sessionId: context.sessionId,
      startedAt: context.startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      points: this.points,
      parametersTracked: statistics.size,
      runtimeSeconds,
      averageRateHz: runtimeSeconds > 0 ? this.points / runtimeSeconds : 0,
      dataLogPath: outputs.data.path,
      statsLogPath: outputs.stats?.path ?? null
    };
    if (this.lastError !== undefined) {
      summary.lastError = this.lastError;
    }
    return summary;
  }
}
