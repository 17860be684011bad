import type { FastifyBaseLogger } from "fastify";
import type { CheckpointCadence, ParameterStats } from "@windlog/schemas";
import type { OutputSink } from "./output";
import type { StatisticsEngine } from "./statistics-engine";

export const STATS_HEADER = "timestamp,parameter,min,max,mean,std_dev,count";

export function formatStatsRow(ts: string, stats: ParameterStats): string {
  return [
    ts,
    stats.parameter,
    stats.min.toFixed(6),
    stats.max.toFixed(6),
    stats.mean.toFixed(6),
    stats.stdDev.toFixed(6),
    String(stats.count)
  ].join(",");
}

interface CheckpointerDeps {
  statistics: StatisticsEngine;
  /** null when statistics saving is disabled; every flush is then a no-op. */
  sink: OutputSink | null;
  cadence: CheckpointCadence;
  now?: () => Date;
  logger?: FastifyBaseLogger;
  onFlush?: (rows: number) => void;
  /** Failures on the timer path, which has no caller to throw to. */
  onError?: (error: unknown) => void;
}

/**
 * Appends a per-parameter statistics snapshot to the statistics log, either every
 * N points or on a wall-clock interval, plus once more when the session drains.
 */
export class Checkpointer {
  private timer: NodeJS.Timeout | null = null;
  private flushes = 0;
  private headerWritten = false;

  constructor(private readonly deps: CheckpointerDeps) {}

  /** Opens the statistics log with its header. */
  open(): void {
    if (!this.deps.sink || this.headerWritten) return;
    this.deps.sink.writeLine(STATS_HEADER);
    this.headerWritten = true;
  }

  start(): void {
    if (this.deps.cadence.kind !== "interval" || this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.flush("interval");
      } catch (error) {
        this.deps.logger?.error({ err: error }, "checkpoint: interval flush failed");
        this.deps.onError?.(error);
      }
    }, this.deps.cadence.ms);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  onPoint(pointCount: number): void {
    if (this.deps.cadence.kind !== "points") return;
    if (pointCount > 0 && pointCount % this.deps.cadence.every === 0) {
      this.flush("points");
    }
  }

  /** Returns the number of rows written. */
  flush(reason: "points" | "interval" | "final" = "final"): number {
    if (!this.deps.sink) return 0;
    const snapshot = this.deps.statistics.snapshot();
    if (snapshot.length === 0) return 0;
    this.open();

    const ts = (this.deps.now ?? (() => new Date()))().toISOString();
    for (const stats of snapshot) {
      this.deps.sink.writeLine(formatStatsRow(ts, stats));
    }
    this.flushes += 1;
    this.deps.onFlush?.(snapshot.length);
    this.deps.logger?.debug({ reason, rows: snapshot.length }, "checkpoint: statistics flushed");
    return snapshot.length;
  }

  get count(): number {
    return this.flushes;
  }
}
