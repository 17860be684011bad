import type { LineTransport } from "@windlog/driver-core";
import { TransportError } from "@windlog/driver-core";
import type { PipelineConfig, TelemetryRecord } from "@windlog/schemas";
import { parseLine } from "../src/core/line-parser";
import type { OutputSink } from "../src/core/output";

export class MemorySink implements OutputSink {
  readonly lines: string[] = [];
  closed = false;

  constructor(readonly path: string | null = null) {}

  writeLine(line: string): void {
    if (this.closed) throw new Error("sink closed");
    this.lines.push(line);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Each call returns the next instant, 100 ms after the previous one. */
export function steppingClock(startIso = "2025-01-01T00:00:00.000Z", stepMs = 100): () => Date {
  const start = Date.parse(startIso);
  let calls = 0;
  return () => {
    const next = new Date(start + calls * stepMs);
    calls += 1;
    return next;
  };
}

export function makeRecord(line: string, ts = "2025-01-01T00:00:00.000Z"): TelemetryRecord {
  return Object.freeze({ ts, rawLine: line, fields: parseLine(line) });
}

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    windowCapacity: 10,
    recordCapacity: 10,
    seriesCapacity: 5,
    checkpoint: { kind: "points", every: 2 },
    refreshMs: 50,
    headerMode: "append",
    skipEmptyRecords: false,
    ...overrides
  };
}

/** Hands out queued lines, then blanks until closed, or ENDED when `endWhenDrained` is set. */
export class ScriptedTransport implements LineTransport {
  connected = false;
  closed = false;

  constructor(
    private readonly lines: string[],
    private readonly options: { endWhenDrained?: boolean; failWith?: Error } = {}
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async readLine(): Promise<string> {
    const next = this.lines.shift();
    if (next !== undefined) return next;
    if (this.options.failWith) throw this.options.failWith;
    if (this.options.endWhenDrained ?? true) {
      throw new TransportError("script finished", "script", { code: "ENDED" });
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
    return "";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
