import { randomUUID } from "node:crypto";
import path from "node:path";
import type { PipelineConfig } from "@windlog/schemas";

export type Clock = () => Date;

/**
 * Everything a logging session shares: identity, clock, pipeline settings and the
 * cancellation signal. Shutdown is `cancel()`, never a process-level flag.
 */
export class SessionContext {
  readonly sessionId: string;
  readonly startedAt: Date;
  private readonly controller = new AbortController();

  constructor(
    readonly config: PipelineConfig,
    readonly clock: Clock = () => new Date(),
    sessionId: string = randomUUID()
  ) {
    this.sessionId = sessionId;
    this.startedAt = clock();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(reason = "cancelled"): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort(reason);
  }

  now(): Date {
    return this.clock();
  }
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local-time file stamp, `YYYY-MM-DD_HHMMSS`. */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface SessionPaths {
  dataLog: string;
  statsLog: string;
}

export function buildSessionPaths(
  logDir: string,
  startedAt: Date,
  prefixes: { data: string; stats: string } = { data: "TrisonicaData", stats: "TrisonicaStats" }
): SessionPaths {
  const stamp = formatFileStamp(startedAt);
  return {
    dataLog: path.join(logDir, `${prefixes.data}_${stamp}.csv`),
    statsLog: path.join(logDir, `${prefixes.stats}_${stamp}.csv`)
  };
}
