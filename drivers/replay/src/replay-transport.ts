import { readFile } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import { TransportError, type LineTransport, type TransportConfig } from "@windlog/driver-core";
import { ReplayConnectionSchema, type ReplayConnection } from "./config";

export interface ReplayStatus {
  connected: boolean;
  position: number;
  total: number;
  passes: number;
}

/**
 * Plays back previously captured raw device output, one line per read.
 * Rejects with an `ENDED` TransportError once the capture is exhausted, unless looping.
 */
export class ReplayTransport implements LineTransport {
  private readonly connection: ReplayConnection;
  private lines: string[] = [];
  private position = 0;
  private passes = 0;
  private connected = false;
  private nextDueAt = 0;

  constructor(private readonly cfg: TransportConfig) {
    this.connection = ReplayConnectionSchema.parse(cfg.connection);
  }

  async connect(): Promise<void> {
    const source = this.connection.lines ?? (await this.loadFile());
    this.lines = source.map((line) => line.trim()).filter((line) => line.length > 0);
    this.position = 0;
    this.passes = 0;
    this.nextDueAt = Date.now() + this.connection.intervalMs;
    this.connected = true;
  }

  async readLine(timeoutMs: number): Promise<string> {
    if (!this.connected) {
      throw new TransportError("Transport not connected", this.cfg.endpoint);
    }
    if (this.position >= this.lines.length) {
      if (!this.connection.loop || this.lines.length === 0) {
        throw new TransportError("Replay source exhausted", this.cfg.endpoint, { code: "ENDED" });
      }
      this.position = 0;
      this.passes += 1;
    }
    // The deadline carries across reads, so a timeout shorter than the interval only splits the wait.
    const wait = this.nextDueAt - Date.now();
    if (wait > timeoutMs) {
      await delay(timeoutMs);
      return "";
    }
    if (wait > 0) {
      await delay(wait);
    }
    const line = this.lines[this.position];
    this.position += 1;
    this.nextDueAt = Date.now() + this.connection.intervalMs;
    return line;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  getStatus(): ReplayStatus {
    return {
      connected: this.connected,
      position: this.position,
      total: this.lines.length,
      passes: this.passes
    };
  }

  private async loadFile(): Promise<string[]> {
    const file = this.connection.file;
    if (!file) return [];
    try {
      const contents = await readFile(file, "utf-8");
      return contents.split(/\r?\n/);
    } catch (error) {
      throw new TransportError(`Failed to open replay file ${file}`, this.cfg.endpoint, { cause: error });
    }
  }
}
