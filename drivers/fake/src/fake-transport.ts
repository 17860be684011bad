import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { TransportError, type LineTransport, type TransportConfig } from "@windlog/driver-core";

export const FakeConnectionSchema = z.object({
  sampleIntervalMs: z.number().nonnegative().default(100),
  seed: z.number().int().optional(),
  format: z.enum(["spaced", "comma"]).default("spaced")
});

export type FakeConnection = z.infer<typeof FakeConnectionSchema>;

type Rng = () => number;

function createRng(seed: number | undefined): Rng {
  let state = (seed ?? Date.now()) >>> 0;
  if (state === 0) state = 0x1abcdef;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0xffffffff;
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Synthetic anemometer. Emits one line per sample interval in the device's
 * space-separated tag/value layout, or comma-separated pairs when `format` is "comma".
 */
export class FakeTransport implements LineTransport {
  private sampleIndex = 0;
  private rng: Rng;
  private readonly connection: FakeConnection;
  private connected = false;
  private nextDueAt = 0;

  constructor(private readonly cfg: TransportConfig) {
    this.connection = FakeConnectionSchema.parse(cfg.connection);
    this.rng = createRng(this.connection.seed);
  }

  async connect(): Promise<void> {
    this.connected = true;
    this.sampleIndex = 0;
    this.nextDueAt = Date.now() + this.connection.sampleIntervalMs;
  }

  async readLine(timeoutMs: number): Promise<string> {
    if (!this.connected) {
      throw new TransportError("Transport not connected", this.cfg.endpoint);
    }
    const wait = this.nextDueAt - Date.now();
    if (wait > timeoutMs) {
      await delay(timeoutMs);
      return "";
    }
    if (wait > 0) {
      await delay(wait);
    }
    this.nextDueAt = Date.now() + this.connection.sampleIntervalMs;
    return this.nextLine();
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  getStatus(): { connected: boolean; samples: number } {
    return { connected: this.connected, samples: this.sampleIndex };
  }

  private nextLine(): string {
    const n = this.sampleIndex;
    const noise = (this.rng() - 0.5) * 2;
    const speed = clamp(4 + 2 * Math.sin(n / 50) + noise, 0, 50);
    const direction = Math.round((((270 + 30 * Math.sin(n / 80) + noise * 10) % 360) + 360) % 360);
    const radians = (direction * Math.PI) / 180;
    const pairs: Array<[string, string]> = [
      ["S", speed.toFixed(2)],
      ["S2", (speed * 0.98).toFixed(2)],
      ["D", String(direction)],
      ["U", (-speed * Math.sin(radians)).toFixed(2)],
      ["V", (-speed * Math.cos(radians)).toFixed(2)],
      ["W", (noise * 0.1).toFixed(2)],
      ["T", (20 + 2 * Math.sin(n / 500) + this.rng() * 0.2).toFixed(2)],
      ["H", (45 + this.rng()).toFixed(1)],
      ["P", (1013.25 + (this.rng() - 0.5)).toFixed(1)]
    ];

    this.sampleIndex += 1;
    if (this.connection.format === "comma") {
      return pairs.map(([tag, value]) => `${tag} ${value}`).join(", ");
    }
    return pairs.map(([tag, value]) => `${tag} ${value}`).join(" ");
  }
}
