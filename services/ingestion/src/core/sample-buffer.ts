import type { SeriesCategory, SeriesSnapshot, TelemetryRecord } from "@windlog/schemas";
import { parseReading } from "./numeric";
import { RingBuffer } from "./ring-buffer";

export const SERIES_CATEGORIES: ReadonlyArray<{ category: SeriesCategory; matches: (name: string) => boolean }> = [
  { category: "windSpeed", matches: (name) => name === "S" || name === "S2" },
  { category: "temperature", matches: (name) => name === "T" },
  { category: "windDirection", matches: (name) => name === "D" }
];

export interface SampleBufferOptions {
  recordCapacity: number;
  seriesCapacity: number;
}

/** Recent records and per-category numeric series for the live view. */
export class SampleBuffer {
  private readonly records: RingBuffer<TelemetryRecord>;
  private readonly series: Record<SeriesCategory, RingBuffer<number>>;
  private readonly timestamps: RingBuffer<string>;

  constructor(options: SampleBufferOptions) {
    this.records = new RingBuffer(options.recordCapacity);
    this.series = {
      windSpeed: new RingBuffer(options.seriesCapacity),
      temperature: new RingBuffer(options.seriesCapacity),
      windDirection: new RingBuffer(options.seriesCapacity)
    };
    this.timestamps = new RingBuffer(options.seriesCapacity);
  }

  push(record: TelemetryRecord): void {
    this.records.push(record);
    for (const [name, raw] of record.fields) {
      const value = parseReading(raw);
      if (value === undefined) continue;
      for (const { category, matches } of SERIES_CATEGORIES) {
        if (matches(name)) this.series[category].push(value);
      }
    }
    this.timestamps.push(record.ts);
  }

  latest(): TelemetryRecord | undefined {
    return this.records.latest();
  }

  recent(n: number): TelemetryRecord[] {
    return this.records.recent(n);
  }

  get size(): number {
    return this.records.size;
  }

  seriesFor(category: SeriesCategory): number[] {
    return this.series[category].toArray();
  }

  seriesSnapshot(): SeriesSnapshot {
    return {
      windSpeed: this.series.windSpeed.toArray(),
      temperature: this.series.temperature.toArray(),
      windDirection: this.series.windDirection.toArray(),
      timestamps: this.timestamps.toArray()
    };
  }
}
