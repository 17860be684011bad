import {
  COMPASS_POINTS,
  describeParameter,
  type AnnotatedField,
  type CompassPoint,
  type ParameterStats,
  type ReadingQuality,
  type SeriesSnapshot,
  type SessionStatus
} from "@windlog/schemas";
import { parseReading } from "./numeric";
import type { SampleBuffer } from "./sample-buffer";
import type { StatisticsEngine } from "./statistics-engine";

export interface LiveSnapshot {
  status: SessionStatus;
  ts: string | null;
  rawLine: string | null;
  fields: AnnotatedField[];
  /** Compass point of the latest `D` reading, if it was numeric. */
  heading: { degrees: number; point: CompassPoint } | null;
  stats: readonly ParameterStats[];
  series: SeriesSnapshot;
}

export function assessQuality(name: string, raw: string): ReadingQuality {
  const value = parseReading(raw);
  if (value === undefined) return "Invalid";
  const range = describeParameter(name)?.range;
  if (!range) return "Unknown";
  return value >= range.min && value <= range.max ? "Good" : "Check Range";
}

export function compassPoint(degrees: number): CompassPoint {
  const normalized = ((degrees % 360) + 360) % 360;
  const index = Math.floor((normalized + 22.5) / 45) % COMPASS_POINTS.length;
  return COMPASS_POINTS[index] ?? "N";
}

export function annotateFields(fields: ReadonlyMap<string, string>): AnnotatedField[] {
  return Array.from(fields, ([name, value]) => {
    const info = describeParameter(name);
    return {
      name,
      value,
      numeric: parseReading(value) ?? null,
      description: info?.description ?? null,
      unit: info?.unit ?? "",
      quality: assessQuality(name, value)
    };
  });
}

/** Everything a renderer needs for one refresh tick, copied out of the live state. */
export function buildLiveSnapshot(
  status: SessionStatus,
  buffer: SampleBuffer,
  statistics: StatisticsEngine
): LiveSnapshot {
  const latest = buffer.latest();
  const direction = latest ? parseReading(latest.fields.get("D") ?? "") : undefined;
  return {
    status,
    ts: latest?.ts ?? null,
    rawLine: latest?.rawLine ?? null,
    fields: latest ? annotateFields(latest.fields) : [],
    heading: direction === undefined ? null : { degrees: direction, point: compassPoint(direction) },
    stats: statistics.snapshot(),
    series: buffer.seriesSnapshot()
  };
}
