import { z } from "zod";
import {
  IsoDateTimeSchema,
  NonEmptyStringSchema,
  NonNegativeIntSchema
} from "../common/scalars";

export const ParameterNameSchema = NonEmptyStringSchema;

/**
 * One ingested line. `fields` keeps the order in which names appeared on the wire;
 * values are the raw strings the device sent.
 */
export interface TelemetryRecord {
  readonly ts: string;
  readonly rawLine: string;
  readonly fields: ReadonlyMap<string, string>;
}

export const FieldEntrySchema = z.tuple([ParameterNameSchema, z.string()]);

export type FieldEntry = z.infer<typeof FieldEntrySchema>;

// JSON form of a TelemetryRecord; entries instead of an object so column order survives.
export const TelemetryRecordPayloadSchema = z.object({
  ts: IsoDateTimeSchema,
  rawLine: z.string(),
  fields: z.array(FieldEntrySchema)
});

export type TelemetryRecordPayload = z.infer<typeof TelemetryRecordPayloadSchema>;

export function toRecordPayload(record: TelemetryRecord): TelemetryRecordPayload {
  return {
    ts: record.ts,
    rawLine: record.rawLine,
    fields: Array.from(record.fields.entries())
  };
}

export const ParameterStatsSchema = z.object({
  parameter: ParameterNameSchema,
  current: z.number(),
  min: z.number(),
  max: z.number(),
  mean: z.number(),
  stdDev: z.number().nonnegative(),
  count: NonNegativeIntSchema,
  windowSize: NonNegativeIntSchema
});

export type ParameterStats = z.infer<typeof ParameterStatsSchema>;

export const SeriesCategorySchema = z.enum(["windSpeed", "temperature", "windDirection"]);

export type SeriesCategory = z.infer<typeof SeriesCategorySchema>;

export const SeriesSnapshotSchema = z.object({
  windSpeed: z.array(z.number()),
  temperature: z.array(z.number()),
  windDirection: z.array(z.number()),
  timestamps: z.array(IsoDateTimeSchema)
});

export type SeriesSnapshot = z.infer<typeof SeriesSnapshotSchema>;
