import { z } from "zod";
import {
  IsoDateTimeSchema,
  NonNegativeIntSchema,
  NonNegativeNumberSchema,
  PositiveIntSchema
} from "../common/scalars";

export const CheckpointCadenceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("points"), every: PositiveIntSchema }),
  z.object({ kind: z.literal("interval"), ms: PositiveIntSchema })
]);

export type CheckpointCadence = z.infer<typeof CheckpointCadenceSchema>;

export const HeaderModeSchema = z.enum(["append", "strict"]);

export type HeaderMode = z.infer<typeof HeaderModeSchema>;

export const PipelineConfigSchema = z.object({
  windowCapacity: PositiveIntSchema,
  recordCapacity: PositiveIntSchema,
  seriesCapacity: PositiveIntSchema,
  checkpoint: CheckpointCadenceSchema,
  refreshMs: PositiveIntSchema,
  headerMode: HeaderModeSchema.default("append"),
  skipEmptyRecords: z.boolean().default(false)
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const PlatformProfileSchema = z.enum(["linux", "mac", "windows", "pi"]);

export type PlatformProfile = z.infer<typeof PlatformProfileSchema>;

export const PLATFORM_PROFILES: Readonly<Record<PlatformProfile, PipelineConfig>> = {
  linux: {
    windowCapacity: 150,
    recordCapacity: 1500,
    seriesCapacity: 75,
    checkpoint: { kind: "points", every: 200 },
    refreshMs: 50,
    headerMode: "append",
    skipEmptyRecords: false
  },
  mac: {
    windowCapacity: 100,
    recordCapacity: 1000,
    seriesCapacity: 50,
    checkpoint: { kind: "points", every: 100 },
    refreshMs: 50,
    headerMode: "append",
    skipEmptyRecords: false
  },
  windows: {
    windowCapacity: 200,
    recordCapacity: 2000,
    seriesCapacity: 100,
    checkpoint: { kind: "points", every: 250 },
    refreshMs: 30,
    headerMode: "append",
    skipEmptyRecords: false
  },
  pi: {
    windowCapacity: 100,
    recordCapacity: 100,
    seriesCapacity: 50,
    checkpoint: { kind: "interval", ms: 600_000 },
    refreshMs: 1000,
    headerMode: "append",
    skipEmptyRecords: false
  }
};

export const LoopStateSchema = z.enum(["IDLE", "CONNECTED", "STREAMING", "DRAINING", "CLOSED"]);

export type LoopState = z.infer<typeof LoopStateSchema>;

export const SessionStatusSchema = z.object({
  sessionId: z.string(),
  state: LoopStateSchema,
  startedAt: IsoDateTimeSchema,
  points: NonNegativeIntSchema,
  linesReceived: NonNegativeIntSchema,
  updateRateHz: NonNegativeNumberSchema,
  lastError: z.string().optional()
});

export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const SessionSummarySchema = z.object({
  sessionId: z.string(),
  startedAt: IsoDateTimeSchema,
  endedAt: IsoDateTimeSchema,
  points: NonNegativeIntSchema,
  parametersTracked: NonNegativeIntSchema,
  runtimeSeconds: NonNegativeNumberSchema,
  averageRateHz: NonNegativeNumberSchema,
  dataLogPath: z.string().nullable(),
  statsLogPath: z.string().nullable(),
  lastError: z.string().optional()
});

export type SessionSummary = z.infer<typeof SessionSummarySchema>;
