import { z } from "zod";
import {
  HeaderModeSchema,
  PLATFORM_PROFILES,
  PipelineConfigSchema,
  PlatformProfileSchema,
  type PipelineConfig
} from "@windlog/schemas";

const FlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const OptionalPositiveInt = z.coerce.number().int().positive().optional();

export const EnvSchema = z.object({
  WINDLOG_PROFILE: PlatformProfileSchema.default("linux"),
  WINDLOG_TRANSPORT: z.enum(["fake", "replay"]).default("fake"),
  WINDLOG_REPLAY_FILE: z.string().min(1).optional(),
  WINDLOG_BAUD: z.coerce.number().int().positive().default(115200),
  WINDLOG_LOG_DIR: z.string().min(1).default("./OUTPUT"),
  WINDLOG_SAVE_STATS: FlagSchema.default("true"),
  WINDLOG_HEADER_MODE: HeaderModeSchema.optional(),
  WINDLOG_SKIP_EMPTY: FlagSchema.optional(),
  WINDLOG_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  WINDLOG_WINDOW: OptionalPositiveInt,
  WINDLOG_RECORD_CAPACITY: OptionalPositiveInt,
  WINDLOG_SERIES_CAPACITY: OptionalPositiveInt,
  WINDLOG_CHECKPOINT_POINTS: OptionalPositiveInt,
  WINDLOG_CHECKPOINT_MS: OptionalPositiveInt,
  WINDLOG_REFRESH_MS: OptionalPositiveInt,
  WINDLOG_HTTP_HOST: z.string().min(1).default("0.0.0.0"),
  WINDLOG_HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(4010)
});

export interface WindlogConfig {
  profile: z.infer<typeof PlatformProfileSchema>;
  pipeline: PipelineConfig;
  transport: { name: "fake" | "replay"; replayFile?: string; baudRate: number };
  logDir: string;
  saveStatistics: boolean;
  readTimeoutMs: number;
  http: { host: string; port: number };
}

/** Merges the selected platform profile with any explicit overrides. Throws a ZodError on bad input. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WindlogConfig {
  const parsed = EnvSchema.parse(env);
  const base = PLATFORM_PROFILES[parsed.WINDLOG_PROFILE];

  if (parsed.WINDLOG_CHECKPOINT_POINTS !== undefined && parsed.WINDLOG_CHECKPOINT_MS !== undefined) {
    throw new Error("Set WINDLOG_CHECKPOINT_POINTS or WINDLOG_CHECKPOINT_MS, not both");
  }
  if (parsed.WINDLOG_TRANSPORT === "replay" && !parsed.WINDLOG_REPLAY_FILE) {
    throw new Error("WINDLOG_TRANSPORT=replay requires WINDLOG_REPLAY_FILE");
  }

  let checkpoint = base.checkpoint;
  if (parsed.WINDLOG_CHECKPOINT_POINTS !== undefined) {
    checkpoint = { kind: "points", every: parsed.WINDLOG_CHECKPOINT_POINTS };
  } else if (parsed.WINDLOG_CHECKPOINT_MS !== undefined) {
    checkpoint = { kind: "interval", ms: parsed.WINDLOG_CHECKPOINT_MS };
  }

  const pipeline = PipelineConfigSchema.parse({
    windowCapacity: parsed.WINDLOG_WINDOW ?? base.windowCapacity,
    recordCapacity: parsed.WINDLOG_RECORD_CAPACITY ?? base.recordCapacity,
    seriesCapacity: parsed.WINDLOG_SERIES_CAPACITY ?? base.seriesCapacity,
    checkpoint,
    refreshMs: parsed.WINDLOG_REFRESH_MS ?? base.refreshMs,
    headerMode: parsed.WINDLOG_HEADER_MODE ?? base.headerMode,
    skipEmptyRecords: parsed.WINDLOG_SKIP_EMPTY ?? base.skipEmptyRecords
  });

  return {
    profile: parsed.WINDLOG_PROFILE,
    pipeline,
    transport: {
      name: parsed.WINDLOG_TRANSPORT,
      replayFile: parsed.WINDLOG_REPLAY_FILE,
      baudRate: parsed.WINDLOG_BAUD
    },
    logDir: parsed.WINDLOG_LOG_DIR,
    saveStatistics: parsed.WINDLOG_SAVE_STATS,
    readTimeoutMs: parsed.WINDLOG_READ_TIMEOUT_MS,
    http: { host: parsed.WINDLOG_HTTP_HOST, port: parsed.WINDLOG_HTTP_PORT }
  };
}
