import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";
import { loadTransport, transportConfigFor } from "../src/core/transports";

describe("loadConfig", () => {
  it("defaults to the linux profile and the fake transport", () => {
    const config = loadConfig({});
    expect(config.profile).toBe("linux");
    expect(config.pipeline).toEqual({
      windowCapacity: 150,
      recordCapacity: 1500,
      seriesCapacity: 75,
      checkpoint: { kind: "points", every: 200 },
      refreshMs: 50,
      headerMode: "append",
      skipEmptyRecords: false
    });
    expect(config.transport).toEqual({ name: "fake", replayFile: undefined, baudRate: 115200 });
    expect(config.logDir).toBe("./OUTPUT");
    expect(config.saveStatistics).toBe(true);
    expect(config.readTimeoutMs).toBe(1000);
    expect(config.http).toEqual({ host: "0.0.0.0", port: 4010 });
  });

  it("applies overrides on top of the selected profile", () => {
    const config = loadConfig({
      WINDLOG_PROFILE: "pi",
      WINDLOG_WINDOW: "30",
      WINDLOG_CHECKPOINT_POINTS: "10",
      WINDLOG_HEADER_MODE: "strict",
      WINDLOG_SKIP_EMPTY: "1",
      WINDLOG_SAVE_STATS: "false",
      WINDLOG_HTTP_PORT: "0"
    });
    expect(config.pipeline).toEqual({
      windowCapacity: 30,
      recordCapacity: 100,
      seriesCapacity: 50,
      checkpoint: { kind: "points", every: 10 },
      refreshMs: 1000,
      headerMode: "strict",
      skipEmptyRecords: true
    });
    expect(config.saveStatistics).toBe(false);
    expect(config.http.port).toBe(0);
  });

  it("keeps the pi interval cadence unless overridden", () => {
    expect(loadConfig({ WINDLOG_PROFILE: "pi" }).pipeline.checkpoint).toEqual({ kind: "interval", ms: 600_000 });
    expect(loadConfig({ WINDLOG_CHECKPOINT_MS: "5000" }).pipeline.checkpoint).toEqual({ kind: "interval", ms: 5000 });
  });

  it("fails fast on invalid input", () => {
    expect(() => loadConfig({ WINDLOG_PROFILE: "amiga" })).toThrow();
    expect(() => loadConfig({ WINDLOG_WINDOW: "0" })).toThrow();
    expect(() => loadConfig({ WINDLOG_SAVE_STATS: "maybe" })).toThrow();
    expect(() => loadConfig({ WINDLOG_CHECKPOINT_POINTS: "5", WINDLOG_CHECKPOINT_MS: "5" })).toThrow(
      "Set WINDLOG_CHECKPOINT_POINTS or WINDLOG_CHECKPOINT_MS, not both"
    );
    expect(() => loadConfig({ WINDLOG_TRANSPORT: "replay" })).toThrow("WINDLOG_TRANSPORT=replay requires WINDLOG_REPLAY_FILE");
  });
});

describe("loadTransport", () => {
  it("resolves known transports case-insensitively", () => {
    expect(loadTransport("Replay")).toBe(loadTransport("replay"));
    expect(() => loadTransport("serial")).toThrow("Transport not found: serial");
  });

  it("forwards the replay file and baud rate", () => {
    expect(transportConfigFor({ name: "replay", replayFile: "capture.txt", baudRate: 9600 })).toEqual({
      endpoint: "capture.txt",
      baudRate: 9600,
      connection: { file: "capture.txt" }
    });
    expect(transportConfigFor({ name: "fake", baudRate: 115200 })).toEqual({
      endpoint: "fake",
      baudRate: 115200,
      connection: {}
    });
  });
});
