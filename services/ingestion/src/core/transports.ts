import type { TransportConfig, TransportFactory } from "@windlog/driver-core";
import { createFakeTransport } from "@windlog/driver-fake";
import { createReplayTransport } from "@windlog/driver-replay";
import type { WindlogConfig } from "../config";

const TRANSPORT_MAP: Record<string, TransportFactory> = {
  fake: createFakeTransport,
  replay: createReplayTransport
};

export function loadTransport(name: string): TransportFactory {
  const key = name.toLowerCase();
  const factory = TRANSPORT_MAP[key];
  if (!factory) {
    throw new Error(`Transport not found: ${name}`);
  }
  return factory;
}

export function transportConfigFor(config: WindlogConfig["transport"]): TransportConfig {
  if (config.name === "replay") {
    return {
      endpoint: config.replayFile ?? "replay",
      baudRate: config.baudRate,
      connection: { file: config.replayFile }
    };
  }
  return { endpoint: "fake", baudRate: config.baudRate, connection: {} };
}
