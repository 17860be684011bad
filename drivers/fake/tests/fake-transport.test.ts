import { describe, expect, it } from "vitest";
import { TransportError } from "@windlog/driver-core";
import { FakeTransport } from "../src/fake-transport";

const baseConfig = { endpoint: "fake://anemometer", baudRate: 115200 };

function tags(line: string): string[] {
  return line.split(/\s+/).filter((_, idx) => idx % 2 === 0);
}

describe("FakeTransport", () => {
  it("produces deterministic lines with fixed seed", async () => {
    const cfg = { ...baseConfig, connection: { seed: 42, sampleIntervalMs: 0 } };
    const a = new FakeTransport(cfg);
    const b = new FakeTransport(cfg);
    await a.connect();
    await b.connect();

    expect(await a.readLine(100)).toBe(await b.readLine(100));
    expect(await a.readLine(100)).toBe(await b.readLine(100));
  });

  it("emits the device tag layout", async () => {
    const transport = new FakeTransport({ ...baseConfig, connection: { seed: 7, sampleIntervalMs: 0 } });
    await transport.connect();
    const line = await transport.readLine(100);
    expect(tags(line)).toEqual(["S", "S2", "D", "U", "V", "W", "T", "H", "P"]);
  });

  it("joins pairs with commas in comma format", async () => {
    const transport = new FakeTransport({
      ...baseConfig,
      connection: { seed: 7, sampleIntervalMs: 0, format: "comma" }
    });
    await transport.connect();
    const line = await transport.readLine(100);
    expect(line.split(", ").map((pair) => pair.split(" ")[0])).toEqual(["S", "S2", "D", "U", "V", "W", "T", "H", "P"]);
  });

  it("returns an empty line when the sample interval exceeds the timeout", async () => {
    const transport = new FakeTransport({ ...baseConfig, connection: { sampleIntervalMs: 1000 } });
    await transport.connect();
    expect(await transport.readLine(5)).toBe("");
    expect(transport.getStatus()).toEqual({ connected: true, samples: 0 });
  });

  it("emits a sample once the interval elapses across shorter reads", async () => {
    const transport = new FakeTransport({ ...baseConfig, connection: { seed: 5, sampleIntervalMs: 50 } });
    await transport.connect();
    const reads: string[] = [];
    while (reads.length < 10) {
      const line = await transport.readLine(20);
      reads.push(line);
      if (line) break;
    }
    expect(reads[0]).toBe("");
    expect(tags(reads[reads.length - 1] ?? "")).toEqual(["S", "S2", "D", "U", "V", "W", "T", "H", "P"]);
    expect(reads.length).toBeLessThanOrEqual(4);
    expect(transport.getStatus().samples).toBe(1);
  });

  it("rejects reads before connect", async () => {
    const transport = new FakeTransport({ ...baseConfig, connection: {} });
    await expect(transport.readLine(10)).rejects.toBeInstanceOf(TransportError);
  });

  it("keeps wind speed within plausible bounds", async () => {
    const transport = new FakeTransport({ ...baseConfig, connection: { seed: 3, sampleIntervalMs: 0 } });
    await transport.connect();
    for (let i = 0; i < 20; i += 1) {
      const tokens = (await transport.readLine(100)).split(/\s+/);
      const speed = Number(tokens[1]);
      expect(speed).toBeGreaterThanOrEqual(0);
      expect(speed).toBeLessThanOrEqual(50);
    }
  });
});
