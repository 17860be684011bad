import type { ParameterStats } from "@windlog/schemas";
import { parseReading } from "./numeric";
import { RingBuffer } from "./ring-buffer";

interface ParameterState {
  current: number;
  min: number;
  max: number;
  mean: number;
  stdDev: number;
  count: number;
  window: RingBuffer<number>;
}

export const DEFAULT_WINDOW_CAPACITY = 150;

// Neumaier compensated sum.
function compensatedSum(values: readonly number[]): number {
  let sum = 0;
  let compensation = 0;
  for (const value of values) {
    const next = sum + value;
    compensation += Math.abs(sum) >= Math.abs(value) ? sum - next + value : value - next + sum;
    sum = next;
  }
  return sum + compensation;
}

/** Mean and population standard deviation. A window of equal values has exactly its value as mean and 0 spread. */
export function windowMoments(values: readonly number[]): { mean: number; stdDev: number } {
  if (values.length === 0) return { mean: 0, stdDev: 0 };
  const first = values[0];
  if (values.every((value) => value === first)) {
    return { mean: first, stdDev: 0 };
  }
  const mean = compensatedSum(values) / values.length;
  const variance = compensatedSum(values.map((value) => (value - mean) ** 2)) / values.length;
  return { mean, stdDev: Math.sqrt(variance) };
}

/**
 * Per-parameter running statistics. `min`, `max` and `count` cover the whole
 * session; `mean` and `stdDev` cover only the last `windowCapacity` values.
 * Standard deviation is the population form (divide by N).
 */
export class StatisticsEngine {
  private readonly params = new Map<string, ParameterState>();

  constructor(readonly windowCapacity: number = DEFAULT_WINDOW_CAPACITY) {}

  /** Returns false, changing nothing, when `raw` is not a number. */
  update(parameter: string, raw: string): boolean {
    const value = parseReading(raw);
    if (value === undefined) return false;

    const state = this.params.get(parameter);
    if (!state) {
      const window = new RingBuffer<number>(this.windowCapacity);
      window.push(value);
      this.params.set(parameter, {
        current: value,
        min: value,
        max: value,
        mean: value,
        stdDev: 0,
        count: 1,
        window
      });
      return true;
    }

    state.current = value;
    state.count += 1;
    state.min = Math.min(state.min, value);
    state.max = Math.max(state.max, value);
    state.window.push(value);

    const { mean, stdDev } = windowMoments(state.window.toArray());
    state.mean = mean;
    state.stdDev = stdDev;
    return true;
  }

  /** Feeds every field of a record except the `exclude`d names; returns how many were numeric. */
  ingest(fields: ReadonlyMap<string, string>, exclude: ReadonlySet<string> = new Set()): number {
    let accepted = 0;
    for (const [name, raw] of fields) {
      if (exclude.has(name)) continue;
      if (this.update(name, raw)) accepted += 1;
    }
    return accepted;
  }

  snapshot(): readonly ParameterStats[] {
    return Object.freeze(
      Array.from(this.params.entries(), ([parameter, state]) =>
        Object.freeze({
          parameter,
          current: state.current,
          min: state.min,
          max: state.max,
          mean: state.mean,
          stdDev: state.stdDev,
          count: state.count,
          windowSize: state.window.size
        })
      )
    );
  }

  get(parameter: string): ParameterStats | undefined {
    return this.snapshot().find((entry) => entry.parameter === parameter);
  }

  window(parameter: string): number[] {
    return this.params.get(parameter)?.window.toArray() ?? [];
  }

  get size(): number {
    return this.params.size;
  }
}
