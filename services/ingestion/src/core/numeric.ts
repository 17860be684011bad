const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses a raw field value as a finite decimal number. Returns undefined for
 * anything else (empty, hex, NaN, infinities, trailing garbage).
 */
export function parseReading(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}
