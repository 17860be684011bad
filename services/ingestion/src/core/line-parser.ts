export type ParsedFields = ReadonlyMap<string, string>;

/**
 * Extracts tag/value pairs from one line of device output.
 *
 * Comma-separated lines are read as `name value` segments; anything else is read
 * as alternating whitespace-separated tokens. Malformed pieces are dropped, so the
 * result may be empty but parsing never throws.
 */
export function parseLine(line: string): ParsedFields {
  const trimmed = line.trim();
  const fields = new Map<string, string>();
  if (!trimmed) return fields;

  if (trimmed.includes(",")) {
    for (const segment of trimmed.split(",")) {
      const pair = segment.trim();
      const space = pair.indexOf(" ");
      if (space < 0) continue;
      const name = pair.slice(0, space).trim();
      const value = pair.slice(space + 1).trim();
      if (name && value) {
        fields.set(name, value);
      }
    }
    return fields;
  }

  const tokens = trimmed.split(/\s+/);
  for (let i = 0; i + 1 < tokens.length; i += 2) {
    fields.set(tokens[i], tokens[i + 1]);
  }
  return fields;
}
