export const TIMESTAMP_COLUMN = "timestamp";

/**
 * Append-only column list for the data log. Columns keep their first-seen
 * position for the whole session.
 */
export class SchemaRegistry {
  private readonly columns: string[] = [TIMESTAMP_COLUMN];
  private readonly known = new Set<string>(this.columns);

  /** Appends names not seen before; returns whether the schema grew. */
  observe(fields: ReadonlyMap<string, string>): boolean {
    let grew = false;
    for (const name of fields.keys()) {
      if (this.known.has(name)) continue;
      this.known.add(name);
      this.columns.push(name);
      grew = true;
    }
    return grew;
  }

  header(): readonly string[] {
    return [...this.columns];
  }

  get size(): number {
    return this.columns.length;
  }

  has(name: string): boolean {
    return this.known.has(name);
  }
}

