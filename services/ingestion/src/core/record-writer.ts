import type { FastifyBaseLogger } from "fastify";
import type { HeaderMode, TelemetryRecord } from "@windlog/schemas";
import type { OutputSink } from "./output";
import { TIMESTAMP_COLUMN, type SchemaRegistry } from "./schema-registry";

interface RecordWriterDeps {
  sink: OutputSink;
  registry: SchemaRegistry;
  headerMode?: HeaderMode;
  logger?: FastifyBaseLogger;
}

/**
 * Writes one CSV row per record against the registry's current columns.
 *
 * In `append` mode (the default) the header is written once, from the schema as it
 * stands at the first write. Columns discovered later still get values in every
 * subsequent row, so those rows are wider than the header; downstream readers of
 * this format depend on that layout. `strict` mode instead writes a new header line
 * whenever the schema has grown since the last one.
 */
export class RecordWriter {
  private headerWidth = 0;
  private reportedWidth = 0;
  private headersWritten = 0;
  private rowsWritten = 0;
  private readonly headerMode: HeaderMode;

  constructor(private readonly deps: RecordWriterDeps) {
    this.headerMode = deps.headerMode ?? "append";
  }

  write(record: TelemetryRecord): void {
    const columns = this.deps.registry.header();
    if (this.headersWritten === 0) {
      this.writeHeader(columns);
    } else if (columns.length > this.headerWidth) {
      if (this.headerMode === "strict") {
        this.writeHeader(columns);
      } else if (columns.length > this.reportedWidth) {
        this.reportedWidth = columns.length;
        this.deps.logger?.debug(
          { headerWidth: this.headerWidth, rowWidth: columns.length },
          "data log: schema grew after header; row is wider than header"
        );
      }
    }

    const values = columns.map((column) =>
      column === TIMESTAMP_COLUMN ? record.ts : record.fields.get(column) ?? ""
    );
    this.deps.sink.writeLine(values.join(","));
    this.rowsWritten += 1;
  }

  get rows(): number {
    return this.rowsWritten;
  }

  get headers(): number {
    return this.headersWritten;
  }

  private writeHeader(columns: readonly string[]): void {
    this.deps.sink.writeLine(columns.join(","));
    this.headerWidth = columns.length;
    this.reportedWidth = columns.length;
    this.headersWritten += 1;
  }
}
