/**
 * @windlog/metrics - Ingestion Metrics
 *
 * Counters and gauges for the line ingestion pipeline.
 */

import { Counter, Gauge, register, Registry } from 'prom-client';

export interface IngestionMetricsConfig {
  /** Custom registry (optional, defaults to global registry) */
  registry?: Registry;
  /** Prefix for all metric names (optional) */
  prefix?: string;
}

export class IngestionMetrics {
  readonly linesReceived: Counter;
  readonly recordsWritten: Counter;
  readonly nonNumericFields: Counter;
  readonly checkpointRows: Counter;
  readonly schemaColumns: Gauge;
  readonly parametersTracked: Gauge;

  constructor(config: IngestionMetricsConfig = {}) {
    const registry = config.registry || register;
    const prefix = config.prefix || 'windlog';

    this.linesReceived = new Counter({
      name: `${prefix}_lines_received_total`,
      help: 'Non-empty lines read from the transport',
      registers: [registry],
    });

    this.recordsWritten = new Counter({
      name: `${prefix}_records_written_total`,
      help: 'Rows appended to the data log',
      registers: [registry],
    });

    // Fields that were logged but could not be read as numbers
    this.nonNumericFields = new Counter({
      name: `${prefix}_non_numeric_fields_total`,
      help: 'Fields excluded from statistics because they are not numeric',
      registers: [registry],
    });

    this.checkpointRows = new Counter({
      name: `${prefix}_checkpoint_rows_total`,
      help: 'Rows appended to the statistics log',
      registers: [registry],
    });

    this.schemaColumns = new Gauge({
      name: `${prefix}_schema_columns`,
      help: 'Columns currently known to the data log schema, timestamp included',
      registers: [registry],
    });

    this.parametersTracked = new Gauge({
      name: `${prefix}_parameters_tracked`,
      help: 'Parameters with running statistics',
      registers: [registry],
    });
  }
}
