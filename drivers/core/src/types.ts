export interface TransportConfig {
  /** Device path or other endpoint identifier; opaque to the pipeline. */
  endpoint: string;
  /** Line rate in baud; forwarded to the transport, never interpreted by parsing. */
  baudRate: number;
  connection: Record<string, unknown>;
}

/**
 * Line-oriented source of raw device output.
 *
 * `readLine` resolves with one line (without its terminator) or with an empty
 * string when nothing arrived within `timeoutMs`. Terminal conditions reject
 * with a {@link TransportError}.
 */
export interface LineTransport {
  connect(): Promise<void>;
  readLine(timeoutMs: number): Promise<string>;
  close(): Promise<void>;
  getStatus?(): unknown;
}

export type TransportFactory = (cfg: TransportConfig) => LineTransport;

/** `ENDED`: the source has no more data. `FAILED`: the device or link broke. */
export type TransportErrorCode = "ENDED" | "FAILED";

export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(
    message: string,
    readonly endpoint: string,
    options: { code?: TransportErrorCode; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.code = options.code ?? "FAILED";
  }
}
