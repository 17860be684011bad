import fs from "node:fs";
import { dirname } from "node:path";

/** Line-oriented destination for log rows. Writes are synchronous so a row is on disk before the next cycle. */
export interface OutputSink {
  readonly path: string | null;
  writeLine(line: string): void;
  close(): Promise<void>;
}

export class OutputError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "OutputError";
  }
}

export class FileSink implements OutputSink {
  private fd: number | null;
  private bytesWritten = 0;

  constructor(readonly path: string) {
    try {
      fs.mkdirSync(dirname(path), { recursive: true });
      this.fd = fs.openSync(path, "w");
    } catch (error) {
      throw new OutputError(`Failed to open ${path}`, path, { cause: error });
    }
  }

  get bytes(): number {
    return this.bytesWritten;
  }

  writeLine(line: string): void {
    if (this.fd === null) {
      throw new OutputError(`Write after close: ${this.path}`, this.path);
    }
    try {
      this.bytesWritten += fs.writeSync(this.fd, `${line}\n`, null, "utf-8");
    } catch (error) {
      throw new OutputError(`Failed to write ${this.path}`, this.path, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (error) {
      throw new OutputError(`Failed to close ${this.path}`, this.path, { cause: error });
    }
  }
}

