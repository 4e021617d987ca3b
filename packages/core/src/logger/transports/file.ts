import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import type { LogEntry, LogTransport } from "../types.js";

export interface FileTransportOptions {
  /** Log file; parent directories are created on first write */
  path: string;
  /** Write early once this many entries are waiting (default: 50) */
  maxBufferSize?: number;
  /** Called with the failure when the file cannot be written */
  onError?: (error: Error) => void;
}

/**
 * One JSON object per line, with context fields inlined:
 * `{"time":"…","level":"debug","msg":"Saved tasks","logger":"taskline","component":"store","data":{…}}`
 */
function toJsonLine(entry: LogEntry): string {
  const record: Record<string, unknown> = {
    time: entry.timestamp.toISOString(),
    level: entry.level,
    msg: entry.message,
    ...entry.context,
  };
  if (entry.data !== undefined) {
    record.data =
      entry.data instanceof Error
        ? { name: entry.data.name, message: entry.data.message }
        : entry.data;
  }
  return JSON.stringify(record);
}

/**
 * Appends entries to a log file as JSON Lines.
 *
 * A CLI run is short, so entries are held in memory and written when the
 * buffer fills or when `flush()` is called on the way out.
 *
 * @example
 * ```typescript
 * logger.addTransport(new FileTransport({ path: join(homedir(), ".taskline", "taskline.log") }));
 * // ...
 * await logger.flush();
 * ```
 */
export class FileTransport implements LogTransport {
  private readonly path: string;
  private readonly maxBufferSize: number;
  private readonly onError?: (error: Error) => void;
  private pending: string[] = [];
  private writing: Promise<void> | null = null;
  private directoryReady = false;
  private closed = false;

  constructor(options: FileTransportOptions) {
    this.path = options.path;
    this.maxBufferSize = options.maxBufferSize ?? 50;
    this.onError = options.onError;
  }

  log(entry: LogEntry): void {
    if (this.closed) return;

    this.pending.push(toJsonLine(entry));
    if (this.pending.length >= this.maxBufferSize) {
      void this.flush();
    }
  }

  /**
   * Write everything buffered. Calls made while a write is in flight wait
   * for it and then write whatever arrived in the meantime.
   */
  async flush(): Promise<void> {
    while (this.writing) {
      await this.writing;
    }
    if (this.pending.length === 0) return;

    this.writing = this.writePending().finally(() => {
      this.writing = null;
    });
    await this.writing;
  }

  /**
   * Stop accepting entries. Anything still buffered goes out with the next `flush()`.
   */
  dispose(): void {
    this.closed = true;
  }

  private async writePending(): Promise<void> {
    const lines = this.pending;
    this.pending = [];

    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.path), { recursive: true });
        this.directoryReady = true;
      }
      await appendFile(this.path, `${lines.join("\n")}\n`, "utf-8");
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.onError?.(failure);
      // keep them for the next attempt
      this.pending = [...lines, ...this.pending];
    }
  }
}
