import type { LogEntry, LogTransport } from "../types.js";
import { LOG_LEVEL_COLORS } from "../types.js";

const RESET = "\x1b[0m";

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detected from NO_COLOR, CI and the TTY when omitted. */
  colors?: boolean;
  /** Receives each formatted line without a newline (default: writes to stderr) */
  write?: (line: string) => void;
}

function detectColors(): boolean {
  if (process.env.NO_COLOR !== undefined || process.env.CI) {
    return false;
  }
  return process.stderr.isTTY === true;
}

function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

function formatData(data: unknown): string {
  if (typeof data === "string") return data;
  if (data instanceof Error) return data.stack ?? data.message;
  return JSON.stringify(data);
}

/**
 * Human-readable diagnostics on stderr, kept apart from the task table on
 * stdout.
 *
 * Lines look like `09:30:00 DEBUG store: Loaded tasks {"count":3}`; the
 * `store:` part is the `component` of the logger that wrote the entry.
 */
export class ConsoleTransport implements LogTransport {
  private readonly colors: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.colors = options.colors ?? detectColors();
    this.write = options.write ?? writeToStderr;
  }

  log(entry: LogEntry): void {
    const time = entry.timestamp.toISOString().slice(11, 19);
    const label = entry.level.toUpperCase().padEnd(5);
    const level = this.colors ? `${LOG_LEVEL_COLORS[entry.level]}${label}${RESET}` : label;
    const component = entry.context?.component;
    const scope = typeof component === "string" ? `${component}: ` : "";
    const data = entry.data === undefined ? "" : ` ${formatData(entry.data)}`;

    this.write(`${time} ${level} ${scope}${entry.message}${data}`);
  }
}
