import type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Level and transports, shared by a logger and every child derived from it.
 */
interface LoggerState {
  level: LogLevel;
  transports: LogTransport[];
}

/**
 * Leveled logger with pluggable transports.
 *
 * Children carry extra context but share their root's level and transports,
 * so `setLevel` or `addTransport` on the root reaches loggers that the store
 * and service created earlier.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "warn", transports: [new ConsoleTransport()] });
 * const storeLogger = logger.child({ component: "store" });
 *
 * logger.setLevel("debug");
 * storeLogger.debug("Loaded tasks", { count: 3 }); // written
 * ```
 */
export class Logger {
  private readonly state: LoggerState;
  private readonly context: Record<string, unknown>;

  /**
   * @param shared - @internal state of the parent when called from `child()`
   */
  constructor(options: LoggerOptions = {}, shared?: LoggerState) {
    this.state = shared ?? {
      level: options.level ?? "info",
      transports: [...(options.transports ?? [])],
    };
    this.context = options.context ?? {};
  }

  trace(message: string, data?: unknown): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.write("fatal", message, data);
  }

  /**
   * Whether an entry at `level` would currently be written.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.state.level];
  }

  /**
   * Run `task` and log how long it took at debug level, whether it resolves
   * or rejects. The outcome of `task` is passed through unchanged.
   */
  async measure<T>(label: string, task: () => Promise<T>): Promise<T> {
    const start = performance.now();
    const elapsed = (): number => Math.round((performance.now() - start) * 100) / 100;

    try {
      const result = await task();
      this.debug(`${label} finished`, { durationMs: elapsed() });
      return result;
    } catch (error) {
      this.debug(`${label} failed`, { durationMs: elapsed() });
      throw error;
    }
  }

  addTransport(transport: LogTransport): void {
    this.state.transports.push(transport);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  /**
   * Derive a logger whose entries carry `context` on top of this one's.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({ context: { ...this.context, ...context } }, this.state);
  }

  /**
   * Write out entries buffered by any transport.
   */
  async flush(): Promise<void> {
    await Promise.all(this.state.transports.map((transport) => transport.flush?.()));
  }

  dispose(): void {
    for (const transport of this.state.transports) {
      transport.dispose?.();
    }
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
    };

    for (const transport of this.state.transports) {
      transport.log(entry);
    }
  }
}
