import { context, trace } from "@opentelemetry/api";
import type { LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Logger with multi-transport support, level filtering, and child logger creation.
 * A logger without transports drops every entry.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'debug' });
 * logger.addTransport(new ConsoleTransport());
 *
 * const cacheLogger = logger.child({ cache: 'sessions' });
 * cacheLogger.debug('cache entry evicted', { key: 'user:42' });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  /**
   * Finest-grained entries, below debug.
   */
  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  /**
   * Diagnostic entries; the cache reports evictions, expirations and producer timings here.
   */
  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  /**
   * Something went wrong but the caller still got an answer, such as an `Err` result.
   */
  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  /**
   * Highest severity.
   */
  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  /**
   * Start a timer; `end()` logs the elapsed time at debug with `{ label, durationMs }`.
   */
  time(label: string): TimerResult {
    const start = performance.now();
    let duration = 0;

    return {
      get duration() {
        return duration;
      },
      end: (message?: string) => {
        duration = performance.now() - start;
        this.log("debug", message ?? `${label} completed`, { label, durationMs: duration });
      },
      stop: () => {
        duration = performance.now() - start;
        return duration;
      },
    };
  }

  /**
   * Wait for every transport that buffers to write out its entries.
   */
  async flush(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.flush?.()));
  }

  /**
   * Release transport resources. The logger keeps its transports afterwards.
   */
  dispose(): void {
    for (const transport of this.transports) {
      transport.dispose?.();
    }
  }

  /**
   * Attach a destination. Children created earlier share the same list and see it too.
   */
  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Whether an entry at `level` would reach any transport.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.transports.length > 0 && LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  /**
   * Create a child logger with merged context.
   * The child shares the parent's transport list and starts at the parent's level.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  /**
   * Build the entry once and hand it to every transport.
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
      ...this.getTraceContext(),
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }

  /**
   * Extract trace context from the active OpenTelemetry span.
   */
  private getTraceContext(): { traceId?: string; spanId?: string } {
    const span = trace.getSpan(context.active());
    if (span) {
      const ctx = span.spanContext();
      return { traceId: ctx.traceId, spanId: ctx.spanId };
    }
    return {};
  }
}
