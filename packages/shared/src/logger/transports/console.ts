import type { LogEntry, LogLevel, LogTransport } from "../types.js";
import { LOG_LEVEL_COLORS } from "../types.js";

const RESET = "\x1b[0m";

const STDERR_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>(["error", "fatal"]);

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
}

/**
 * Colors are off when NO_COLOR or CI is set, or stdout is not a TTY.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

/**
 * ISO timestamp without milliseconds, `T` replaced by a space.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Human-readable transport writing to stdout, or stderr for error and fatal.
 *
 * Output: `[2026-01-01 10:00:00] [INFO ] message {"key":"value"}`
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
  }

  log(entry: LogEntry): void {
    const timestamp = formatTimestamp(entry.timestamp);
    const level = entry.level.toUpperCase().padEnd(5);

    let output = this.useColors
      ? `[${timestamp}] ${LOG_LEVEL_COLORS[entry.level]}[${level}]${RESET} ${entry.message}`
      : `[${timestamp}] [${level}] ${entry.message}`;

    if (entry.data !== undefined) {
      const dataStr = typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data);
      output += ` ${dataStr}`;
    }

    if (STDERR_LEVELS.has(entry.level)) {
      console.error(output);
    } else {
      console.log(output);
    }
  }
}
