import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

export interface CreateLoggerOptions {
  /** Logger name, attached to every entry as `context.logger` */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Emit JSON lines instead of human-readable output (default: false) */
  json?: boolean;
  /** Enable colored console output (default: true outside production) */
  colors?: boolean;
}

/**
 * Factory function to create a Logger with the common transport setups.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'recency', level: 'debug' });
 * const prodLogger = createLogger({ name: 'recency', json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: options.name ? { logger: options.name } : undefined,
  });

  if (options.console ?? true) {
    if (options.json) {
      logger.addTransport(new JsonTransport());
    } else {
      logger.addTransport(
        new ConsoleTransport({
          colors: options.colors ?? process.env.NODE_ENV !== "production",
        })
      );
    }
  }

  return logger;
}
