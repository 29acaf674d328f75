import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel, LogTransport } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'cachet') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** If true, output JSON format to console (default: false) */
  json?: boolean;
  /** Enable colored console output (default: true in non-production) */
  colors?: boolean;
  /** Extra transports appended after the console one */
  transports?: LogTransport[];
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * // Human-readable output for local development
 * const logger = createLogger({ level: 'debug' });
 *
 * // JSON lines for production log shipping
 * const logger = createLogger({ level: 'info', json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "cachet" },
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

  for (const transport of options.transports ?? []) {
    logger.addTransport(transport);
  }

  return logger;
}

/**
 * A logger with no transports, for callers that pass none.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: "fatal" });
}
