import { serializeData } from "../serialize.js";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * ANSI color codes for terminal output.
 */
const COLORS = {
  reset: "\x1b[0m",
  gray: "\x1b[90m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
} as const;

/**
 * Color mapping for each log level.
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Line writers (default: console.log / console.error) */
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when:
 * - stdout is not a TTY
 * - CI environment variable is set
 * - NO_COLOR environment variable is set
 */
function shouldEnableColors(): boolean {
  // Check NO_COLOR (standard: https://no-color.org/)
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  if (process.env.CI) {
    return false;
  }

  return process.stdout.isTTY === true;
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Console transport with color support.
 * Outputs one formatted line per entry; error and fatal go to stderr.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: true });
 * logger.addTransport(transport);
 * // [2025-12-26 10:00:00] [INFO ] store connected {"url":"redis://127.0.0.1:6379"}
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  log(entry: LogEntry): void {
    const timestamp = formatTimestamp(entry.timestamp);
    const level = entry.level.toUpperCase().padEnd(5);

    let output = this.useColors
      ? `[${timestamp}] ${LEVEL_COLORS[entry.level]}[${level}]${COLORS.reset} ${entry.message}`
      : `[${timestamp}] [${level}] ${entry.message}`;

    if (entry.data !== undefined) {
      const data = serializeData(entry.data);
      output += ` ${typeof data === "string" ? data : JSON.stringify(data)}`;
    }

    if (entry.level === "error" || entry.level === "fatal") {
      this.stderr(output);
    } else {
      this.stdout(output);
    }
  }
}
