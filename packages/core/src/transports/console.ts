/**
 * @vouch/core - Console Transport
 *
 * Default log transport. Pretty, colored lines in development; one JSON
 * object per line otherwise, ready for a log shipper.
 */

import { isDevelopment } from "../env.js";
import type { LogEntry, LogLevelName } from "../logger.js";
import type { LogTransport } from "./types.js";

/**
 * Console transport options
 */
export interface ConsoleTransportOptions {
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Enable ANSI colors in pretty mode (default: when stdout is a TTY) */
  colors?: boolean;
  /**
   * Line sink. Defaults to console.log / console.error by severity.
   * Receives the formatted line without a trailing newline.
   */
  write?: (line: string, level: LogLevelName) => void;
}

const LEVEL_COLORS: Record<LogLevelName, string> = {
  TRACE: "\x1b[90m", // Gray
  DEBUG: "\x1b[36m", // Cyan
  INFO: "\x1b[32m", // Green
  WARN: "\x1b[33m", // Yellow
  ERROR: "\x1b[31m", // Red
  FATAL: "\x1b[35m", // Magenta
  SILENT: "",
};

const RESET = "\x1b[0m";

function defaultWrite(line: string, level: LogLevelName): void {
  if (level === "ERROR" || level === "FATAL") {
    console.error(line);
  } else if (level === "WARN") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/**
 * Console transport
 */
export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private pretty: boolean;
  private colors: boolean;
  private write: (line: string, level: LogLevelName) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.write = options.write ?? defaultWrite;
  }

  log(entry: LogEntry): void {
    this.write(this.pretty ? this.formatPretty(entry) : this.formatJson(entry), entry.level);
  }

  private formatJson(entry: LogEntry): string {
    const { level, message, timestamp, context, error } = entry;

    const output: Record<string, unknown> = {
      level,
      time: timestamp,
      msg: message,
    };

    if (context && Object.keys(context).length > 0) {
      Object.assign(output, context);
    }

    if (error) {
      output["err"] = error;
    }

    return JSON.stringify(output);
  }

  private formatPretty(entry: LogEntry): string {
    const { level, message, timestamp, context, error } = entry;

    const color = this.colors ? LEVEL_COLORS[level] : "";
    const resetCode = this.colors ? RESET : "";

    // HH:MM:SS from the ISO timestamp
    const timePart = timestamp.split("T")[1];
    const time = timePart ? timePart.slice(0, 8) : timestamp;

    let output = `${color}[${time}] ${level.padEnd(5)}${resetCode} ${message}`;

    if (context && Object.keys(context).length > 0) {
      output += ` ${JSON.stringify(context)}`;
    }

    if (error) {
      output += `\n${error.stack ?? `${error.name}: ${error.message}`}`;
      if (error.cause) {
        output += `\n  caused by ${error.cause.name}: ${error.cause.message}`;
      }
    }

    return output;
  }
}
