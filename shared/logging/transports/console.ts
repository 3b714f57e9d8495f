/**
 * Console Transport
 *
 * One line per entry, colored on a TTY. Writes to stderr by default so that
 * anything the program prints to stdout stays clean.
 */

import { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// COLOR CODES
// ============================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.bgRed + COLORS.white,
  silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
  silent: "   ",
};

// ============================================
// CONSOLE TRANSPORT
// ============================================

export interface ConsoleOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Use colors (default: true when the output is a TTY) */
  colors?: boolean;
  /** Show HH:MM:SS timestamps (default: true) */
  timestamps?: boolean;
  /** Show component name (default: true) */
  showComponent?: boolean;
  /** Where lines go (default: process.stderr) */
  output?: ConsoleOutput;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private timestamps: boolean;
  private showComponent: boolean;
  private output: ConsoleOutput;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel || "info";
    this.output = options.output ?? process.stderr;
    this.colors = options.colors ?? this.output.isTTY === true;
    this.timestamps = options.timestamps ?? true;
    this.showComponent = options.showComponent ?? true;
  }

  log(entry: LogEntry): void {
    this.output.write(this.format(entry) + "\n");
  }

  format(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.timestamps) {
      // HH:MM:SS
      parts.push(this.colorize(entry.timestamp.slice(11, 19), COLORS.dim));
    }

    parts.push(this.colorize(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]));

    if (this.showComponent) {
      parts.push(this.colorize(`[${entry.component}]`, COLORS.magenta));
    }

    if (entry.correlationId) {
      parts.push(this.colorize(`(${entry.correlationId.slice(0, 8)})`, COLORS.dim));
    }

    parts.push(entry.message);

    let output = parts.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      output += this.colorize(" " + JSON.stringify(entry.data), COLORS.dim);
    }

    if (entry.error) {
      output += "\n" + this.colorize(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
      if (entry.error.stack && (entry.level === "fatal" || this.minLevel === "debug" || this.minLevel === "trace")) {
        output += "\n" + this.colorize(entry.error.stack, COLORS.dim);
      }
    }

    return output;
  }

  private colorize(text: string, color: string): string {
    if (!this.colors) return text;
    return `${color}${text}${COLORS.reset}`;
  }
}
