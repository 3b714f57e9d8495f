/**
 * Logging Types
 *
 * Shared by every workspace. Entries are structured so the same record can be
 * printed to a terminal or appended to a JSON-lines file.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Dotted component path, e.g. "agent.context.briefing" */
  component: string;
  message: string;
  /** Structured payload, already redacted */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  /** Id of the turn that produced the entry */
  correlationId?: string;
  /** Id of the chat session (one per process) */
  sessionId?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  /** Entries below this level are not handed to the transport */
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush buffered entries (called on shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LogContext {
  component?: string;
  correlationId?: string;
  sessionId?: string;
}

export interface LoggerConfig {
  /** Entries below this level are dropped before any transport sees them */
  minLevel: LogLevel;
  component: string;
  defaultContext?: Omit<LogContext, "component">;
  transports: LogTransport[];
  /** Keys in `data` matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a logger that shares transports but carries extra context */
  child(context: LogContext): ILogger;

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /credential/i,
];
