/**
 * Structured Logging
 *
 * ```typescript
 * import { initLogger, ConsoleTransport } from "@dirchat/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "info",
 *   component: "agent",
 *   transports: [new ConsoleTransport()]
 * });
 *
 * const turnLog = logger.child({ component: "agent.session", correlationId: turnId });
 * turnLog.info("Turn complete", { entries: 5 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  initLogger,
  getLogger,
  hasLogger
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type ConsoleOutput,
  type FileTransportOptions
} from "./transports/index.js";
