/**
 * Logging Setup for the Agent
 *
 * Initializes the shared logger with a console transport and, when a log
 * directory is configured, a file transport.
 */

import {
  initLogger,
  getLogger,
  hasLogger,
  Logger,
  ILogger,
  ConsoleTransport,
  FileTransport,
  LogLevel,
  LogTransport
} from "@dirchat/shared/logging";

export interface LoggingOptions {
  /** Console level (default: "info") */
  minLevel?: LogLevel;
  /** Write JSON-lines logs here as well (default: no file logging) */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
  sessionId?: string;
}

/**
 * Initialize the process-wide logger. Safe to call again; the latest call wins.
 */
export function initAgentLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel || "info";
  const transports: LogTransport[] = [
    new ConsoleTransport({ minLevel, colors: options.colors })
  ];

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir,
      filename: "dirchat"
    }));
  }

  // The file transport wants debug even when the console is quieter
  const loggerLevel: LogLevel = options.logDir && minLevel !== "trace" ? "debug" : minLevel;

  return initLogger({
    minLevel: loggerLevel,
    component: "agent",
    transports,
    defaultContext: options.sessionId ? { sessionId: options.sessionId } : undefined
  });
}

/**
 * Namespaced logger for a component, e.g. createComponentLogger("context")
 * logs as [agent.context]. Before initialization (tests, library use) a
 * silent logger is returned instead of throwing.
 */
export function createComponentLogger(component: string): ILogger {
  if (!hasLogger()) {
    return new Logger({ minLevel: "silent", component: `agent.${component}`, transports: [] });
  }
  return getLogger().child({ component: `agent.${component}` });
}
