/**
 * dirchat
 *
 * Chat with a model that has been briefed on the text files in the current
 * directory.
 *
 *   dirchat "explain main.tf"     one-shot
 *   dirchat                       interactive (/reload, /exit, /quit)
 */

import * as path from "path";
import { nanoid } from "nanoid";
import type { LogLevel } from "@dirchat/shared/logging";
import { initAgentLogging, createComponentLogger } from "./logging.js";
import { loadEnvFile, loadConfig, ConfigError, type AgentConfig } from "./core/config.js";
import { runOnce, runRepl } from "./core/cli.js";
import { createLLMClient } from "./llm/factory.js";
import { Session } from "./session/session.js";

async function startup(): Promise<number> {
  loadEnvFile();

  const args = process.argv.slice(2);
  const oneShot = args.length > 0;
  // One-shot keeps the console quiet so stdout carries only the reply
  const defaultLevel: LogLevel = oneShot ? "warn" : "info";
  const sessionId = nanoid(10);

  let config: AgentConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    const logger = initAgentLogging({ minLevel: defaultLevel, sessionId });
    if (error instanceof ConfigError) {
      logger.fatal("Invalid configuration", error, { key: error.key });
      await logger.close();
      return 1;
    }
    throw error;
  }

  const logger = initAgentLogging({
    minLevel: config.logLevel ?? defaultLevel,
    logDir: config.logDir,
    sessionId,
  });
  const log = createComponentLogger("main");

  // Only matters with a custom extension list: the stock entry points (.ts, .mjs) are not eligible
  const entryScript = process.argv[1] ? path.basename(process.argv[1]) : undefined;
  const session = new Session({
    id: sessionId,
    directory: path.resolve(process.cwd()),
    client: createLLMClient({
      provider: config.provider,
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      defaultModel: config.model,
    }),
    request: { model: config.model, timeoutMs: config.requestTimeoutMs },
    briefing: {
      maxFileChars: config.maxFileChars,
      excludeNames: new Set(entryScript ? [entryScript] : []),
    },
  });

  log.debug("Session started", { provider: config.provider, model: config.model, directory: session.directory });

  let exitCode = 0;
  try {
    // Seed the file context before the first prompt
    await session.reload();

    if (oneShot) {
      await runOnce(session, args, process.stdout);
    } else {
      await runRepl(session, { input: process.stdin, output: process.stdout }, log);
    }
  } catch (error) {
    log.error("Request failed", error);
    exitCode = 1;
  } finally {
    await logger.close();
  }
  return exitCode;
}

startup().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[dirchat] Fatal:", error);
    process.exitCode = 1;
  }
);
