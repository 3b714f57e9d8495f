/**
 * Configuration
 *
 * `.env` loading plus a pure parser from an env record to AgentConfig.
 * Nothing here reads process.env except loadEnvFile().
 */

import { config as loadDotenv } from "dotenv";
import * as os from "os";
import * as path from "path";
import { isLogLevel, type LogLevel } from "@dirchat/shared/logging";
import type { LLMProvider } from "../llm/types.js";
import { PROVIDER_CONFIGS, PROVIDER_PREFERENCE, isLLMProvider } from "../llm/providers.js";
import { DEFAULT_MAX_FILE_CHARS } from "../context/briefing.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../llm/openai-compatible/index.js";

export const ENV_PATH = path.join(os.homedir(), ".dirchat", ".env");

export class ConfigError extends Error {
  public key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

export interface AgentConfig {
  provider: LLMProvider;
  apiKey?: string;
  baseUrl: string;
  model: string;
  maxFileChars: number;
  requestTimeoutMs: number;
  logLevel?: LogLevel;
  logDir?: string;
}

export type EnvRecord = Record<string, string | undefined>;

/**
 * Load ~/.dirchat/.env into process.env. Variables already set win.
 * A missing file is not an error.
 */
export function loadEnvFile(envPath: string = ENV_PATH): void {
  loadDotenv({ path: envPath });
}

function readPositiveInt(env: EnvRecord, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(key, `expected a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function resolveProvider(env: EnvRecord): LLMProvider {
  const explicit = env.DIRCHAT_PROVIDER?.trim().toLowerCase();
  if (explicit) {
    if (!isLLMProvider(explicit)) {
      throw new ConfigError("DIRCHAT_PROVIDER", `unknown provider "${explicit}" (valid: ${Object.keys(PROVIDER_CONFIGS).join(", ")})`);
    }
    return explicit;
  }

  // First provider with a key wins
  for (const provider of PROVIDER_PREFERENCE) {
    const keyEnv = PROVIDER_CONFIGS[provider].apiKeyEnv;
    if (keyEnv && env[keyEnv]) return provider;
  }
  return "openai";
}

export function loadConfig(env: EnvRecord): AgentConfig {
  const provider = resolveProvider(env);
  const providerConfig = PROVIDER_CONFIGS[provider];
  const apiKey = providerConfig.apiKeyEnv ? env[providerConfig.apiKeyEnv] || undefined : undefined;

  if (providerConfig.apiKeyEnv && !apiKey) {
    throw new ConfigError(providerConfig.apiKeyEnv, `${providerConfig.label} requires an API key`);
  }

  const rawLevel = env.DIRCHAT_LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel && !isLogLevel(rawLevel)) {
    throw new ConfigError("DIRCHAT_LOG_LEVEL", `unknown level "${rawLevel}"`);
  }

  return {
    provider,
    apiKey,
    baseUrl: env.DIRCHAT_BASE_URL?.trim() || providerConfig.baseUrl,
    model: env.DIRCHAT_MODEL?.trim() || providerConfig.defaultModel,
    maxFileChars: readPositiveInt(env, "DIRCHAT_MAX_FILE_CHARS", DEFAULT_MAX_FILE_CHARS),
    requestTimeoutMs: readPositiveInt(env, "DIRCHAT_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
    logLevel: rawLevel && isLogLevel(rawLevel) ? rawLevel : undefined,
    logDir: env.DIRCHAT_LOG_DIR?.trim() || undefined,
  };
}
