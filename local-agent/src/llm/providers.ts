/**
 * Provider Definitions
 *
 * Every provider here speaks the OpenAI chat completions API.
 */

import type { LLMProvider, LLMProviderConfig } from "./types.js";

export const PROVIDER_CONFIGS: Record<LLMProvider, LLMProviderConfig> = {
  openai: {
    provider: "openai",
    label: "OpenAI",
    baseUrl: "https://api.openai.com/v1",
    defaultModel: "gpt-5",
    apiKeyEnv: "OPENAI_API_KEY",
  },
  xai: {
    provider: "xai",
    label: "xAI",
    baseUrl: "https://api.x.ai/v1",
    defaultModel: "grok-4",
    apiKeyEnv: "XAI_API_KEY",
  },
  deepseek: {
    provider: "deepseek",
    label: "DeepSeek",
    baseUrl: "https://api.deepseek.com/v1",
    defaultModel: "deepseek-chat",
    apiKeyEnv: "DEEPSEEK_API_KEY",
  },
  // LM Studio, vLLM, llama.cpp server, ...
  local: {
    provider: "local",
    label: "Local server",
    baseUrl: "http://localhost:1234/v1",
    defaultModel: "local-model",
  },
};

/** Order in which providers are picked when none is configured explicitly */
export const PROVIDER_PREFERENCE: LLMProvider[] = ["openai", "xai", "deepseek"];

export function isLLMProvider(value: string): value is LLMProvider {
  return Object.prototype.hasOwnProperty.call(PROVIDER_CONFIGS, value);
}
