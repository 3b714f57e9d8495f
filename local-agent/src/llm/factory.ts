/**
 * LLM Client Factory
 *
 * To add a provider: add it to LLMProvider in ./types.ts and to
 * PROVIDER_CONFIGS in ./providers.ts. Anything that speaks chat completions
 * needs no new client class.
 */

import type { ILLMClient, LLMClientOptions } from "./types.js";
import { PROVIDER_CONFIGS } from "./providers.js";
import { OpenAICompatibleClient } from "./openai-compatible/index.js";

/**
 * Create an LLM client for the given provider. Throws when a provider that
 * needs a key doesn't get one.
 */
export function createLLMClient(options: LLMClientOptions): ILLMClient {
  const { provider, apiKey, baseUrl, defaultModel } = options;
  const config = PROVIDER_CONFIGS[provider];
  if (!config) {
    throw new Error(`Unknown provider: "${provider}". Valid providers: ${Object.keys(PROVIDER_CONFIGS).join(", ")}`);
  }

  if (config.apiKeyEnv && !apiKey) {
    throw new Error(`${config.label} requires an API key (set ${config.apiKeyEnv})`);
  }

  return new OpenAICompatibleClient(
    provider,
    apiKey ?? "",
    baseUrl || config.baseUrl,
    defaultModel || config.defaultModel
  );
}
