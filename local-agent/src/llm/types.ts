/**
 * LLM Type Definitions
 *
 * Provider-agnostic message and client types. Runtime values (base URLs,
 * default models) live in ./providers.ts.
 */

export type LLMProvider = "openai" | "xai" | "deepseek" | "local";

export type LLMRole = "system" | "user" | "assistant";

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface LLMRequestOptions {
  model?: string;
  /** Omitted from the request when unset; some reasoning models reject it */
  temperature?: number;
  maxTokens?: number;
  /** Request timeout in ms (default: 120000) */
  timeoutMs?: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: LLMProvider;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMProviderConfig {
  provider: LLMProvider;
  /** Human-readable name used in error messages */
  label: string;
  baseUrl: string;
  defaultModel: string;
  /** Env var holding the API key; absent for keyless local servers */
  apiKeyEnv?: string;
}

/**
 * The one call the chat session makes. A single request, a single text reply;
 * failures reject.
 */
export interface ILLMClient {
  provider: LLMProvider;
  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}

export interface LLMClientOptions {
  provider: LLMProvider;
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
}
