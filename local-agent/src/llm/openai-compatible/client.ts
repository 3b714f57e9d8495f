/**
 * OpenAI-Compatible LLM Client
 *
 * Works with any provider that implements the chat completions API:
 * OpenAI, xAI, DeepSeek, LM Studio, vLLM, etc. No streaming; one request,
 * one reply.
 */

import type {
  ILLMClient,
  LLMMessage,
  LLMRequestOptions,
  LLMResponse,
  LLMProvider,
} from "../types.js";
import { LLMRequestError } from "../errors.js";
import { formatMessagesForAPI, parseCompletion, type ChatCompletionRequest } from "./format.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export class OpenAICompatibleClient implements ILLMClient {
  provider: LLMProvider;
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;

  constructor(
    provider: LLMProvider,
    apiKey: string,
    baseUrl: string,
    defaultModel: string
  ) {
    this.provider = provider;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.defaultModel = defaultModel;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;

    const headers: Record<string, string> = {
      "Content-Type": "application/json"
    };

    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const body: ChatCompletionRequest = {
      model,
      messages: formatMessagesForAPI(messages),
      stream: false,
    };

    if (options?.temperature !== undefined) {
      body.temperature = options.temperature;
    }
    if (options?.maxTokens !== undefined) {
      body.max_tokens = options.maxTokens;
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new LLMRequestError(this.provider, response.status, await response.text());
    }

    const parsed = parseCompletion(await response.json());
    if (!parsed) {
      throw new LLMRequestError(this.provider, 0, "(no choices in response)");
    }

    return {
      content: parsed.content,
      model,
      provider: this.provider,
      usage: {
        inputTokens: parsed.inputTokens,
        outputTokens: parsed.outputTokens,
      },
    };
  }
}
