/**
 * OpenAI-Compatible Format Helpers
 *
 * Converts between our message shape and the chat completions wire format.
 */

import type { LLMMessage } from "../types.js";

export interface ChatCompletionMessage {
  role: string;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatCompletionMessage[];
  stream: false;
  temperature?: number;
  max_tokens?: number;
}

export interface ParsedCompletion {
  content: string;
  inputTokens: number;
  outputTokens: number;
}

export function formatMessagesForAPI(messages: LLMMessage[]): ChatCompletionMessage[] {
  return messages.map(m => ({ role: m.role, content: m.content }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function tokenCount(usage: Record<string, unknown>, key: string): number {
  const value = usage[key];
  return typeof value === "number" ? value : 0;
}

/**
 * Pull the assistant text out of a chat completions body.
 * Returns null when the body has no first choice with a message.
 * A null `content` (e.g. a refusal with no text) becomes "".
 */
export function parseCompletion(data: unknown): ParsedCompletion | null {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) {
    return null;
  }

  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return null;
  }

  const content = choice.message.content;
  const usage = isRecord(data.usage) ? data.usage : {};

  return {
    content: typeof content === "string" ? content : "",
    inputTokens: tokenCount(usage, "prompt_tokens"),
    outputTokens: tokenCount(usage, "completion_tokens"),
  };
}
