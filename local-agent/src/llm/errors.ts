import type { LLMProvider } from "./types.js";

/**
 * A chat completions request came back non-2xx or with a body we can't use.
 * `status` is 0 when the HTTP exchange succeeded but the body was malformed.
 */
export class LLMRequestError extends Error {
  public provider: LLMProvider;
  public status: number;

  constructor(provider: LLMProvider, status: number, detail: string) {
    super(`${provider} API error: ${status === 0 ? "malformed response" : status} ${detail}`.trimEnd());
    this.name = "LLMRequestError";
    this.provider = provider;
    this.status = status;
  }
}
