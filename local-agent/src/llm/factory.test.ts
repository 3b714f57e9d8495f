/**
 * LLM Client Factory Tests
 */

import { describe, it, expect } from "vitest";
import { createLLMClient } from "./factory.js";
import { OpenAICompatibleClient } from "./openai-compatible/index.js";

describe("createLLMClient", () => {
  it("creates an OpenAI client with an API key", () => {
    const client = createLLMClient({ provider: "openai", apiKey: "test-key" });
    expect(client).toBeInstanceOf(OpenAICompatibleClient);
    expect(client.provider).toBe("openai");
  });

  it("creates xAI and DeepSeek clients with API keys", () => {
    expect(createLLMClient({ provider: "xai", apiKey: "test-key" }).provider).toBe("xai");
    expect(createLLMClient({ provider: "deepseek", apiKey: "test-key" }).provider).toBe("deepseek");
  });

  it("creates a local client without an API key", () => {
    const client = createLLMClient({ provider: "local" });
    expect(client).toBeInstanceOf(OpenAICompatibleClient);
    expect(client.provider).toBe("local");
  });

  it("throws for keyed providers without an API key", () => {
    expect(() => createLLMClient({ provider: "openai" })).toThrow("OpenAI requires an API key (set OPENAI_API_KEY)");
    expect(() => createLLMClient({ provider: "xai" })).toThrow("xAI requires an API key (set XAI_API_KEY)");
    expect(() => createLLMClient({ provider: "deepseek" })).toThrow("DeepSeek requires an API key (set DEEPSEEK_API_KEY)");
  });
});
