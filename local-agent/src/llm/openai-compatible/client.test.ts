/**
 * OpenAI-Compatible Client Tests
 *
 * Covers request shape, auth header, response parsing and error statuses.
 * fetch is stubbed; nothing leaves the process.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { OpenAICompatibleClient } from "./client.js";
import { parseCompletion } from "./format.js";
import { LLMRequestError } from "../errors.js";

interface CapturedRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

function stubFetch(status: number, payload: unknown): CapturedRequest[] {
  const captured: CapturedRequest[] = [];
  vi.stubGlobal("fetch", async (url: string, init: { headers: Record<string, string>; body: string }) => {
    captured.push({ url, headers: init.headers, body: JSON.parse(init.body) });
    return {
      ok: status >= 200 && status < 300,
      status,
      text: async () => (typeof payload === "string" ? payload : JSON.stringify(payload)),
      json: async () => payload,
    };
  });
  return captured;
}

describe("OpenAICompatibleClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the conversation to /chat/completions", async () => {
    const captured = stubFetch(200, {
      choices: [{ message: { role: "assistant", content: "hi there" } }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    });
    const client = new OpenAICompatibleClient("openai", "test-key", "https://llm.test/v1/", "gpt-5");

    const result = await client.chat([
      { role: "system", content: "ctx" },
      { role: "user", content: "hello" },
    ]);

    expect(captured).toHaveLength(1);
    expect(captured[0].url).toBe("https://llm.test/v1/chat/completions");
    expect(captured[0].headers["Authorization"]).toBe("Bearer test-key");
    expect(captured[0].body).toEqual({
      model: "gpt-5",
      messages: [
        { role: "system", content: "ctx" },
        { role: "user", content: "hello" },
      ],
      stream: false,
    });
    expect(result).toEqual({
      content: "hi there",
      model: "gpt-5",
      provider: "openai",
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it("passes model, temperature and max tokens when given", async () => {
    const captured = stubFetch(200, { choices: [{ message: { content: "ok" } }] });
    const client = new OpenAICompatibleClient("xai", "test-key", "https://llm.test/v1", "grok-4");

    await client.chat([{ role: "user", content: "q" }], { model: "other", temperature: 0.2, maxTokens: 64 });

    expect(captured[0].body.model).toBe("other");
    expect(captured[0].body.temperature).toBe(0.2);
    expect(captured[0].body.max_tokens).toBe(64);
  });

  it("sends no Authorization header without a key", async () => {
    const captured = stubFetch(200, { choices: [{ message: { content: "ok" } }] });
    const client = new OpenAICompatibleClient("local", "", "http://localhost:1234/v1", "local-model");

    await client.chat([{ role: "user", content: "q" }]);

    expect(captured[0].headers["Authorization"]).toBeUndefined();
  });

  it("throws LLMRequestError with the status on a non-2xx response", async () => {
    stubFetch(429, "rate limited");
    const client = new OpenAICompatibleClient("openai", "test-key", "https://llm.test/v1", "gpt-5");

    const error = await client.chat([{ role: "user", content: "q" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMRequestError);
    expect(error).toMatchObject({ status: 429, provider: "openai", message: "openai API error: 429 rate limited" });
  });

  it("throws when the body has no choices", async () => {
    stubFetch(200, { choices: [] });
    const client = new OpenAICompatibleClient("openai", "test-key", "https://llm.test/v1", "gpt-5");

    await expect(client.chat([{ role: "user", content: "q" }])).rejects.toThrow(
      "openai API error: malformed response (no choices in response)"
    );
  });

  it("propagates network failures unchanged", async () => {
    vi.stubGlobal("fetch", async () => {
      throw new TypeError("fetch failed");
    });
    const client = new OpenAICompatibleClient("openai", "test-key", "https://llm.test/v1", "gpt-5");

    await expect(client.chat([{ role: "user", content: "q" }])).rejects.toThrow("fetch failed");
  });
});

describe("parseCompletion", () => {
  it("treats null content as an empty reply", () => {
    expect(parseCompletion({ choices: [{ message: { content: null } }] })).toEqual({
      content: "",
      inputTokens: 0,
      outputTokens: 0,
    });
  });

  it("rejects bodies without a message", () => {
    expect(parseCompletion(null)).toBeNull();
    expect(parseCompletion({})).toBeNull();
    expect(parseCompletion({ choices: [{}] })).toBeNull();
  });
});
