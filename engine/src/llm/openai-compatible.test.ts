/**
 * OpenAI-Compatible Client Tests
 *
 * fetch is stubbed; nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OpenAICompatibleClient, supportsWebSearch, supportsDeepThinking } from "./openai-compatible.js";
import type { LLMClientConfig } from "./types.js";

// ============================================
// HELPERS
// ============================================

const CONFIG: LLMClientConfig = {
  apiKey: "test-secret",
  baseUrl: "https://llm.test/v1/",
  model: "deepseek-chat",
  temperature: 0.1,
  timeoutMs: 5_000,
  deepThinking: false,
  webSearch: false,
};

function completionResponse(content: string): Response {
  return new Response(JSON.stringify({
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 3, completion_tokens: 1 },
  }), { status: 200 });
}

const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => completionResponse("hi"));

function sentBody(call = 0): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call]?.[1]?.body));
}

beforeEach(() => {
  fetchMock.mockClear();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// ============================================
// MODEL CAPABILITIES
// ============================================

describe("model capability checks", () => {
  it("knows which models take enable_search", () => {
    expect(supportsWebSearch("qwen-plus")).toBe(true);
    expect(supportsWebSearch("DeepSeek-R1")).toBe(true);
    expect(supportsWebSearch("deepseek-chat")).toBe(false);
  });

  it("limits enable_thinking to DeepSeek V3", () => {
    expect(supportsDeepThinking("deepseek-v3.2")).toBe(true);
    expect(supportsDeepThinking("qwen-v3")).toBe(false);
  });
});

describe("buildBody", () => {
  it("sends one user message at the configured temperature", () => {
    const body = new OpenAICompatibleClient(CONFIG).buildBody("hello");
    expect(body).toEqual({
      model: "deepseek-chat",
      messages: [{ role: "user", content: "hello" }],
      temperature: 0.1,
      stream: false,
    });
  });

  it("adds provider extras only for supporting models", () => {
    const v3 = new OpenAICompatibleClient({ ...CONFIG, model: "deepseek-v3", deepThinking: true });
    expect(v3.buildBody("x").enable_thinking).toBe(true);

    const chat = new OpenAICompatibleClient({ ...CONFIG, deepThinking: true, webSearch: true });
    expect(chat.buildBody("x").enable_thinking).toBeUndefined();
    expect(chat.buildBody("x").enable_search).toBeUndefined();

    const qwen = new OpenAICompatibleClient({ ...CONFIG, model: "qwen-plus", webSearch: true });
    expect(qwen.buildBody("x").enable_search).toBe(true);
  });

  it("requests usage with streaming", () => {
    const body = new OpenAICompatibleClient(CONFIG).buildBody("x", { stream: true, maxTokens: 50 });
    expect(body.stream).toBe(true);
    expect(body.stream_options).toEqual({ include_usage: true });
    expect(body.max_tokens).toBe(50);
  });
});

// ============================================
// CHAT
// ============================================

describe("chat", () => {
  it("posts to chat/completions with a bearer token", async () => {
    const result = await new OpenAICompatibleClient(CONFIG).chat("hello");

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://llm.test/v1/chat/completions");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(sentBody()).toMatchObject({ model: "deepseek-chat", stream: false });
    expect(result).toEqual({
      content: "hi",
      reasoning: "",
      model: "deepseek-chat",
      usage: { inputTokens: 3, outputTokens: 1 },
    });
  });

  it("collects a streamed answer and its reasoning", async () => {
    const events = [
      { choices: [{ delta: { reasoning_content: "think" } }] },
      { choices: [{ delta: { content: "Hel" } }] },
      { choices: [{ delta: { content: "lo" } }] },
      { choices: [], usage: { prompt_tokens: 5, completion_tokens: 2 } },
    ];
    const sse = events.map(e => `data: ${JSON.stringify(e)}\n\n`).join("") + "data: [DONE]\n\n";
    fetchMock.mockResolvedValueOnce(new Response(sse, { status: 200 }));

    const result = await new OpenAICompatibleClient(CONFIG).chat("hello", { stream: true });
    expect(result).toEqual({
      content: "Hello",
      reasoning: "think",
      model: "deepseek-chat",
      usage: { inputTokens: 5, outputTokens: 2 },
    });
  });

  it("throws with the status and Retry-After hint on failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("quota", { status: 429, headers: { "retry-after": "2" } }));

    await expect(new OpenAICompatibleClient(CONFIG).chat("hello"))
      .rejects.toThrow("API error: 429 quota (retry-after: 2)");
  });

  it("returns empty content when the message has none", async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ choices: [] }), { status: 200 }));

    const result = await new OpenAICompatibleClient(CONFIG).chat("hello");
    expect(result.content).toBe("");
    expect(result.usage).toBeUndefined();
  });
});
