import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { LLMTransport, classifyConnectionError } from "./transport.js";
import type { LLMClientConfig } from "./types.js";

const CONFIG: LLMClientConfig = {
  apiKey: "test-secret",
  baseUrl: "https://llm.test/v1",
  model: "qwen-plus",
  temperature: 0.1,
  timeoutMs: 5_000,
  deepThinking: false,
  webSearch: false,
};

function reply(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => reply("[{\"a\":1}]"));
const noSleep = async (_ms: number) => {};

beforeEach(() => {
  fetchMock.mockClear();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("LLMTransport.complete", () => {
  it("returns the model text", async () => {
    const transport = new LLMTransport(CONFIG, { retry: { sleep: noSleep } });
    await expect(transport.complete("prompt")).resolves.toBe("[{\"a\":1}]");
  });

  it("maps an empty answer to null", async () => {
    fetchMock.mockResolvedValueOnce(reply("   "));
    const transport = new LLMTransport(CONFIG, { retry: { sleep: noSleep } });
    await expect(transport.complete("prompt")).resolves.toBeNull();
  });

  it("retries a transient failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("busy", { status: 503 }));
    const transport = new LLMTransport(CONFIG, { retry: { sleep: noSleep } });

    await expect(transport.complete("prompt")).resolves.toBe("[{\"a\":1}]");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("rejects on a non-transient failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("bad key", { status: 401 }));
    const transport = new LLMTransport(CONFIG, { retry: { sleep: noSleep } });

    await expect(transport.complete("prompt")).rejects.toThrow("API error: 401 bad key");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("LLMTransport.testConnection", () => {
  it("reports success with the reply", async () => {
    fetchMock.mockResolvedValueOnce(reply("OK"));
    const result = await new LLMTransport(CONFIG).testConnection();
    expect(result).toEqual({ success: true, message: "Connected. Model replied: OK" });
  });

  it("classifies an auth failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Unauthorized", { status: 401 }));
    const result = await new LLMTransport(CONFIG).testConnection();
    expect(result.success).toBe(false);
    expect(result.message).toBe("Invalid or expired API key. Check that the key is copied correctly and activated.");
  });
});

describe("classifyConnectionError", () => {
  it("maps known failures", () => {
    expect(classifyConnectionError(new Error("API error: 402 Insufficient Balance")))
      .toBe("Insufficient account balance. Top up the provider account and try again.");
    expect(classifyConnectionError(new Error("API error: 404 model missing")))
      .toBe("Endpoint or model not found. Check the base URL and model name.");
    expect(classifyConnectionError(new Error("API error: 429")))
      .toBe("Rate limit exceeded. Try again later or upgrade the API plan.");
    expect(classifyConnectionError(new Error("The operation was aborted due to timeout")))
      .toBe("Connection timed out. Check the network, proxy settings and base URL.");
  });

  it("falls back to the raw message", () => {
    expect(classifyConnectionError("socket closed")).toBe("Connection failed: socket closed");
  });
});
