/**
 * OpenAI-Compatible LLM Client (Chat + Stream)
 *
 * Works with any provider that implements the OpenAI chat completions API:
 * DeepSeek, DashScope (Qwen, hosted DeepSeek), OpenAI, vLLM, etc.
 * Streaming answers are collected into one string; reasoning tokens are
 * kept separately and only logged.
 */

import { createComponentLogger } from "../logging.js";
import { isPlainObject } from "../types.js";
import type { ChatRequestOptions, ChatResponse, LLMClientConfig, LLMUsage } from "./types.js";

const log = createComponentLogger("llm.client");

/** Models that accept `enable_search`. */
export const WEB_SEARCH_MODELS = ["deepseek-r1", "qwen", "gpt-4o-search", "gpt-4-search"];

export function supportsWebSearch(model: string): boolean {
  const lower = model.toLowerCase();
  return WEB_SEARCH_MODELS.some(name => lower.includes(name));
}

/** `enable_thinking` is a DeepSeek V3 switch. */
export function supportsDeepThinking(model: string): boolean {
  const lower = model.toLowerCase();
  return lower.includes("deepseek") && lower.includes("v3");
}

// ============================================
// RESPONSE DECODING
// ============================================

function readUsage(data: Record<string, unknown>): LLMUsage | undefined {
  const usage = data.usage;
  if (!isPlainObject(usage)) return undefined;
  return {
    inputTokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : 0,
    outputTokens: typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0,
  };
}

/** `choices[0][key]` as an object, e.g. the message or the stream delta. */
function firstChoicePart(data: Record<string, unknown>, key: "message" | "delta"): Record<string, unknown> | null {
  const choices = data.choices;
  if (!Array.isArray(choices)) return null;
  const choice: unknown = choices[0];
  if (!isPlainObject(choice)) return null;
  const part = choice[key];
  return isPlainObject(part) ? part : null;
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// ============================================
// CLIENT
// ============================================

export class OpenAICompatibleClient {
  private config: LLMClientConfig;

  constructor(config: LLMClientConfig) {
    this.config = config;
    if (config.webSearch && !supportsWebSearch(config.model)) {
      log.warn("Model may not support web search; enable_search will not be sent", {
        model: config.model,
        supported: WEB_SEARCH_MODELS,
      });
    }
  }

  get model(): string {
    return this.config.model;
  }

  /** Request body for one prompt, provider extras included. */
  buildBody(prompt: string, options: ChatRequestOptions = {}): Record<string, unknown> {
    const { model, temperature } = this.config;
    const body: Record<string, unknown> = {
      model,
      messages: [{ role: "user", content: prompt }],
      temperature,
      stream: options.stream === true,
    };

    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    if (maxTokens !== undefined) {
      body.max_tokens = maxTokens;
    }
    if (options.stream) {
      body.stream_options = { include_usage: true };
    }
    if ((options.deepThinking ?? this.config.deepThinking) && supportsDeepThinking(model)) {
      body.enable_thinking = true;
    }
    if (this.config.webSearch && supportsWebSearch(model)) {
      body.enable_search = true;
    }
    return body;
  }

  async chat(prompt: string, options: ChatRequestOptions = {}): Promise<ChatResponse> {
    const response = await this.post(this.buildBody(prompt, options));
    const result = options.stream
      ? await this.collectStream(response)
      : await this.readCompletion(response);

    if (result.reasoning) {
      log.debug("Model produced reasoning", { chars: result.reasoning.length });
    }
    log.debug("Chat completed", {
      model: this.config.model,
      chars: result.content.length,
      usage: result.usage,
    });
    return result;
  }

  private async post(body: Record<string, unknown>): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.config.apiKey) {
      headers["Authorization"] = `Bearer ${this.config.apiKey}`;
    }

    const response = await fetch(`${this.config.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const retryAfter = response.headers.get("retry-after");
      const hint = retryAfter ? ` (retry-after: ${retryAfter})` : "";
      throw new Error(`API error: ${response.status} ${await response.text()}${hint}`);
    }
    return response;
  }

  private async readCompletion(response: Response): Promise<ChatResponse> {
    const data: unknown = await response.json();
    if (!isPlainObject(data)) {
      throw new Error("API error: malformed completion body");
    }
    const message = firstChoicePart(data, "message");
    return {
      content: text(message?.content),
      reasoning: text(message?.reasoning_content),
      model: this.config.model,
      usage: readUsage(data),
    };
  }

  private async collectStream(response: Response): Promise<ChatResponse> {
    const reader = response.body?.getReader();
    if (!reader) throw new Error("No response body");

    const decoder = new TextDecoder();
    const result: ChatResponse = { content: "", reasoning: "", model: this.config.model };
    let buffer = "";

    // true once the [DONE] marker is seen
    const consume = (line: string): boolean => {
      if (!line.startsWith("data:")) return false;
      const payload = line.slice(5).trim();
      if (payload === "[DONE]") return true;

      let parsed: unknown;
      try {
        parsed = JSON.parse(payload);
      } catch {
        log.trace("Skipping undecodable stream line", { line: payload.substring(0, 80) });
        return false;
      }
      if (!isPlainObject(parsed)) return false;

      result.usage = readUsage(parsed) ?? result.usage;
      const delta = firstChoicePart(parsed, "delta");
      result.content += text(delta?.content);
      result.reasoning += text(delta?.reasoning_content);
      return false;
    };

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() || "";

      if (lines.some(consume)) {
        await reader.cancel();
        return result;
      }
    }

    consume(buffer);
    return result;
  }
}
