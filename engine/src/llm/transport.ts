/**
 * LLM Chat Transport
 *
 * Wraps the OpenAI-compatible client in the ChatTransport contract the
 * query engine consumes: retries transient network failures, maps an empty
 * answer to null, and classifies connection-test failures.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { withRetry } from "./retry.js";
import { OpenAICompatibleClient } from "./openai-compatible.js";
import type { RetryOptions } from "./retry.js";
import type { ChatTransport, CompleteOptions, ConnectionTestResult, LLMClientConfig } from "./types.js";

const log = createComponentLogger("llm.transport");

const CONNECTION_TEST_PROMPT = "Reply with 'OK'.";

export interface LLMTransportOptions {
  retry?: RetryOptions;
  /** Inject a prebuilt client (tests) */
  client?: OpenAICompatibleClient;
}

export class LLMTransport implements ChatTransport {
  private client: OpenAICompatibleClient;
  private retry: RetryOptions;

  constructor(config: LLMClientConfig, options: LLMTransportOptions = {}) {
    this.client = options.client ?? new OpenAICompatibleClient(config);
    this.retry = { retries: 2, ...options.retry };
  }

  /**
   * Send one prompt. Resolves null when the model returns nothing; rejects
   * when the request fails after retries.
   */
  async complete(prompt: string, options: CompleteOptions = {}): Promise<string | null> {
    log.debug("Sending prompt", { model: this.client.model, chars: prompt.length, stream: options.stream === true });

    const response = await withRetry(
      () => this.client.chat(prompt, { stream: options.stream }),
      { operation: "chat", ...this.retry },
    );

    if (!response.content.trim()) {
      log.warn("Model returned an empty response", { model: response.model });
      return null;
    }
    return response.content;
  }

  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const response = await this.client.chat(CONNECTION_TEST_PROMPT, { maxTokens: 50 });
      log.info("Connection test succeeded", { model: this.client.model });
      return { success: true, message: `Connected. Model replied: ${response.content.substring(0, 50)}` };
    } catch (error) {
      log.error("Connection test failed", error, { model: this.client.model });
      return { success: false, message: classifyConnectionError(error) };
    }
  }
}

/** User-facing explanation of a failed request. */
export function classifyConnectionError(error: unknown): string {
  const msg = errorMessage(error);
  const lower = msg.toLowerCase();

  if (msg.includes("402") || lower.includes("payment required") || lower.includes("insufficient balance")) {
    return "Insufficient account balance. Top up the provider account and try again.";
  }
  if (msg.includes("401") || lower.includes("unauthorized") || lower.includes("invalid api key")) {
    return "Invalid or expired API key. Check that the key is copied correctly and activated.";
  }
  if (msg.includes("404") || lower.includes("not found")) {
    return "Endpoint or model not found. Check the base URL and model name.";
  }
  if (msg.includes("429") || lower.includes("rate limit")) {
    return "Rate limit exceeded. Try again later or upgrade the API plan.";
  }
  if (lower.includes("timeout") || lower.includes("timed out")) {
    return "Connection timed out. Check the network, proxy settings and base URL.";
  }
  return `Connection failed: ${msg.substring(0, 200)}`;
}
