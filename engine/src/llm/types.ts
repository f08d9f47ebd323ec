/**
 * LLM Types
 *
 * The chat transport is the only thing the query engine knows about the
 * model backend: a prompt goes in, text (or already-structured output)
 * comes out, and null or empty is a soft failure.
 */

import type { FieldValues } from "../types.js";

// ============================================
// CHAT TRANSPORT
// ============================================

export interface CompleteOptions {
  /** Stream the answer over SSE and collect it (default: false) */
  stream?: boolean;
}

export interface ConnectionTestResult {
  success: boolean;
  message: string;
}

export interface ChatTransport {
  complete(prompt: string, options?: CompleteOptions): Promise<string | FieldValues | null>;
  testConnection?(): Promise<ConnectionTestResult>;
}

// ============================================
// OPENAI-COMPATIBLE CLIENT
// ============================================

export interface LLMClientConfig {
  apiKey: string;
  /** e.g. https://api.deepseek.com, without /chat/completions */
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens?: number;
  timeoutMs: number;
  /** Request provider-side deep reasoning where the model supports it */
  deepThinking: boolean;
  /** Request provider-side web search where the model supports it */
  webSearch: boolean;
}

export interface ChatRequestOptions {
  stream?: boolean;
  maxTokens?: number;
  /** Overrides the config flag for this request */
  deepThinking?: boolean;
}

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResponse {
  content: string;
  /** Reasoning trace some providers stream alongside the answer */
  reasoning: string;
  model: string;
  usage?: LLMUsage;
}

export interface ModelPreset {
  id: string;
  label: string;
  baseUrl: string;
  model: string;
  provider: string;
  description: string;
}
