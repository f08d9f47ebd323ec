/**
 * Retry & Error Detection
 *
 * Network-layer retry for the chat transport. Only transient failures are
 * retried, a small fixed number of times; the query engine itself never
 * retries a chunk.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";

const log = createComponentLogger("llm.retry");

// ============================================
// RETRYABLE ERROR DETECTION
// ============================================

/** HTTP status codes that indicate a transient/retryable failure */
const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

/** Error message patterns that indicate a transient/retryable failure */
const RETRYABLE_PATTERNS = [
  "rate limit",
  "too many requests",
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "network",
  "timeout",
  "timed out",
  "socket hang up",
  "aborted",
];

/** Largest Retry-After hint honored, in seconds. */
const MAX_RETRY_AFTER_SECONDS = 30;

export function isRetryableError(error: unknown): boolean {
  const msg = errorMessage(error).toLowerCase();

  for (const code of RETRYABLE_STATUS_CODES) {
    if (msg.includes(String(code))) return true;
  }

  for (const pattern of RETRYABLE_PATTERNS) {
    if (msg.includes(pattern)) return true;
  }

  return false;
}

/**
 * Retry-After delay carried in an error message ("retry-after: N"), in ms.
 * 0 when absent or larger than the cap.
 */
export function extractRetryAfterMs(error: unknown): number {
  const match = errorMessage(error).match(/retry[- ]after:?\s*(\d+)/i);
  const seconds = match?.[1] === undefined ? NaN : parseInt(match[1], 10);
  if (Number.isNaN(seconds)) return 0;
  return seconds <= MAX_RETRY_AFTER_SECONDS ? seconds * 1000 : 0;
}

// ============================================
// RETRY LOOP
// ============================================

export interface RetryOptions {
  /** Attempts after the first (default: 2) */
  retries?: number;
  /** Delay before attempt n is baseDelayMs * 2^(n-1) (default: 1000) */
  baseDelayMs?: number;
  /** Label for log lines */
  operation?: string;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying transient failures. The last error is rethrown; a
 * non-retryable error is rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const retries = options.retries ?? 2;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !isRetryableError(error)) throw error;

      const delay = extractRetryAfterMs(error) || baseDelayMs * 2 ** attempt;
      log.warn("Transient failure, retrying", {
        operation: options.operation,
        attempt: attempt + 1,
        delayMs: delay,
        error: errorMessage(error).substring(0, 200),
      });
      await sleep(delay);
    }
  }
}
