/**
 * Parse Strategies
 *
 * Each strategy is a pure attempt at pulling one JSON shape out of model
 * text. They are tried in order; the first non-null result wins.
 */

import { isPlainObject } from "../types.js";
import type { FieldValues } from "../types.js";

export interface ParseStrategy<T> {
  name: string;
  attempt(text: string): T | null;
}

export interface CascadeOutcome<T> {
  value: T;
  strategy: string;
}

/** Run strategies in order and report which one succeeded. */
export function runCascade<T>(
  strategies: ReadonlyArray<ParseStrategy<T>>,
  text: string,
): CascadeOutcome<T> | null {
  for (const strategy of strategies) {
    const value = strategy.attempt(text);
    if (value !== null) {
      return { value, strategy: strategy.name };
    }
  }
  return null;
}

// ============================================
// DECODERS
// ============================================

type Decoded = { ok: true; value: unknown } | { ok: false };

function decodeJson(text: string): Decoded {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** A decoded JSON object, or null for anything else. */
export function decodeObject(text: string): FieldValues | null {
  const decoded = decodeJson(text);
  return decoded.ok && isPlainObject(decoded.value) ? decoded.value : null;
}

/** A decoded JSON array; a lone object is wrapped in a one-element list. */
export function decodeList(text: string): unknown[] | null {
  const decoded = decodeJson(text);
  if (!decoded.ok) return null;
  if (Array.isArray(decoded.value)) return decoded.value;
  if (isPlainObject(decoded.value)) return [decoded.value];
  return null;
}

// ============================================
// PATTERNS
// ============================================

/** Outermost brace object, allowing one level of nested braces. */
const BALANCED_OBJECT = /\{[^{}]*(?:\{[^{}]*\}[^{}]*)*\}/;
const FENCED_OBJECT = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;
/** First "[" through last "]". */
const ARRAY_SPAN = /\[[\s\S]*\]/;
const FENCED_ARRAY = /```(?:json)?\s*(\[[\s\S]*?\])\s*```/;

function fromMatch<T>(pattern: RegExp, group: number, decode: (s: string) => T | null) {
  return (text: string): T | null => {
    const match = pattern.exec(text);
    const captured = match?.[group];
    return captured === undefined ? null : decode(captured);
  };
}

// ============================================
// CASCADES
// ============================================

export const OBJECT_STRATEGIES: ReadonlyArray<ParseStrategy<FieldValues>> = [
  { name: "direct-json", attempt: text => decodeObject(text.trim()) },
  { name: "balanced-braces", attempt: fromMatch(BALANCED_OBJECT, 0, decodeObject) },
  { name: "fenced-block", attempt: fromMatch(FENCED_OBJECT, 1, decodeObject) },
];

export const ARRAY_STRATEGIES: ReadonlyArray<ParseStrategy<unknown[]>> = [
  { name: "direct-json", attempt: text => decodeList(text.trim()) },
  { name: "bracket-span", attempt: fromMatch(ARRAY_SPAN, 0, decodeList) },
  { name: "fenced-block", attempt: fromMatch(FENCED_ARRAY, 1, decodeList) },
];
