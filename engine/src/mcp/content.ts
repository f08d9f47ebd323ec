/**
 * MCP Content Helpers
 *
 * Tools answer with an array of content items; only the text items matter
 * to the engine.
 */

import { isPlainObject } from "../types.js";

/** Characters of a failing tool's text kept in the warning. */
const ERROR_DETAIL_CHARS = 200;

/**
 * Only the text items, separated by blank lines. Null when there are none,
 * which callers treat as "no result".
 */
export function extractText(content: unknown[]): string | null {
  const texts = content
    .filter(isPlainObject)
    .filter(item => item.type === "text" && typeof item.text === "string")
    .map(item => String(item.text))
    .filter(text => text.length > 0);
  return texts.length > 0 ? texts.join("\n\n") : null;
}

/** Short single-line text of an isError result, for logs. */
export function errorDetail(content: unknown[]): string {
  const text = extractText(content);
  if (text === null) return "(no text)";
  const line = text.replace(/\s+/g, " ").trim();
  return line.length > ERROR_DETAIL_CHARS ? `${line.substring(0, ERROR_DETAIL_CHARS)}...` : line;
}
