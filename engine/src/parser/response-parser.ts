/**
 * Response Parser
 *
 * Extracts structured results from raw model text. Every public method
 * returns a value: decode failures become error sentinels carrying the raw
 * text, never exceptions.
 */

import { createComponentLogger } from "../logging.js";
import { errorResult, isPlainObject } from "../types.js";
import { ARRAY_STRATEGIES, OBJECT_STRATEGIES, runCascade } from "./strategies.js";
import { extractEntities, hasMultipleEntities } from "./entities.js";
import type { ParseStrategy } from "./strategies.js";
import type { FieldValues, MultiEntityResult, QueryResult } from "../types.js";

const log = createComponentLogger("parser");

export const PARSE_FAILED = "Could not parse model response as JSON";

export interface ResponseParserOptions {
  objectStrategies?: ReadonlyArray<ParseStrategy<FieldValues>>;
  arrayStrategies?: ReadonlyArray<ParseStrategy<unknown[]>>;
}

export class ResponseParser {
  private objectStrategies: ReadonlyArray<ParseStrategy<FieldValues>>;
  private arrayStrategies: ReadonlyArray<ParseStrategy<unknown[]>>;

  constructor(options: ResponseParserOptions = {}) {
    this.objectStrategies = options.objectStrategies ?? OBJECT_STRATEGIES;
    this.arrayStrategies = options.arrayStrategies ?? ARRAY_STRATEGIES;
  }

  /** One object, or `{ error, rawResponse }`. */
  parseObject(text: string): QueryResult {
    const outcome = runCascade(this.objectStrategies, text);
    if (!outcome) {
      log.debug("Object cascade failed", { length: text.length });
      return errorResult(PARSE_FAILED, text);
    }
    log.trace("Parsed object", { strategy: outcome.strategy });
    return outcome.value;
  }

  /**
   * A list of results. Elements that are not objects become error
   * sentinels; a total failure is a one-element list holding the sentinel.
   * Length reconciliation is the caller's job.
   */
  parseArray(text: string, expectedLength?: number): QueryResult[] {
    const outcome = runCascade(this.arrayStrategies, text);
    if (!outcome) {
      log.debug("Array cascade failed", { length: text.length, expectedLength });
      return [errorResult(PARSE_FAILED, text)];
    }

    const results = outcome.value.map((item, i): QueryResult =>
      isPlainObject(item) ? item : errorResult(`Element ${i} is not an object`, JSON.stringify(item)),
    );

    if (expectedLength !== undefined && results.length !== expectedLength) {
      log.warn("Parsed array length differs from batch size", {
        strategy: outcome.strategy,
        expected: expectedLength,
        actual: results.length,
      });
    }
    return results;
  }

  hasMultipleEntities(text: string): boolean {
    return hasMultipleEntities(text);
  }

  /** Lossy prose extraction; see entities.ts. */
  parseMultiEntity(text: string): MultiEntityResult {
    const result = extractEntities(text);
    log.debug("Extracted entities from prose", { count: result.count });
    return result;
  }

  /**
   * Object cascade first; prose with multi-entity markers is the fallback
   * when no JSON object can be found.
   */
  parse(text: string): QueryResult {
    if (runCascade(this.objectStrategies, text) === null && this.hasMultipleEntities(text)) {
      return this.parseMultiEntity(text);
    }
    return this.parseObject(text);
  }
}
