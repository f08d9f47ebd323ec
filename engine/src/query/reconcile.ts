/**
 * Batch Reconciliation
 *
 * A chunk of N records always yields exactly N results, whatever the model
 * returned: short lists are padded with error sentinels, long ones are cut.
 */

import { errorResult } from "../types.js";
import type { QueryResult } from "../types.js";

export const NO_RESULT = "No result returned for this record";

export interface Reconciled {
  results: QueryResult[];
  /** Positive when padded, negative when truncated, 0 when exact */
  delta: number;
}

export function reconcile(results: QueryResult[], expectedLength: number): Reconciled {
  const delta = expectedLength - results.length;
  if (delta === 0) return { results, delta };
  if (delta < 0) return { results: results.slice(0, expectedLength), delta };

  const padding = Array.from({ length: delta }, () => errorResult(NO_RESULT));
  return { results: [...results, ...padding], delta };
}

/** One sentinel per record, for a chunk that failed as a whole. */
export function failChunk(length: number, error: string): QueryResult[] {
  return Array.from({ length }, () => errorResult(error));
}
