/**
 * Result Merging
 *
 * Helpers for a caller that holds the table: which rows still need a query,
 * and how a QueryResult lands in a row. Rows are plain objects keyed by
 * column name; they are updated in place.
 */

import { isErrorResult, isMultiEntityResult } from "../types.js";
import type { FieldSpec, QueryResult } from "../types.js";

export type Row = Record<string, unknown>;

export const PLACEHOLDER_VALUE = "N/A";

function isFilled(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "number") return !Number.isNaN(value);
  const text = String(value).trim();
  return text !== "" && text !== PLACEHOLDER_VALUE;
}

/** Add any missing output column to every row, set to "N/A". */
export function initOutputColumns(rows: Row[], outputColumns: FieldSpec[]): void {
  for (const row of rows) {
    for (const column of outputColumns) {
      if (!(column.name in row)) {
        row[column.name] = PLACEHOLDER_VALUE;
      }
    }
  }
}

/**
 * Indices of rows still to process. With `skipExisting`, a row whose first
 * output column already holds a real value is left out.
 */
export function selectPending(rows: Row[], outputColumns: FieldSpec[], skipExisting: boolean): number[] {
  const first = outputColumns[0];
  const indices: number[] = [];
  rows.forEach((row, i) => {
    if (skipExisting && first && isFilled(row[first.name])) return;
    indices.push(i);
  });
  return indices;
}

/**
 * Copy the output-column values present in `result` into `row`. Error and
 * multi-entity results leave the row unchanged. Returns the columns written.
 */
export function mergeResult(row: Row, result: QueryResult, outputColumns: FieldSpec[]): string[] {
  if (isErrorResult(result) || isMultiEntityResult(result)) return [];

  const written: string[] = [];
  for (const column of outputColumns) {
    if (Object.prototype.hasOwnProperty.call(result, column.name)) {
      row[column.name] = result[column.name];
      written.push(column.name);
    }
  }
  return written;
}
