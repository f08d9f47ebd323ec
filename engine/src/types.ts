/**
 * Core Type Definitions
 *
 * Schema, records and query results shared by the prompt builder, the
 * response parser and the query engine. No runtime values apart from the
 * result guards at the bottom.
 */

// ============================================
// SCHEMA
// ============================================

export type FieldType = "string" | "number" | "boolean" | "date";

export const FIELD_TYPES: readonly FieldType[] = ["string", "number", "boolean", "date"];

export interface FieldSpec {
  name: string;
  type: FieldType;
  /** Input columns only: the row must carry a value */
  required?: boolean;
  description: string;
}

/**
 * One enrichment task: which columns go in, which come out, and the
 * templates that turn a row (or a batch of rows) into a prompt.
 */
export interface Schema {
  name: string;
  description: string;
  inputColumns: FieldSpec[];
  /** Never empty */
  outputColumns: FieldSpec[];
  promptTemplate: string;
  batchPromptTemplate: string;
}

// ============================================
// RECORDS & RESULTS
// ============================================

/** One row's input values, keyed by input column name. Never undefined. */
export type InputRecord = Record<string, string>;

/** Output values keyed by output column name, as decoded from the model. */
export type FieldValues = Record<string, unknown>;

export interface ErrorResult {
  error: string;
  /** Raw model text, kept for diagnosis when parsing failed */
  rawResponse?: string;
}

/** Structured fields pulled out of one "Entity k:" section of prose output. */
export interface EntityRecord {
  fullName: string;
  registrationId: string;
  legalRepresentative: string;
  address: string;
  entityType: string;
  industry: string;
  capital: string;
  employeeCount: string;
  foundingDate: string;
  isListed: boolean;
  isRanked: boolean;
  /** Year -> value (100M CNY), negative for losses */
  revenue: Record<number, number>;
  netProfit: Record<number, number>;
}

export interface MultiEntityResult {
  multipleEntities: true;
  entities: EntityRecord[];
  count: number;
}

export type QueryResult = FieldValues | ErrorResult | MultiEntityResult;

export type RenderMode = "single" | "batch";

// ============================================
// GUARDS
// ============================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isErrorResult(result: QueryResult): result is ErrorResult {
  const candidate: object = result;
  return "error" in candidate && typeof candidate.error === "string";
}

export function isMultiEntityResult(result: QueryResult): result is MultiEntityResult {
  const candidate: object = result;
  return "multipleEntities" in candidate && candidate.multipleEntities === true
    && "entities" in candidate && Array.isArray(candidate.entities);
}

export function errorResult(error: string, rawResponse?: string): ErrorResult {
  return rawResponse === undefined ? { error } : { error, rawResponse };
}
