/**
 * Schema Validation & Loading
 *
 * Turns untrusted JSON (a schema file, a config blob) into a Schema. All
 * problems are collected and reported together.
 */

import { promises as fs } from "fs";
import { SchemaValidationError, errorMessage } from "../errors.js";
import { FIELD_TYPES, isPlainObject } from "../types.js";
import { templatePlaceholders } from "../prompt/template.js";
import type { FieldSpec, FieldType, InputRecord, Schema } from "../types.js";

/** Placeholders every template may use regardless of the record. */
export const FIXED_PLACEHOLDERS = {
  single: ["input_data", "output_fields_description"],
  batch: ["batch_data", "companies_list", "output_fields_description"],
} as const;

function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some(t => t === value);
}

function parseFields(value: unknown, key: string, problems: string[]): FieldSpec[] {
  if (!Array.isArray(value)) {
    problems.push(`${key} must be an array`);
    return [];
  }

  const fields: FieldSpec[] = [];
  const seen = new Set<string>();
  value.forEach((raw: unknown, i) => {
    if (!isPlainObject(raw)) {
      problems.push(`${key}[${i}] must be an object`);
      return;
    }
    const { name, type, required, description } = raw;
    if (typeof name !== "string" || !name.trim()) {
      problems.push(`${key}[${i}].name must be a non-empty string`);
      return;
    }
    if (seen.has(name)) {
      problems.push(`${key}[${i}].name "${name}" is duplicated`);
    }
    seen.add(name);
    if (!isFieldType(type)) {
      problems.push(`${key}[${i}].type must be one of ${FIELD_TYPES.join(", ")}`);
      return;
    }
    fields.push({
      name,
      type,
      required: required === true,
      description: typeof description === "string" ? description : "",
    });
  });
  return fields;
}

/**
 * Validate a raw value as a Schema. Accepts both camelCase keys and the
 * snake_case keys of older config files (input_columns, prompt_template...).
 */
export function parseSchema(value: unknown, source?: string): Schema {
  if (!isPlainObject(value)) {
    throw new SchemaValidationError(["schema must be an object"], source);
  }

  const raw = value;
  const problems: string[] = [];
  const pick = (camel: string, snake: string): unknown => raw[camel] ?? raw[snake];

  const name = raw.name;
  if (typeof name !== "string" || !name.trim()) {
    problems.push("name must be a non-empty string");
  }

  const inputColumns = parseFields(pick("inputColumns", "input_columns") ?? [], "inputColumns", problems);
  const outputColumns = parseFields(pick("outputColumns", "output_columns"), "outputColumns", problems);
  if (outputColumns.length === 0 && !problems.some(p => p.startsWith("outputColumns"))) {
    problems.push("outputColumns must not be empty");
  }

  const promptTemplate = pick("promptTemplate", "prompt_template") ?? "";
  const batchPromptTemplate = pick("batchPromptTemplate", "batch_prompt_template") ?? "";
  if (typeof promptTemplate !== "string") problems.push("promptTemplate must be a string");
  if (typeof batchPromptTemplate !== "string") problems.push("batchPromptTemplate must be a string");

  const description = raw.description;

  if (problems.length > 0 || typeof name !== "string"
    || typeof promptTemplate !== "string" || typeof batchPromptTemplate !== "string") {
    throw new SchemaValidationError(problems, source);
  }

  return {
    name,
    description: typeof description === "string" ? description : "",
    inputColumns,
    outputColumns,
    promptTemplate,
    batchPromptTemplate,
  };
}

/** Read and validate a schema JSON file. */
export async function loadSchemaFile(filePath: string): Promise<Schema> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new SchemaValidationError([`cannot read file: ${errorMessage(err)}`], filePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SchemaValidationError([`invalid JSON: ${errorMessage(err)}`], filePath);
  }
  return parseSchema(parsed, filePath);
}

/**
 * Placeholders a template references that neither the input columns nor
 * the fixed set can resolve. Such templates still render (through the
 * default prompt), so this is a lint for schema editors, not a gate.
 */
export function unresolvedPlaceholders(schema: Schema): { single: string[]; batch: string[] } {
  const inputNames = new Set(schema.inputColumns.map(c => c.name));
  const singleKnown = new Set<string>([...FIXED_PLACEHOLDERS.single, ...inputNames]);
  const batchKnown = new Set<string>(FIXED_PLACEHOLDERS.batch);
  return {
    single: templatePlaceholders(schema.promptTemplate).filter(p => !singleKnown.has(p)),
    batch: templatePlaceholders(schema.batchPromptTemplate).filter(p => !batchKnown.has(p)),
  };
}

/**
 * Build the InputRecord for one row: every input column present, missing,
 * null and NaN cells as "".
 */
export function toInputRecord(row: Record<string, unknown>, inputColumns: FieldSpec[]): InputRecord {
  const record: InputRecord = {};
  for (const column of inputColumns) {
    const value = row[column.name];
    const empty = value === undefined || value === null || (typeof value === "number" && Number.isNaN(value));
    record[column.name] = empty ? "" : String(value);
  }
  return record;
}

/** Input columns absent from a row set's header. */
export function missingInputColumns(schema: Schema, header: string[]): string[] {
  return schema.inputColumns.map(c => c.name).filter(name => !header.includes(name));
}
