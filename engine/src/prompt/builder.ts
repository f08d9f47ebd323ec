/**
 * Prompt Builder
 *
 * Renders a schema's templates against one record (single mode) or a batch
 * of records (batch mode). Rendering never throws: a template that cannot be
 * resolved falls back to a generic "process this data" prompt.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { renderTemplate } from "./template.js";
import type { FieldSpec, InputRecord, RenderMode, Schema } from "../types.js";

const log = createComponentLogger("prompt");

/** Keys of the first record that mark a batch as a list of companies. */
const COMPANY_KEY_PATTERN = /公司|company/i;

export class PromptBuilder {
  render(schema: Schema, input: InputRecord, mode: "single"): string;
  render(schema: Schema, input: InputRecord[], mode: "batch"): string;
  render(schema: Schema, input: InputRecord | InputRecord[], mode: RenderMode): string {
    if (mode === "batch") {
      return this.renderBatch(schema, Array.isArray(input) ? input : [input]);
    }
    return this.renderSingle(schema, Array.isArray(input) ? input[0] ?? {} : input);
  }

  renderSingle(schema: Schema, record: InputRecord): string {
    const outputDescription = describeOutputFields(schema.outputColumns);

    // Record fields first so the fixed substitutions win on a name clash
    const values = new Map<string, string>(Object.entries(record));
    values.set("input_data", formatFieldListing(record));
    values.set("output_fields_description", outputDescription);

    return this.renderOrFallback(schema, schema.promptTemplate, values, record, "single");
  }

  renderBatch(schema: Schema, records: InputRecord[]): string {
    const batchData = JSON.stringify(records, null, 2);
    const values = new Map<string, string>([
      ["batch_data", batchData],
      ["companies_list", formatCompaniesList(records, batchData)],
      ["output_fields_description", describeOutputFields(schema.outputColumns)],
    ]);

    return this.renderOrFallback(schema, schema.batchPromptTemplate, values, records, "batch");
  }

  private renderOrFallback(
    schema: Schema,
    template: string,
    values: ReadonlyMap<string, string>,
    data: InputRecord | InputRecord[],
    mode: RenderMode,
  ): string {
    if (!template.trim()) {
      log.debug("Empty template, using default prompt", { schema: schema.name, mode });
      return defaultPrompt(data, schema.outputColumns);
    }
    try {
      return renderTemplate(template, values);
    } catch (err) {
      log.warn("Template could not be rendered, using default prompt", {
        schema: schema.name,
        mode,
        reason: errorMessage(err),
      });
      return defaultPrompt(data, schema.outputColumns);
    }
  }
}

// ============================================
// BLOCK FORMATTERS
// ============================================

/** `name: value` per line. */
export function formatFieldListing(record: InputRecord): string {
  return Object.entries(record).map(([key, value]) => `${key}: ${value}`).join("\n");
}

/** `- name (type): description` per line. */
export function describeOutputFields(fields: FieldSpec[]): string {
  return fields.map(f => `- ${f.name} (${f.type}): ${f.description}`).join("\n");
}

/**
 * Numbered list of company names when the first record has a company-like
 * key, otherwise the batch JSON unchanged.
 */
export function formatCompaniesList(records: InputRecord[], batchData: string): string {
  const first = records[0];
  if (!first) return batchData;

  const companyKey = Object.keys(first).find(key => COMPANY_KEY_PATTERN.test(key));
  if (companyKey === undefined) return batchData;

  return records.map((record, i) => `${i + 1}. ${record[companyKey] ?? ""}`).join("\n");
}

export function defaultPrompt(data: InputRecord | InputRecord[], outputColumns: FieldSpec[]): string {
  return [
    "Process the following data:",
    JSON.stringify(data, null, 2),
    "",
    "Output fields:",
    describeOutputFields(outputColumns),
  ].join("\n");
}
