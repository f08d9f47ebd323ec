import { describe, it, expect } from "vitest";
import { fileURLToPath } from "url";
import {
  parseSchema,
  loadSchemaFile,
  unresolvedPlaceholders,
  toInputRecord,
  missingInputColumns,
} from "./validate.js";
import { SchemaValidationError } from "../errors.js";
import type { Schema } from "../types.js";

const FIXTURE = fileURLToPath(new URL("../../schemas/company-enrichment.json", import.meta.url));

const MINIMAL = {
  name: "industry",
  outputColumns: [{ name: "industry", type: "string", description: "Primary industry" }],
};

function problemsOf(value: unknown): string[] {
  try {
    parseSchema(value);
  } catch (err) {
    if (err instanceof SchemaValidationError) return err.problems;
    throw err;
  }
  return [];
}

describe("parseSchema", () => {
  it("fills defaults for a minimal schema", () => {
    expect(parseSchema(MINIMAL)).toEqual({
      name: "industry",
      description: "",
      inputColumns: [],
      outputColumns: [{ name: "industry", type: "string", required: false, description: "Primary industry" }],
      promptTemplate: "",
      batchPromptTemplate: "",
    });
  });

  it("accepts snake_case keys", () => {
    const schema = parseSchema({
      name: "industry",
      input_columns: [{ name: "Company", type: "string", required: true }],
      output_columns: MINIMAL.outputColumns,
      prompt_template: "{Company}",
    });
    expect(schema.inputColumns).toEqual([{ name: "Company", type: "string", required: true, description: "" }]);
    expect(schema.promptTemplate).toBe("{Company}");
  });

  it("reports every problem at once", () => {
    expect(problemsOf({ name: "", outputColumns: [] })).toEqual([
      "name must be a non-empty string",
      "outputColumns must not be empty",
    ]);
    expect(problemsOf({
      name: "x",
      inputColumns: [{ name: "a", type: "string" }, { name: "a", type: "text" }],
      outputColumns: "industry",
      promptTemplate: 42,
    })).toEqual([
      'inputColumns[1].name "a" is duplicated',
      "inputColumns[1].type must be one of string, number, boolean, date",
      "outputColumns must be an array",
      "promptTemplate must be a string",
    ]);
  });

  it("rejects a non-object with the source in the message", () => {
    expect(() => parseSchema([], "schemas/bad.json")).toThrow("Invalid schema (schemas/bad.json): schema must be an object");
  });
});

describe("loadSchemaFile", () => {
  it("loads the bundled company schema", async () => {
    const schema = await loadSchemaFile(FIXTURE);
    expect(schema.name).toBe("company-enrichment");
    expect(schema.inputColumns.map(c => c.name)).toEqual(["Company", "City"]);
    expect(schema.outputColumns.map(c => c.type)).toEqual(["string", "date", "number", "boolean"]);
    expect(unresolvedPlaceholders(schema)).toEqual({ single: [], batch: [] });
  });

  it("wraps a missing file in a SchemaValidationError", async () => {
    await expect(loadSchemaFile(`${FIXTURE}.missing`)).rejects.toBeInstanceOf(SchemaValidationError);
  });
});

describe("unresolvedPlaceholders", () => {
  it("lists names neither the record nor the fixed set provides", () => {
    const schema: Schema = {
      ...parseSchema(MINIMAL),
      inputColumns: [{ name: "Company", type: "string", description: "" }],
      promptTemplate: "{Company} {Region} {input_data} {{literal}}",
      batchPromptTemplate: "{batch_data} {Company}",
    };
    expect(unresolvedPlaceholders(schema)).toEqual({ single: ["Region"], batch: ["Company"] });
  });
});

describe("toInputRecord", () => {
  it("keeps every input column and blanks empty cells", async () => {
    const schema = await loadSchemaFile(FIXTURE);
    expect(toInputRecord({ Company: "Acme Ltd", City: null, Extra: 1 }, schema.inputColumns)).toEqual({
      Company: "Acme Ltd",
      City: "",
    });
    expect(toInputRecord({ Company: 42, City: Number.NaN }, schema.inputColumns)).toEqual({ Company: "42", City: "" });
    expect(missingInputColumns(schema, ["Company", "Notes"])).toEqual(["City"]);
  });
});
