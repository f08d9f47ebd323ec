/**
 * Error Types
 *
 * Only configuration and schema loading throw these at callers. The query
 * path converts every failure into an ErrorResult instead.
 */

export class SchemaValidationError extends Error {
  readonly problems: string[];

  constructor(problems: string[], source?: string) {
    const where = source ? ` (${source})` : "";
    super(`Invalid schema${where}: ${problems.join("; ")}`);
    this.name = "SchemaValidationError";
    this.problems = problems;
  }
}

/** A template placeholder that neither the record nor the fixed set resolves. */
export class TemplateError extends Error {
  readonly placeholder: string;

  constructor(placeholder: string) {
    super(`Unresolved template placeholder: {${placeholder}}`);
    this.name = "TemplateError";
    this.placeholder = placeholder;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Message text of anything thrown, for logs and error results. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
