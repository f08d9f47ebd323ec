/**
 * Template Substitution
 *
 * `{name}` placeholders are looked up in an explicit table; `{{` and `}}`
 * are literal braces. A placeholder missing from the table throws
 * TemplateError, which the prompt builder turns into its default prompt.
 */

import { TemplateError } from "../errors.js";

const TOKEN_PATTERN = /\{\{|\}\}|\{([^{}]*)\}/g;

export function renderTemplate(template: string, values: ReadonlyMap<string, string>): string {
  return template.replace(TOKEN_PATTERN, (token: string, name: string | undefined) => {
    if (token === "{{") return "{";
    if (token === "}}") return "}";
    const key = name ?? "";
    const value = values.get(key);
    if (value === undefined) {
      throw new TemplateError(key);
    }
    return value;
  });
}

/** Placeholder names a template references, in order of first use. */
export function templatePlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(TOKEN_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}
