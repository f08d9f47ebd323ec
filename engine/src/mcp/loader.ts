/**
 * MCP Config Loader
 *
 * Reads MCP server configs from ~/.rowfill/mcp/*.json (or ROWFILL_MCP_DIR).
 * Each file defines one server. Invalid files are skipped with a warning;
 * disabled servers are skipped quietly.
 */

import { promises as fs } from "fs";
import { join, resolve } from "path";
import { homedir } from "os";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { isPlainObject } from "../types.js";
import type { MCPServerConfig } from "./types.js";

const log = createComponentLogger("mcp.loader");

/** Default MCP config directory. */
export function defaultMcpConfigDir(): string {
  return resolve(homedir(), ".rowfill", "mcp");
}

/**
 * Substitute ${ENV_VAR} references with values from `env`.
 * Unset variables are left as written.
 */
export function resolveEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => env[varName] || match);
}

/** Resolve env vars in every value of a record. */
export function resolveEnvRecord(
  record: Record<string, string>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    resolved[key] = resolveEnvVars(value, env);
  }
  return resolved;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === "string");
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isPlainObject(value) && Object.values(value).every(v => typeof v === "string");
}

/**
 * Validate one decoded config file. Returns the problem instead of throwing
 * so the loader can name the file in its warning.
 */
export function parseServerConfig(value: unknown): MCPServerConfig | string {
  if (!isPlainObject(value)) return "config must be an object";

  const { name, command, args, env, cwd, enabled, description } = value;
  if (typeof name !== "string" || !name) return "missing required field: name";
  if (typeof command !== "string" || !command) return "missing required field: command";
  if (args !== undefined && !isStringArray(args)) return "args must be an array of strings";
  if (env !== undefined && !isStringRecord(env)) return "env must map names to strings";
  if (cwd !== undefined && typeof cwd !== "string") return "cwd must be a string";
  if (enabled !== undefined && typeof enabled !== "boolean") return "enabled must be a boolean";

  return {
    name,
    command,
    args,
    env,
    cwd,
    enabled,
    description: typeof description === "string" ? description : undefined,
  };
}

/**
 * Load all enabled MCP server configs from a directory.
 * A missing directory means no servers.
 */
export async function loadMcpConfigs(configDir: string = defaultMcpConfigDir()): Promise<MCPServerConfig[]> {
  let files: string[];
  try {
    files = await fs.readdir(configDir);
  } catch {
    log.debug("No MCP config directory", { configDir });
    return [];
  }

  const configs: MCPServerConfig[] = [];
  for (const file of files.filter(f => f.endsWith(".json")).sort()) {
    try {
      const content = await fs.readFile(join(configDir, file), "utf-8");
      const parsed = parseServerConfig(JSON.parse(content));

      if (typeof parsed === "string") {
        log.warn("Skipping MCP config", { file, reason: parsed });
        continue;
      }
      if (parsed.enabled === false) {
        log.info("Skipping disabled MCP server", { server: parsed.name });
        continue;
      }
      if (configs.some(c => c.name === parsed.name)) {
        log.warn("Skipping duplicate MCP server name", { file, server: parsed.name });
        continue;
      }

      configs.push(parsed);
    } catch (err) {
      log.warn("Failed to load MCP config", { file, error: errorMessage(err) });
    }
  }

  return configs;
}
