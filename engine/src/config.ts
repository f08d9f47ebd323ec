/**
 * Engine Configuration
 *
 * Environment variables -> one frozen EngineConfig that callers pass down
 * to constructors. loadEnvFile() reads a .env into process.env first; both
 * steps are explicit so tests can hand loadEngineConfig() a plain object.
 */

import { config as loadDotenv } from "dotenv";
import { isLogLevel } from "@rowfill/shared/logging";
import type { LogLevel } from "@rowfill/shared/logging";
import { ConfigError } from "./errors.js";
import { findPreset, MODEL_PRESETS } from "./llm/presets.js";
import { defaultMcpConfigDir } from "./mcp/loader.js";
import { DEFAULT_BATCH_SIZE } from "./query/engine.js";
import type { LLMClientConfig } from "./llm/types.js";

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_PRESET = "deepseek-chat";
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_TIMEOUT_MS = 180_000;

export interface EngineConfig {
  preset: string;
  /** null when no API key is set; queries then fail with error results */
  llm: LLMClientConfig | null;
  batchSize: number;
  mcp: {
    enabled: boolean;
    configDir: string;
  };
  logging: {
    level: LogLevel;
    logDir?: string;
  };
}

type Env = Record<string, string | undefined>;

// ============================================
// PARSERS
// ============================================

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string, fallback: number, check: (n: number) => boolean): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(`${key} has an invalid value: ${raw}`);
  }
  return value;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${key} must be true or false, got: ${raw}`);
}

// ============================================
// LOADING
// ============================================

/** Load a .env file into process.env. Existing variables win. */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : {});
  // A missing file is fine; a malformed one is not
  if (result.error && !("code" in result.error && result.error.code === "ENOENT")) {
    throw new ConfigError(`Cannot load env file: ${result.error.message}`);
  }
}

/**
 * Build the engine config from environment variables. Throws ConfigError
 * for an unknown preset, an unparseable number or flag, or a custom preset
 * without a base URL and model.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const presetId = readString(env, "ROWFILL_PRESET") ?? DEFAULT_PRESET;
  const preset = findPreset(presetId);
  if (!preset) {
    const known = MODEL_PRESETS.map(p => p.id).join(", ");
    throw new ConfigError(`Unknown model preset "${presetId}" (known: ${known})`);
  }

  const baseUrl = readString(env, "ROWFILL_BASE_URL") ?? preset.baseUrl;
  const model = readString(env, "ROWFILL_MODEL") ?? preset.model;
  if (!baseUrl || !model) {
    throw new ConfigError(`Preset "${presetId}" needs ROWFILL_BASE_URL and ROWFILL_MODEL`);
  }

  const apiKey = readString(env, "ROWFILL_API_KEY");
  const maxTokens = readString(env, "ROWFILL_MAX_TOKENS") === undefined
    ? undefined
    : readNumber(env, "ROWFILL_MAX_TOKENS", 0, n => Number.isInteger(n) && n > 0);

  const llm: LLMClientConfig | null = apiKey === undefined ? null : {
    apiKey,
    baseUrl,
    model,
    temperature: readNumber(env, "ROWFILL_TEMPERATURE", DEFAULT_TEMPERATURE, n => n >= 0 && n <= 2),
    ...(maxTokens === undefined ? {} : { maxTokens }),
    timeoutMs: readNumber(env, "ROWFILL_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, n => n > 0),
    deepThinking: readFlag(env, "ROWFILL_DEEP_THINKING", false),
    webSearch: readFlag(env, "ROWFILL_WEB_SEARCH", false),
  };

  const rawLevel = readString(env, "LOG_LEVEL")?.toLowerCase() ?? "info";
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(`LOG_LEVEL has an invalid value: ${rawLevel}`);
  }
  const logDir = readString(env, "LOG_DIR");

  return Object.freeze({
    preset: presetId,
    llm: llm && Object.freeze(llm),
    batchSize: readNumber(env, "ROWFILL_BATCH_SIZE", DEFAULT_BATCH_SIZE, n => Number.isInteger(n) && n > 0),
    mcp: Object.freeze({
      enabled: readFlag(env, "ROWFILL_ENABLE_MCP", false),
      configDir: readString(env, "ROWFILL_MCP_DIR") ?? defaultMcpConfigDir(),
    }),
    logging: Object.freeze(logDir === undefined ? { level: rawLevel } : { level: rawLevel, logDir }),
  });
}
