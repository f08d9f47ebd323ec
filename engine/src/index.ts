/**
 * rowfill engine
 *
 * Public surface plus createEnrichmentSession(), which wires an EngineConfig
 * into a transport, an MCP orchestrator and a QueryEngine for one schema.
 *
 * ```typescript
 * loadEnvFile();
 * const config = loadEngineConfig();
 * const schema = await loadSchemaFile("schemas/company-enrichment.json");
 * const session = await createEnrichmentSession(schema, config);
 * try {
 *   const results = await session.engine.queryBatch(records);
 * } finally {
 *   await session.shutdown();
 * }
 * ```
 */

import { initEngineLogging } from "./logging.js";
import { LLMTransport } from "./llm/transport.js";
import { initMcpOrchestrator } from "./mcp/index.js";
import { QueryEngine } from "./query/engine.js";
import type { EngineConfig } from "./config.js";
import type { MCPToolClientOptions, MCPOrchestrator } from "./mcp/index.js";
import type { BatchProgress } from "./query/engine.js";
import type { ChatTransport } from "./llm/types.js";
import type { Schema } from "./types.js";

// ============================================
// EXPORTS
// ============================================

export * from "./types.js";
export { SchemaValidationError, TemplateError, ConfigError, errorMessage } from "./errors.js";
export { initEngineLogging, getEngineLogger, createComponentLogger, DEFAULT_LOG_DIR } from "./logging.js";
export type { LoggingOptions } from "./logging.js";
export { loadEnvFile, loadEngineConfig, DEFAULT_PRESET, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "./config.js";
export type { EngineConfig } from "./config.js";

export {
  parseSchema,
  loadSchemaFile,
  unresolvedPlaceholders,
  toInputRecord,
  missingInputColumns,
  FIXED_PLACEHOLDERS,
} from "./schema/validate.js";
export { PromptBuilder, defaultPrompt, describeOutputFields, formatFieldListing } from "./prompt/builder.js";
export { renderTemplate, templatePlaceholders } from "./prompt/template.js";
export { ResponseParser, PARSE_FAILED } from "./parser/response-parser.js";
export type { ParseStrategy } from "./parser/strategies.js";

export { LLMTransport, classifyConnectionError } from "./llm/transport.js";
export { OpenAICompatibleClient, supportsWebSearch, supportsDeepThinking } from "./llm/openai-compatible.js";
export { MODEL_PRESETS, findPreset } from "./llm/presets.js";
export type {
  ChatTransport,
  CompleteOptions,
  ConnectionTestResult,
  LLMClientConfig,
  ModelPreset,
} from "./llm/types.js";

export * from "./mcp/index.js";

export { QueryEngine, withContext, DEFAULT_BATCH_SIZE, NO_TRANSPORT, EMPTY_RESPONSE } from "./query/engine.js";
export type { QueryEngineOptions, PromptEnhancer, BatchProgress } from "./query/engine.js";
export { reconcile, failChunk, NO_RESULT } from "./query/reconcile.js";
export { selectPending, mergeResult, initOutputColumns, PLACEHOLDER_VALUE } from "./query/merge.js";
export type { Row } from "./query/merge.js";

// ============================================
// SESSION FACTORY
// ============================================

export interface EnrichmentSession {
  engine: QueryEngine;
  transport: ChatTransport | null;
  orchestrator: MCPOrchestrator;
  /** Stops MCP servers; safe to call more than once */
  shutdown(): Promise<void>;
}

export interface EnrichmentSessionOptions {
  /** Replace the HTTP transport (tests, other backends) */
  transport?: ChatTransport | null;
  stream?: boolean;
  onProgress?: (progress: BatchProgress) => void;
  mcpClientOptions?: MCPToolClientOptions;
  /** Search for a record's company field when a prompt has no entity label */
  recordEntityFallback?: boolean;
  /** Initialize console and file logging from the config (default: true) */
  initLogging?: boolean;
}

export async function createEnrichmentSession(
  schema: Schema,
  config: EngineConfig,
  options: EnrichmentSessionOptions = {},
): Promise<EnrichmentSession> {
  if (options.initLogging !== false) {
    initEngineLogging({ minLevel: config.logging.level, logDir: config.logging.logDir });
  }

  const transport = options.transport !== undefined
    ? options.transport
    : config.llm && new LLMTransport(config.llm);

  const orchestrator = await initMcpOrchestrator({
    enabled: config.mcp.enabled,
    configDir: config.mcp.configDir,
    clientOptions: options.mcpClientOptions,
    recordEntityFallback: options.recordEntityFallback,
  });

  const engine = new QueryEngine({
    schema,
    transport,
    enhancer: orchestrator,
    batchSize: config.batchSize,
    stream: options.stream,
    onProgress: options.onProgress,
  });

  return {
    engine,
    transport,
    orchestrator,
    shutdown: () => orchestrator.shutdown(),
  };
}
