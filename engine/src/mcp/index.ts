/**
 * MCP Integration: Barrel Exports + Entry Point
 *
 * initMcpOrchestrator() loads the per-server configs and starts them;
 * shut the returned orchestrator down when the run ends.
 */

export { loadMcpConfigs, resolveEnvVars, resolveEnvRecord, parseServerConfig, defaultMcpConfigDir } from "./loader.js";
export { MCPToolClient, CLIENT_INFO } from "./client.js";
export { MCPOrchestrator, DEFAULT_ROLE_TOOLS, WEB_SEARCH_ROLE, DATABASE_ROLE, findEntityName } from "./orchestrator.js";
export { extractText, errorDetail } from "./content.js";
export { DEFAULT_MCP_TIMEOUTS } from "./types.js";
export type { TransportFactory, MCPToolClientOptions } from "./client.js";
export type { MCPOrchestratorOptions, RoleTools } from "./orchestrator.js";
export type {
  MCPServerConfig,
  MCPClientState,
  MCPTimeouts,
  MCPToolResult,
  MCPServerStatus,
  ToolDescriptor,
} from "./types.js";

import { createComponentLogger } from "../logging.js";
import { loadMcpConfigs } from "./loader.js";
import { MCPOrchestrator } from "./orchestrator.js";
import type { MCPToolClientOptions } from "./client.js";

const log = createComponentLogger("mcp");

export interface InitMcpOptions {
  enabled: boolean;
  configDir: string;
  clientOptions?: MCPToolClientOptions;
  recordEntityFallback?: boolean;
}

/**
 * Build and start an orchestrator. With the flag off, or no configs on
 * disk, the result is a valid orchestrator that reports disabled.
 */
export async function initMcpOrchestrator(options: InitMcpOptions): Promise<MCPOrchestrator> {
  const servers = options.enabled ? await loadMcpConfigs(options.configDir) : [];
  if (options.enabled && servers.length === 0) {
    log.info("No MCP server configs found", { configDir: options.configDir });
  }

  const orchestrator = new MCPOrchestrator({
    enabled: options.enabled,
    servers,
    clientOptions: options.clientOptions,
    recordEntityFallback: options.recordEntityFallback,
  });
  await orchestrator.start();
  return orchestrator;
}
