/**
 * MCP Server Configuration Types
 *
 * Defines the config schema for ~/.rowfill/mcp/*.json files.
 * One JSON file per MCP server; the server name doubles as its role
 * ("web_search", "database", ...).
 */

/**
 * Configuration for a single stdio MCP server.
 * Stored as ~/.rowfill/mcp/<name>.json
 */
export interface MCPServerConfig {
  /** Unique name, also the role the orchestrator looks servers up by. */
  name: string;

  /** Command to spawn. */
  command: string;

  /** Arguments for the command. */
  args?: string[];

  /**
   * Environment overlaid on the parent's. Supports ${ENV_VAR} substitution.
   */
  env?: Record<string, string>;

  /** Working directory for the process. */
  cwd?: string;

  /** Whether this server is enabled. Defaults to true. */
  enabled?: boolean;

  /** Free-form note shown in status output. */
  description?: string;
}

/** Lifecycle of one client session. */
export type MCPClientState = "stopped" | "starting" | "initialized" | "running";

export interface MCPTimeouts {
  /** Handshake and tools/list deadline (default 10 s). */
  requestTimeoutMs: number;
  /** tools/call deadline (default 30 s). */
  toolTimeoutMs: number;
  /** Grace period for a clean close before the process is killed (default 5 s). */
  stopTimeoutMs: number;
}

export const DEFAULT_MCP_TIMEOUTS: MCPTimeouts = {
  requestTimeoutMs: 10_000,
  toolTimeoutMs: 30_000,
  stopTimeoutMs: 5_000,
};

/** A tool discovered on a server via tools/list. */
export interface ToolDescriptor {
  serverName: string;
  toolName: string;
  description: string;
  parameterSchema: Record<string, unknown>;
}

/** The `result` of a tools/call. */
export interface MCPToolResult {
  content: unknown[];
  isError: boolean;
}

export interface MCPServerStatus {
  name: string;
  state: MCPClientState;
  toolCount: number;
  description?: string;
}
