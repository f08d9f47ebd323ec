/**
 * MCP Tool Client
 *
 * Wraps the @modelcontextprotocol/sdk Client for one stdio MCP server.
 * The SDK frames newline-delimited JSON-RPC on the child's stdin/stdout and
 * matches responses to requests by id, so interleaved notifications and
 * out-of-order replies are handled below this class.
 *
 *   stopped --start()--> starting --initialize ok--> initialized --tools/list ok--> running
 *
 * Nothing here throws at callers: start() resolves false, callTool()
 * resolves null, and any transport failure drops the client back to
 * "stopped".
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { isPlainObject } from "../types.js";
import { errorDetail } from "./content.js";
import { resolveEnvRecord } from "./loader.js";
import { DEFAULT_MCP_TIMEOUTS } from "./types.js";
import type {
  MCPClientState,
  MCPServerConfig,
  MCPServerStatus,
  MCPTimeouts,
  MCPToolResult,
  ToolDescriptor,
} from "./types.js";

const log = createComponentLogger("mcp.client");

export const CLIENT_INFO = { name: "rowfill", version: "0.1.0" };

/** Builds the transport for a server; the default spawns it over stdio. */
export type TransportFactory = (config: MCPServerConfig) => Transport;

export interface MCPToolClientOptions {
  timeouts?: Partial<MCPTimeouts>;
  transportFactory?: TransportFactory;
}

// ============================================
// HELPERS
// ============================================

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  const timerPromise = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(new Error(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timerPromise]);
  } finally {
    if (timeout !== undefined) clearTimeout(timeout);
  }
}

/** Parent environment with the server's overrides (${VAR} resolved) on top. */
/** Child process environment: the parent's, with the resolved overrides on top. */
export function overlayEnv(
  overrides: Record<string, string> | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const base: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) base[key] = value;
  }
  return overrides ? { ...base, ...resolveEnvRecord(overrides, env) } : base;
}

function stdioTransport(config: MCPServerConfig): Transport {
  const transport = new StdioClientTransport({
    command: config.command,
    args: config.args ?? [],
    env: overlayEnv(config.env),
    cwd: config.cwd,
    stderr: "pipe",
  });
  transport.stderr?.on("data", (chunk: Buffer) => {
    log.debug("Server stderr", { server: config.name, output: chunk.toString("utf8").trim() });
  });
  return transport;
}

function toToolResult(raw: unknown): MCPToolResult | null {
  if (!isPlainObject(raw) || !Array.isArray(raw.content)) return null;
  return { content: raw.content, isError: raw.isError === true };
}

// ============================================
// CLIENT
// ============================================

export class MCPToolClient {
  private client: Client | null = null;
  private transport: Transport | null = null;
  private _state: MCPClientState = "stopped";
  private _tools: ToolDescriptor[] = [];
  private timeouts: MCPTimeouts;
  private transportFactory: TransportFactory;

  constructor(
    public readonly config: MCPServerConfig,
    options: MCPToolClientOptions = {},
  ) {
    this.timeouts = { ...DEFAULT_MCP_TIMEOUTS, ...options.timeouts };
    this.transportFactory = options.transportFactory ?? stdioTransport;
  }

  get name(): string {
    return this.config.name;
  }

  get state(): MCPClientState {
    return this._state;
  }

  get running(): boolean {
    return this._state === "running";
  }

  /** Tools discovered at start; empty unless running. */
  get tools(): readonly ToolDescriptor[] {
    return this._tools;
  }

  getToolDescriptors(): ToolDescriptor[] {
    return [...this._tools];
  }

  getStatus(): MCPServerStatus {
    return {
      name: this.name,
      state: this._state,
      toolCount: this._tools.length,
      description: this.config.description,
    };
  }

  /**
   * Spawn the server, run the initialize handshake and discover its tools.
   * Resolves true once running; false (logged) on any failure.
   */
  async start(): Promise<boolean> {
    if (this.config.enabled === false) {
      log.warn("Refusing to start disabled server", { server: this.name });
      return false;
    }
    if (this._state !== "stopped") {
      return this.running;
    }

    this._state = "starting";
    const client = new Client(CLIENT_INFO, { capabilities: {} });

    client.onerror = (err: Error) => {
      log.warn("Transport error", { server: this.name, error: err.message });
    };
    client.onclose = () => {
      // Only react to the session this client still owns
      if (this.client !== client) return;
      log.warn("Server connection closed", { server: this.name, state: this._state });
      this.release();
    };

    try {
      const transport = this.transportFactory(this.config);
      this.client = client;
      this.transport = transport;

      await withTimeout(client.connect(transport), this.timeouts.requestTimeoutMs, "initialize");
      this._state = "initialized";

      const listed = await client.listTools(undefined, { timeout: this.timeouts.requestTimeoutMs });
      this._tools = listed.tools.map(tool => ({
        serverName: this.name,
        toolName: tool.name,
        description: tool.description ?? "",
        parameterSchema: isPlainObject(tool.inputSchema) ? tool.inputSchema : {},
      }));
      this._state = "running";

      log.info("MCP server running", { server: this.name, tools: this._tools.length });
      return true;
    } catch (err) {
      log.error("MCP server failed to start", err, { server: this.name, state: this._state });
      await this.stop();
      return false;
    }
  }

  /**
   * Invoke a tool. Resolves the call's result, or null when the client is
   * not running, the call times out, or the reply is malformed.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult | null> {
    const client = this.client;
    if (!client || this._state !== "running") {
      log.debug("Tool call on a server that is not running", { server: this.name, tool: name, state: this._state });
      return null;
    }

    try {
      const raw: unknown = await client.callTool(
        { name, arguments: args },
        undefined,
        { timeout: this.timeouts.toolTimeoutMs },
      );
      const result = toToolResult(raw);
      if (!result) {
        log.warn("Malformed tools/call result", { server: this.name, tool: name });
        return null;
      }
      if (result.isError) {
        log.warn("Tool reported an error", { server: this.name, tool: name, detail: errorDetail(result.content) });
      }
      return result;
    } catch (err) {
      log.warn("Tool call failed", { server: this.name, tool: name, error: errorMessage(err) });
      return null;
    }
  }

  /**
   * Close the session. Idempotent. A server that does not exit within
   * stopTimeoutMs is killed.
   */
  async stop(): Promise<void> {
    const client = this.client;
    const transport = this.transport;
    this.release();
    if (!client) return;

    const pid = transport instanceof StdioClientTransport ? transport.pid : null;
    try {
      await withTimeout(client.close(), this.timeouts.stopTimeoutMs, "close");
      log.debug("MCP server stopped", { server: this.name });
    } catch (err) {
      log.warn("MCP server did not close cleanly", { server: this.name, error: errorMessage(err) });
      if (pid !== null) {
        this.kill(pid);
      }
    }
  }

  private release(): void {
    this.client = null;
    this.transport = null;
    this._tools = [];
    this._state = "stopped";
  }

  private kill(pid: number): void {
    try {
      process.kill(pid, "SIGKILL");
      log.warn("Killed MCP server process", { server: this.name, pid });
    } catch (err) {
      log.debug("Kill failed, process already gone", { server: this.name, pid, error: errorMessage(err) });
    }
  }
}
