/**
 * MCP Orchestrator
 *
 * Owns one MCPToolClient per configured, enabled server, keyed by role
 * (the server name). The query engine only sees enhancePrompt(): every
 * failure on the way degrades to the unmodified prompt.
 */

import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { MCPToolClient } from "./client.js";
import { extractText } from "./content.js";
import type { MCPToolClientOptions } from "./client.js";
import type { MCPServerConfig, MCPServerStatus, MCPToolResult, ToolDescriptor } from "./types.js";
import type { InputRecord } from "../types.js";

const log = createComponentLogger("mcp.orchestrator");

export const WEB_SEARCH_ROLE = "web_search";
export const DATABASE_ROLE = "database";

/** Characters of search output appended to a prompt. */
export const SEARCH_CONTEXT_LIMIT = 1000;

/** `公司名称：Acme` / `Company Name: Acme` on its own line. */
const ENTITY_LABEL = /(?:公司名称|Company Name)\s*[：:]\s*([^\n]+)/i;
const SEARCH_SUFFIX = "公司信息 官网";
const COMPANY_KEY = /公司|company/i;

/**
 * Entity named by the prompt's label. When a record is passed, a company-like
 * field of it is used if the prompt has no label.
 */
export function findEntityName(prompt: string, input?: InputRecord): string | null {
  const labelled = ENTITY_LABEL.exec(prompt)?.[1]?.trim();
  if (labelled) return labelled;
  if (!input) return null;
  const record = input;
  const key = Object.keys(record).find(k => COMPANY_KEY.test(k) && record[k]?.trim());
  return key === undefined ? null : record[key]?.trim() ?? null;
}

export interface RoleTools {
  webSearch: string;
  database: string;
}

export const DEFAULT_ROLE_TOOLS: RoleTools = {
  webSearch: "brave_web_search",
  database: "execute_query",
};

export interface MCPOrchestratorOptions {
  /** Feature flag; when false no server is ever started. */
  enabled: boolean;
  servers: MCPServerConfig[];
  roleTools?: Partial<RoleTools>;
  clientOptions?: MCPToolClientOptions;
  /** Look up a company-like record field when the prompt has no entity label (default: false) */
  recordEntityFallback?: boolean;
}

export class MCPOrchestrator {
  private clients = new Map<string, MCPToolClient>();
  private readonly flag: boolean;
  private readonly configs: MCPServerConfig[];
  private readonly roleTools: RoleTools;
  private readonly clientOptions: MCPToolClientOptions;
  private readonly recordEntityFallback: boolean;

  constructor(options: MCPOrchestratorOptions) {
    this.flag = options.enabled;
    this.configs = options.servers;
    this.roleTools = { ...DEFAULT_ROLE_TOOLS, ...options.roleTools };
    this.clientOptions = options.clientOptions ?? {};
    this.recordEntityFallback = options.recordEntityFallback ?? false;
  }

  /**
   * Start every enabled server concurrently. Servers that fail to start are
   * not kept. Resolves the number running.
   */
  async start(): Promise<number> {
    if (!this.flag) {
      log.debug("MCP disabled by configuration");
      return 0;
    }

    const candidates = this.configs.filter(c => c.enabled !== false && !this.clients.has(c.name));
    if (candidates.length === 0) return this.clients.size;

    log.info("Starting MCP servers", { count: candidates.length });

    const results = await Promise.allSettled(
      candidates.map(async config => {
        const client = new MCPToolClient(config, this.clientOptions);
        const started = await client.start();
        return { client, started };
      }),
    );

    for (const result of results) {
      if (result.status === "fulfilled" && result.value.started) {
        this.clients.set(result.value.client.name, result.value.client);
      } else if (result.status === "rejected") {
        log.error("MCP server start threw", result.reason);
      }
    }

    log.info("MCP servers ready", { running: this.clients.size, configured: candidates.length });
    return this.clients.size;
  }

  /** Feature flag set AND at least one server running. */
  isEnabled(): boolean {
    if (!this.flag) return false;
    for (const client of this.clients.values()) {
      if (client.running) return true;
    }
    return false;
  }

  private runningClient(role: string): MCPToolClient | null {
    if (!this.isEnabled()) return null;
    const client = this.clients.get(role);
    return client?.running ? client : null;
  }

  /** Search results as text, or null. */
  async searchWeb(query: string): Promise<string | null> {
    const client = this.runningClient(WEB_SEARCH_ROLE);
    if (!client) return null;

    const result = await client.callTool(this.roleTools.webSearch, { query, count: 5 });
    if (!result || result.isError) return null;
    return extractText(result.content);
  }

  async queryDatabase(sql: string): Promise<MCPToolResult | null> {
    const client = this.runningClient(DATABASE_ROLE);
    if (!client) return null;
    return client.callTool(this.roleTools.database, { sql });
  }

  /**
   * Append web search context for the entity the prompt (or the record)
   * names. Returns the prompt unchanged when no entity is found, no search
   * server runs, the search yields nothing, or anything throws.
   */
  async enhancePrompt(prompt: string, input?: InputRecord): Promise<string> {
    if (!this.isEnabled()) return prompt;

    try {
      const entity = findEntityName(prompt, this.recordEntityFallback ? input : undefined);
      if (!entity) return prompt;

      const context = await this.searchWeb(`${entity} ${SEARCH_SUFFIX}`);
      if (!context) return prompt;

      log.debug("Prompt enhanced with search context", {
        entity,
        chars: Math.min(context.length, SEARCH_CONTEXT_LIMIT),
      });
      return [
        prompt,
        "",
        "【Additional search context】",
        context.substring(0, SEARCH_CONTEXT_LIMIT),
        "",
        "Use the search results above when answering.",
      ].join("\n");
    } catch (err) {
      log.warn("Prompt enhancement failed", { error: errorMessage(err) });
      return prompt;
    }
  }

  /** Tools of every running server. */
  getAvailableTools(): ToolDescriptor[] {
    return [...this.clients.values()]
      .filter(client => client.running)
      .flatMap(client => client.getToolDescriptors());
  }

  getStatus(): MCPServerStatus[] {
    return [...this.clients.values()].map(client => client.getStatus());
  }

  /** Stop every server. Safe to call repeatedly. */
  async shutdown(): Promise<void> {
    if (this.clients.size === 0) return;
    const clients = [...this.clients.values()];
    this.clients.clear();
    await Promise.allSettled(clients.map(client => client.stop()));
    log.info("All MCP servers stopped", { count: clients.length });
  }
}
