/**
 * MCP Session Tests
 *
 * MCPToolClient and MCPOrchestrator against in-process MCP servers linked
 * through the SDK's in-memory transport. No child process is spawned.
 */

import { describe, it, expect, afterEach } from "vitest";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { MCPToolClient } from "./client.js";
import { initEngineLogging, getEngineLogger } from "../logging.js";
import { MCPOrchestrator, findEntityName } from "./orchestrator.js";
import type { TransportFactory } from "./client.js";
import type { MCPServerConfig } from "./types.js";

// ============================================
// HELPERS
// ============================================

type ToolHandler = (args: Record<string, unknown>) => Promise<string>;

interface RecordedCall {
  server: string;
  tool: string;
  args: Record<string, unknown>;
}

const hang: ToolHandler = () => new Promise<string>(() => {});

/**
 * A transport factory that links each client to an in-process server
 * exposing the given tools. Unknown server names fail like a bad spawn.
 */
function fakeServers(servers: Record<string, Record<string, ToolHandler>>) {
  const calls: RecordedCall[] = [];
  const running = new Map<string, Server>();

  const factory: TransportFactory = (config) => {
    const tools = servers[config.name];
    if (!tools) throw new Error(`spawn ${config.command} ENOENT`);

    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
    const server = new Server({ name: `fake-${config.name}`, version: "1.0.0" }, { capabilities: { tools: {} } });

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: Object.keys(tools).map(name => ({
        name,
        description: `${name} tool`,
        inputSchema: { type: "object" as const, properties: {} },
      })),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const args = request.params.arguments ?? {};
      calls.push({ server: config.name, tool: request.params.name, args });
      const handler = tools[request.params.name];
      if (!handler) {
        return { content: [{ type: "text" as const, text: "unknown tool" }], isError: true };
      }
      return { content: [{ type: "text" as const, text: await handler(args) }] };
    });

    void server.connect(serverSide);
    running.set(config.name, server);
    return clientSide;
  };

  return {
    factory,
    calls,
    closeServer: async (name: string) => {
      await running.get(name)?.close();
    },
  };
}

const SEARCH: MCPServerConfig = { name: "web_search", command: "search-server" };
const DATABASE: MCPServerConfig = { name: "database", command: "db-server" };

const FAST = { requestTimeoutMs: 200, toolTimeoutMs: 50, stopTimeoutMs: 200 };

// ============================================
// MCPToolClient
// ============================================

describe("MCPToolClient", () => {
  const clients: MCPToolClient[] = [];

  function makeClient(config: MCPServerConfig, factory: TransportFactory): MCPToolClient {
    const client = new MCPToolClient(config, { timeouts: FAST, transportFactory: factory });
    clients.push(client);
    return client;
  }

  afterEach(async () => {
    await Promise.all(clients.map(c => c.stop()));
    clients.length = 0;
  });

  it("runs the handshake and discovers tools", async () => {
    const { factory } = fakeServers({ web_search: { brave_web_search: async () => "ok" } });
    const client = makeClient(SEARCH, factory);

    expect(client.state).toBe("stopped");
    await expect(client.start()).resolves.toBe(true);
    expect(client.state).toBe("running");
    expect(client.getToolDescriptors()).toEqual([{
      serverName: "web_search",
      toolName: "brave_web_search",
      description: "brave_web_search tool",
      parameterSchema: { type: "object", properties: {} },
    }]);
  });

  it("calls a tool and returns its result", async () => {
    const { factory, calls } = fakeServers({ web_search: { brave_web_search: async args => `found ${String(args.query)}` } });
    const client = makeClient(SEARCH, factory);
    await client.start();

    const result = await client.callTool("brave_web_search", { query: "Acme" });
    expect(result).toEqual({ content: [{ type: "text", text: "found Acme" }], isError: false });
    expect(calls).toEqual([{ server: "web_search", tool: "brave_web_search", args: { query: "Acme" } }]);
  });

  it("passes through a tool-level error", async () => {
    const { factory } = fakeServers({ web_search: {} });
    const client = makeClient(SEARCH, factory);
    await client.start();

    initEngineLogging({ minLevel: "warn", console: false });
    const result = await client.callTool("missing_tool", {});
    expect(result?.isError).toBe(true);
    expect(getEngineLogger().getRecentLogs()).toEqual([
      expect.objectContaining({
        level: "warn",
        component: "engine.mcp.client",
        message: "Tool reported an error",
        data: { server: "web_search", tool: "missing_tool", detail: "unknown tool" },
      }),
    ]);
  });

  it("returns null when a tool call times out and keeps running", async () => {
    const { factory } = fakeServers({ web_search: { brave_web_search: hang } });
    const client = makeClient(SEARCH, factory);
    await client.start();

    await expect(client.callTool("brave_web_search", { query: "Acme" })).resolves.toBeNull();
    expect(client.running).toBe(true);
  });

  it("refuses to start a disabled server", async () => {
    let spawned = false;
    const client = makeClient({ ...SEARCH, enabled: false }, () => {
      spawned = true;
      throw new Error("unreachable");
    });

    await expect(client.start()).resolves.toBe(false);
    expect(spawned).toBe(false);
  });

  it("resolves false when the process cannot be spawned", async () => {
    const { factory } = fakeServers({});
    const client = makeClient(SEARCH, factory);

    await expect(client.start()).resolves.toBe(false);
    expect(client.state).toBe("stopped");
  });

  it("resolves false when the server never answers initialize", async () => {
    const client = makeClient(SEARCH, () => InMemoryTransport.createLinkedPair()[0]);

    await expect(client.start()).resolves.toBe(false);
    expect(client.state).toBe("stopped");
  });

  it("drops to stopped when the server goes away", async () => {
    const { factory, closeServer } = fakeServers({ web_search: { brave_web_search: async () => "ok" } });
    const client = makeClient(SEARCH, factory);
    await client.start();

    await closeServer("web_search");
    expect(client.state).toBe("stopped");
    expect(client.tools).toEqual([]);
    await expect(client.callTool("brave_web_search", {})).resolves.toBeNull();
  });

  it("stops idempotently", async () => {
    const { factory } = fakeServers({ web_search: { brave_web_search: async () => "ok" } });
    const client = makeClient(SEARCH, factory);
    await client.start();

    await client.stop();
    await client.stop();
    expect(client.state).toBe("stopped");
    await expect(client.callTool("brave_web_search", {})).resolves.toBeNull();
  });
});

// ============================================
// MCPOrchestrator
// ============================================

describe("findEntityName", () => {
  it("reads a Chinese or English label", () => {
    expect(findEntityName("请分析\n公司名称：  Acme Ltd \n")).toBe("Acme Ltd");
    expect(findEntityName("company name: Beta Co")).toBe("Beta Co");
  });

  it("prefers the label over the record", () => {
    expect(findEntityName("Company Name: Acme", { company: "Beta" })).toBe("Acme");
  });

  it("uses the first non-blank company-like field of a record", () => {
    expect(findEntityName("Describe.", { 公司简称: "  ", CompanyName: "Gamma" })).toBe("Gamma");
    expect(findEntityName("Describe.", { city: "Oslo" })).toBeNull();
  });
});

describe("MCPOrchestrator", () => {
  const PROMPT = "公司名称：Acme Ltd";
  const orchestrators: MCPOrchestrator[] = [];

  function makeOrchestrator(
    enabled: boolean,
    servers: MCPServerConfig[],
    factory: TransportFactory,
    recordEntityFallback?: boolean,
  ): MCPOrchestrator {
    const orchestrator = new MCPOrchestrator({
      enabled,
      servers,
      clientOptions: { timeouts: FAST, transportFactory: factory },
      recordEntityFallback,
    });
    orchestrators.push(orchestrator);
    return orchestrator;
  }

  afterEach(async () => {
    await Promise.all(orchestrators.map(o => o.shutdown()));
    orchestrators.length = 0;
  });

  it("stays disabled when the feature flag is off", async () => {
    const { factory, calls } = fakeServers({ web_search: { brave_web_search: async () => "ctx" } });
    const orchestrator = makeOrchestrator(false, [SEARCH], factory);

    await expect(orchestrator.start()).resolves.toBe(0);
    expect(orchestrator.isEnabled()).toBe(false);
    await expect(orchestrator.enhancePrompt(PROMPT)).resolves.toBe(PROMPT);
    expect(calls).toEqual([]);
  });

  it("is disabled when no server starts", async () => {
    const { factory } = fakeServers({});
    const orchestrator = makeOrchestrator(true, [SEARCH], factory);

    await expect(orchestrator.start()).resolves.toBe(0);
    expect(orchestrator.isEnabled()).toBe(false);
    await expect(orchestrator.enhancePrompt(PROMPT)).resolves.toBe(PROMPT);
  });

  it("appends search context for a labelled entity", async () => {
    const { factory, calls } = fakeServers({
      web_search: { brave_web_search: async () => "Acme Ltd is a logistics firm." },
    });
    const orchestrator = makeOrchestrator(true, [SEARCH], factory);
    await orchestrator.start();

    const enhanced = await orchestrator.enhancePrompt(PROMPT);
    expect(enhanced).toBe(
      "公司名称：Acme Ltd\n\n【Additional search context】\nAcme Ltd is a logistics firm.\n\n"
      + "Use the search results above when answering.",
    );
    expect(calls).toEqual([{
      server: "web_search",
      tool: "brave_web_search",
      args: { query: "Acme Ltd 公司信息 官网", count: 5 },
    }]);
  });

  it("limits the appended context to 1000 characters", async () => {
    const { factory } = fakeServers({ web_search: { brave_web_search: async () => "y".repeat(1500) } });
    const orchestrator = makeOrchestrator(true, [SEARCH], factory);
    await orchestrator.start();

    const enhanced = await orchestrator.enhancePrompt(PROMPT);
    expect(enhanced).toBe(
      `${PROMPT}\n\n【Additional search context】\n${"y".repeat(1000)}\n\nUse the search results above when answering.`,
    );
  });

  it("falls back to a company field of the record when asked to", async () => {
    const { factory, calls } = fakeServers({ web_search: { brave_web_search: async () => "ctx" } });
    const orchestrator = makeOrchestrator(true, [SEARCH], factory, true);
    await orchestrator.start();

    await orchestrator.enhancePrompt("Describe this row.", { Company: "Beta Co" });
    expect(calls[0]?.args).toEqual({ query: "Beta Co 公司信息 官网", count: 5 });
  });

  it("ignores record fields by default", async () => {
    const { factory, calls } = fakeServers({ web_search: { brave_web_search: async () => "ctx" } });
    const orchestrator = makeOrchestrator(true, [SEARCH], factory);
    await orchestrator.start();

    await expect(orchestrator.enhancePrompt("Describe this row.", { Company: "Beta Co" }))
      .resolves.toBe("Describe this row.");
    expect(calls).toEqual([]);
  });

  it("returns the prompt unchanged when the search times out", async () => {
    const { factory } = fakeServers({ web_search: { brave_web_search: hang } });
    const orchestrator = makeOrchestrator(true, [SEARCH], factory);
    await orchestrator.start();

    await expect(orchestrator.enhancePrompt(PROMPT)).resolves.toBe(PROMPT);
  });

  it("returns the prompt unchanged without an entity", async () => {
    const { factory, calls } = fakeServers({ web_search: { brave_web_search: async () => "ctx" } });
    const orchestrator = makeOrchestrator(true, [SEARCH], factory);
    await orchestrator.start();

    await expect(orchestrator.enhancePrompt("Summarize the row.")).resolves.toBe("Summarize the row.");
    expect(calls).toEqual([]);
  });

  it("routes database queries to the database role", async () => {
    const { factory } = fakeServers({ database: { execute_query: async args => `rows for ${String(args.sql)}` } });
    const orchestrator = makeOrchestrator(true, [DATABASE], factory);
    await orchestrator.start();

    await expect(orchestrator.queryDatabase("SELECT 1")).resolves.toEqual({
      content: [{ type: "text", text: "rows for SELECT 1" }],
      isError: false,
    });
    await expect(orchestrator.searchWeb("Acme")).resolves.toBeNull();
  });

  it("keeps only the servers that started", async () => {
    const { factory } = fakeServers({ web_search: { brave_web_search: async () => "ctx" } });
    const orchestrator = makeOrchestrator(true, [SEARCH, DATABASE], factory);

    await expect(orchestrator.start()).resolves.toBe(1);
    expect(orchestrator.isEnabled()).toBe(true);
    expect(orchestrator.getStatus()).toEqual([{ name: "web_search", state: "running", toolCount: 1 }]);
    expect(orchestrator.getAvailableTools().map(t => t.toolName)).toEqual(["brave_web_search"]);
  });

  it("shuts down repeatedly without error", async () => {
    const { factory } = fakeServers({ web_search: { brave_web_search: async () => "ctx" } });
    const orchestrator = makeOrchestrator(true, [SEARCH], factory);
    await orchestrator.start();

    await orchestrator.shutdown();
    await orchestrator.shutdown();
    expect(orchestrator.isEnabled()).toBe(false);
    expect(orchestrator.getStatus()).toEqual([]);
  });
});
