import { describe, it, expect, vi, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { COMMAND_NAMES } from "./commands/catalog.js";
import { registerBridgeTools, toToolResult, type BridgeToolDeps } from "./tools.js";
import type { StatusResult } from "./types.js";

describe("toToolResult", () => {
  it("renders data as indented JSON", () => {
    expect(toToolResult({ command: "get_tempo", success: true, data: { bpm: 120 } })).toEqual({
      content: [{ type: "text", text: 'get_tempo: ok\n{\n  "bpm": 120\n}' }],
    });
  });

  it("marks failures as tool errors", () => {
    expect(toToolResult({ command: "set_tempo", success: false, error: "Timed out" })).toEqual({
      content: [{ type: "text", text: "set_tempo failed: Timed out" }],
      isError: true,
    });
  });
});

describe("registerBridgeTools", () => {
  const closers: (() => Promise<void>)[] = [];

  afterEach(async () => {
    for (const close of closers.splice(0)) await close();
  });

  async function connect(deps: BridgeToolDeps): Promise<Client> {
    const server = new McpServer({ name: "test-bridge", version: "0.0.0" });
    registerBridgeTools(server, deps);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    closers.push(() => client.close(), () => server.close());
    return client;
  }

  it("exposes one tool per command plus the port and update tools", async () => {
    const client = await connect({
      execute: vi.fn(),
      listPorts: async () => ({ inputs: [], outputs: [] }),
      takeUpdates: () => [],
    });
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(
      [...COMMAND_NAMES, "get_daw_updates", "list_midi_ports"].sort()
    );
  });

  it("passes validated arguments to the runner", async () => {
    const execute = vi.fn(async (name: string): Promise<StatusResult> => ({
      command: name,
      success: true,
      data: { bpm: 128 },
    }));
    const client = await connect({
      execute,
      listPorts: async () => ({ inputs: [], outputs: [] }),
      takeUpdates: () => [],
    });

    const result = await client.callTool({ name: "set_tempo", arguments: { bpm: 128 } });

    expect(execute).toHaveBeenCalledWith("set_tempo", { bpm: 128 });
    expect(result.content).toEqual([{ type: "text", text: 'set_tempo: ok\n{\n  "bpm": 128\n}' }]);
  });

  it("lists MIDI ports", async () => {
    const client = await connect({
      execute: vi.fn(),
      listPorts: async () => ({ inputs: ["IAC Driver Bus 1"], outputs: ["IAC Driver MCP Bridge"] }),
      takeUpdates: () => [],
    });
    const result = await client.callTool({ name: "list_midi_ports", arguments: {} });
    expect(result.content).toEqual([
      {
        type: "text",
        text: "Outputs:\n  IAC Driver MCP Bridge\nInputs:\n  IAC Driver Bus 1",
      },
    ]);
  });

  it("reports a missing MIDI backend as a tool error", async () => {
    const client = await connect({
      execute: vi.fn(),
      listPorts: async () => {
        throw new Error("node-midi is not available");
      },
      takeUpdates: () => [],
    });
    const result = await client.callTool({ name: "list_midi_ports", arguments: {} });
    expect(result.isError).toBe(true);
  });

  it("drains DAW updates", async () => {
    const queue: Record<string, unknown>[] = [{ tempo: 128 }, { tempo: 130.5 }];
    const client = await connect({
      execute: vi.fn(),
      listPorts: async () => ({ inputs: [], outputs: [] }),
      takeUpdates: () => queue.splice(0),
    });

    const first = await client.callTool({ name: "get_daw_updates", arguments: {} });
    expect(first.content).toEqual([
      { type: "text", text: '2 update(s):\n  {"tempo":128}\n  {"tempo":130.5}' },
    ]);

    const second = await client.callTool({ name: "get_daw_updates", arguments: {} });
    expect(second.content).toEqual([{ type: "text", text: "No DAW updates." }]);
  });
});
