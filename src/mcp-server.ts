#!/usr/bin/env node
// ─── fl-midi-bridge: MCP Server ──────────────────────────────────────────────
//
// Exposes every bridge command as an MCP tool over stdio. MIDI ports are
// opened on the first tool call, so the server starts even when the virtual
// MIDI buses are not up yet.
//
// Usage:
//   node dist/mcp-server.js                    # real MIDI ports
//   node dist/mcp-server.js --loopback         # in-process virtual DAW
//   node dist/mcp-server.js --config bridge.json
//
// Environment:
//   FL_BRIDGE_CONFIG     config file path
//   FL_BRIDGE_LOOPBACK=1 same as --loopback
//   FL_BRIDGE_<KEY>      override a config key, e.g. FL_BRIDGE_MIDI_CHANNEL=2
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { openBridge, type Bridge, type BridgeMode } from "./bridge.js";
import { loadBridgeConfig } from "./config/loader.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { listMidiPorts } from "./midi/transport.js";
import { registerBridgeTools } from "./tools.js";
import type { AsyncUpdate, StatusResult } from "./types.js";

/** Async updates kept for get_daw_updates; older ones are dropped first. */
const MAX_BUFFERED_UPDATES = 100;

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const config = loadBridgeConfig({ path: getFlag(argv, "--config") });
  const logger = createLogger({ level: config.log_level });
  const mode: BridgeMode =
    argv.includes("--loopback") || process.env.FL_BRIDGE_LOOPBACK === "1" ? "loopback" : "midi";

  let bridge: Promise<Bridge> | null = null;
  const updates: AsyncUpdate[] = [];

  async function connectBridge(): Promise<Bridge> {
    const open = await openBridge(config, { mode, logger });
    open.client.onUpdate((update) => {
      updates.push(update);
      if (updates.length > MAX_BUFFERED_UPDATES) updates.shift();
    });
    return open;
  }

  async function execute(name: string, args: unknown): Promise<StatusResult> {
    bridge ??= connectBridge();
    let open: Bridge;
    try {
      open = await bridge;
    } catch (err) {
      bridge = null;
      logger.error({ err }, "could not open the bridge");
      return { command: name, success: false, error: errorMessage(err) };
    }
    return open.client.execute(name, args);
  }

  const server = new McpServer({
    name: "fl-midi-bridge",
    version: "0.1.0",
  });
  registerBridgeTools(server, {
    execute,
    listPorts: listMidiPorts,
    takeUpdates: () => updates.splice(0),
  });

  const shutdown = async (): Promise<void> => {
    if (bridge) {
      const open = await bridge.catch(() => null);
      await open?.close();
    }
    await server.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await server.connect(new StdioServerTransport());
  logger.info({ mode }, "fl-midi-bridge MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
