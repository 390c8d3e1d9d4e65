// ─── MCP Tools ───────────────────────────────────────────────────────────────
//
// One MCP tool per catalog command, with the catalog's zod shape as its input
// schema, plus list_midi_ports and get_daw_updates. Tool calls go straight to
// a command runner; the StatusResult becomes the tool response.
// ─────────────────────────────────────────────────────────────────────────────

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { COMMAND_NAMES, COMMAND_SHAPES, getCommandSpec } from "./commands/catalog.js";
import { errorMessage } from "./errors.js";
import type { MidiPortList } from "./midi/transport.js";
import type { AsyncUpdate, StatusResult } from "./types.js";

export type CommandRunner = (name: string, args: unknown) => Promise<StatusResult>;

export interface BridgeToolDeps {
  execute: CommandRunner;
  listPorts: () => Promise<MidiPortList>;
  /** Drain the async updates received since the last call, oldest first. */
  takeUpdates: () => AsyncUpdate[];
}

/** Render a StatusResult as an MCP tool response. */
export function toToolResult(result: StatusResult): CallToolResult {
  if (!result.success) {
    return {
      content: [{ type: "text", text: `${result.command} failed: ${result.error ?? "unknown error"}` }],
      isError: true,
    };
  }
  const text = result.data === undefined
    ? `${result.command}: ok`
    : `${result.command}: ok\n${JSON.stringify(result.data, null, 2)}`;
  return { content: [{ type: "text", text }] };
}

export function registerBridgeTools(server: McpServer, deps: BridgeToolDeps): void {
  for (const name of COMMAND_NAMES) {
    const shape: z.ZodRawShape = COMMAND_SHAPES[name];
    server.tool(name, getCommandSpec(name).description, shape, async (args) =>
      toToolResult(await deps.execute(name, args))
    );
  }

  // ─── Tool: get_daw_updates ──────────────────────────────────────────────

  server.tool(
    "get_daw_updates",
    "Return changes the DAW reported on its own (e.g. tempo edits) since the last call.",
    {},
    async () => {
      const updates = deps.takeUpdates();
      const text = updates.length === 0
        ? "No DAW updates."
        : [`${updates.length} update(s):`, ...updates.map((u) => `  ${JSON.stringify(u)}`)].join("\n");
      return { content: [{ type: "text", text }] };
    }
  );

  // ─── Tool: list_midi_ports ──────────────────────────────────────────────

  server.tool(
    "list_midi_ports",
    "List the MIDI input and output ports visible to the bridge.",
    {},
    async () => {
      try {
        const { inputs, outputs } = await deps.listPorts();
        const lines = [
          "Outputs:",
          ...(outputs.length ? outputs.map((p) => `  ${p}`) : ["  (none)"]),
          "Inputs:",
          ...(inputs.length ? inputs.map((p) => `  ${p}`) : ["  (none)"]),
        ];
        return { content: [{ type: "text", text: lines.join("\n") }] };
      } catch (err) {
        return {
          content: [{ type: "text", text: `Could not list MIDI ports: ${errorMessage(err)}` }],
          isError: true,
        };
      }
    }
  );
}
