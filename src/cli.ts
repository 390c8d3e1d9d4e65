#!/usr/bin/env node
// ─── fl-midi-bridge: CLI Entry Point ─────────────────────────────────────────
//
// Usage:
//   fl-midi-bridge                                   # Show help
//   fl-midi-bridge commands                          # List the command catalog
//   fl-midi-bridge ports                             # List available MIDI ports
//   fl-midi-bridge send set_tempo '{"bpm":128}'      # Send over MIDI, print the reply
//   fl-midi-bridge loopback create_chord_progression '[["C","G","Am","F"]]'
//   fl-midi-bridge frame set_master_level '[0.5]'    # Print the wire bytes only
//
// Global flags:
//   --config <path>   Bridge config JSON (default: FL_BRIDGE_CONFIG)
// ─────────────────────────────────────────────────────────────────────────────

import { openBridge, framingFromConfig, type BridgeMode } from "./bridge.js";
import {
  COMMAND_NAMES,
  getCommandSpec,
  parameterOrder,
} from "./commands/catalog.js";
import { createCommand } from "./commands/model.js";
import { loadBridgeConfig } from "./config/loader.js";
import type { BridgeConfig } from "./config/schema.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { encodeCc, isCcCommand } from "./midi/cc.js";
import { frameCommand } from "./midi/sysex.js";
import { listMidiPorts } from "./midi/transport.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

function hex(bytes: readonly number[]): string {
  return bytes.map((b) => b.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

/** Drop `--flag value` pairs, leaving positional arguments. */
function positionals(args: string[], valueFlags: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
      continue;
    }
    out.push(args[i]);
  }
  return out;
}

/** Command arguments from the CLI: a JSON object or array, or nothing. */
function parseArgsJson(raw: string | undefined): unknown {
  if (raw === undefined) return {};
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Arguments must be JSON (object or array): ${errorMessage(err)}`);
  }
}

function requireCommandName(name: string | undefined, usage: string): string {
  if (!name) {
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }
  return name;
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdCommands(): void {
  console.log("\n" + padRight("Command", 28) + padRight("Id", 6) + padRight("Path", 8) + "Parameters");
  console.log("─".repeat(90));
  for (const name of COMMAND_NAMES) {
    const spec = getCommandSpec(name);
    const path = spec.cc ? `CC${spec.cc.controller}` : "SysEx";
    console.log(
      padRight(name, 28) +
        padRight(`0x${spec.id.toString(16).padStart(2, "0")}`, 6) +
        padRight(path, 8) +
        parameterOrder(name).join(", ")
    );
  }
  console.log(`\n${COMMAND_NAMES.length} command(s).\n`);
}

async function cmdPorts(): Promise<void> {
  const { inputs, outputs } = await listMidiPorts();
  console.log("\nMIDI outputs:");
  for (const port of outputs) console.log(`  ${port}`);
  if (outputs.length === 0) console.log("  (none)");
  console.log("MIDI inputs:");
  for (const port of inputs) console.log(`  ${port}`);
  if (inputs.length === 0) console.log("  (none)");
  console.log("");
}

function cmdFrame(args: string[], config: BridgeConfig): void {
  const name = requireCommandName(args[0], "fl-midi-bridge frame <command> [json-args]");
  const command = createCommand(name, parseArgsJson(args[1]));

  if (isCcCommand(command)) {
    console.log(`CC  ${hex(encodeCc(command, config.midi_channel))}`);
    return;
  }
  const messages = frameCommand(command, 1, framingFromConfig(config));
  messages.forEach((message, i) => {
    console.log(`SysEx ${i + 1}/${messages.length} (${message.length} bytes)  ${hex(message)}`);
  });
}

async function cmdSend(args: string[], config: BridgeConfig, mode: BridgeMode): Promise<boolean> {
  const name = requireCommandName(args[0], `fl-midi-bridge ${mode === "loopback" ? "loopback" : "send"} <command> [json-args]`);
  const logger = createLogger({ level: config.log_level });
  const bridge = await openBridge(config, { mode, logger });
  try {
    const result = await bridge.client.execute(name, parseArgsJson(args[1]));
    console.log(JSON.stringify(result, null, 2));
    return result.success;
  } finally {
    await bridge.close();
  }
}

function cmdHelp(): void {
  console.log(`
fl-midi-bridge: drive a DAW scripting host over virtual MIDI ports

Usage:
  fl-midi-bridge commands                        List the command catalog
  fl-midi-bridge ports                           List MIDI input/output ports
  fl-midi-bridge send <command> [json-args]      Send a command, print the status reply
  fl-midi-bridge loopback <command> [json-args]  Run a command against the virtual DAW
  fl-midi-bridge frame <command> [json-args]     Print the MIDI bytes for a command
  fl-midi-bridge help                            Show this help

Arguments are a JSON object keyed by parameter name, or a JSON array in
parameter order (see 'commands').

Options:
  --config <path>            Bridge config JSON (or FL_BRIDGE_CONFIG)

Environment:
  FL_BRIDGE_<KEY>            Override a config key, e.g. FL_BRIDGE_MAX_CHUNK_BYTES=64
  LOG_LEVEL, PINO_PRETTY=1   Logging (stderr)
`);
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const config = loadBridgeConfig({ path: getFlag(argv, "--config") });
  const args = positionals(argv, ["--config"]);
  const command = args[0] ?? "help";

  switch (command) {
    case "commands":
      cmdCommands();
      break;
    case "ports":
      await cmdPorts();
      break;
    case "frame":
      cmdFrame(args.slice(1), config);
      break;
    case "send":
      if (!(await cmdSend(args.slice(1), config, "midi"))) process.exitCode = 1;
      break;
    case "loopback":
      if (!(await cmdSend(args.slice(1), config, "loopback"))) process.exitCode = 1;
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'fl-midi-bridge help' for usage.`);
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exit(1);
});
