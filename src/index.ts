// ─── fl-midi-bridge ──────────────────────────────────────────────────────────
//
// Command bridge between an AI tool server and a DAW scripting host over
// virtual MIDI ports: Control Change for scalar commands, chunked SysEx with
// status replies for everything else.
//
// Usage:
//   import { openBridge, loadBridgeConfig, createLogger } from "flstudio-midi-bridge";
//   const bridge = await openBridge(loadBridgeConfig(), { mode: "midi", logger: createLogger() });
//   await bridge.client.execute("set_tempo", { bpm: 128 });
// ─────────────────────────────────────────────────────────────────────────────

// Command catalog & model
export {
  COMMAND_NAMES,
  COMMAND_SHAPES,
  COMMAND_SPECS,
  TRANSPORT_ACTIONS,
  TRACK_TYPES,
  getCommandSpec,
  commandNameForId,
  parameterOrder,
  isCommandName,
} from "./commands/catalog.js";
export type {
  CommandName,
  CommandArgs,
  CommandArgsMap,
  CommandInput,
  CommandSpec,
  TransportAction,
  TrackType,
} from "./commands/catalog.js";
export { createCommand, commandFromWire, type Command } from "./commands/model.js";

// Wire codecs
export { encodeCc, decodeCc, isCcCommand } from "./midi/cc.js";
export {
  frameCommand,
  frameStatus,
  frameUpdate,
  parseEnvelope,
  type ChunkEnvelope,
  type FramingOptions,
} from "./midi/sysex.js";
export { pack7, unpack7 } from "./midi/seven-bit.js";
export { canonicalJson } from "./midi/canonical-json.js";
export { SysExReassembler, type ReassemblyResult } from "./midi/reassembler.js";
export { TagAllocator } from "./midi/tags.js";

// Transports
export {
  createNodeMidiTransport,
  createLoopbackPair,
  createMockTransport,
  listMidiPorts,
  type MockTransport,
  type MidiPortList,
} from "./midi/transport.js";

// Both ends of the bridge
export { BridgeClient, type BridgeClientOptions } from "./client.js";
export { DeviceSession, type DeviceSessionOptions } from "./device.js";
export { Dispatcher } from "./dispatcher/dispatcher.js";
export { VirtualDaw } from "./daw/virtual-daw.js";
export { openBridge, type Bridge, type BridgeMode } from "./bridge.js";
export { registerBridgeTools } from "./tools.js";

// Config, logging, errors
export { loadBridgeConfig } from "./config/loader.js";
export { BridgeConfigSchema, defaultConfig, parseBridgeConfig, type BridgeConfig } from "./config/schema.js";
export { createLogger, silentLogger } from "./logger.js";
export {
  BridgeError,
  ValidationError,
  PayloadTooLargeError,
  TransportError,
  ReassemblyTimeout,
  DawApiError,
} from "./errors.js";

// Music helpers
export { chordToMidi, parseChordSymbol } from "./music/chord-symbols.js";
export { parseNoteToMidi, midiToNoteName } from "./music/note-parser.js";

export type {
  AsyncUpdate,
  UpdateListener,
  StatusResult,
  MidiTransport,
  MidiStatus,
  DawApi,
  DawStatus,
  PlacedNote,
} from "./types.js";
