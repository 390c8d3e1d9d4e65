// ─── Command Catalog ─────────────────────────────────────────────────────────
//
// The closed set of commands the bridge understands. Each entry carries:
//   - a zod raw shape (argument names, types, defaults; key order is the
//     positional parameter order)
//   - the wire id byte used in SysEx envelopes
//   - an optional CC route for commands whose whole payload is one scalar
//   - the description surfaced as the MCP tool description
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Shared Argument Types ───────────────────────────────────────────────────

export const TRANSPORT_ACTIONS = ["play", "stop", "record", "toggle"] as const;
export type TransportAction = (typeof TRANSPORT_ACTIONS)[number];

export const TRACK_TYPES = ["instrument", "audio", "automation"] as const;
export type TrackType = (typeof TRACK_TYPES)[number];

const midiNote = z.number().int().min(0).max(127);
const velocity = z.number().int().min(1).max(127);
const channelIndex = z.number().int().min(0).max(999);
const mixerTrack = z.number().int().min(0).max(125);
const unitLevel = z.number().min(0).max(1);

const MelodyNoteSchema = z.object({
  note: z.union([midiNote, z.string().min(2).max(4)])
    .describe("MIDI number or scientific pitch name (e.g. 'C4', 'F#5')"),
  start_beat: z.number().min(0),
  length_beats: z.number().positive(),
  velocity: velocity.optional(),
});

const AutomationPointSchema = z.object({
  beat: z.number().min(0),
  value: unitLevel,
});

const ArrangementSectionSchema = z.object({
  pattern: z.number().int().min(1).max(999),
  start_bar: z.number().int().min(1),
  length_bars: z.number().int().min(1),
});

export type ArrangementSection = z.infer<typeof ArrangementSectionSchema>;

// ─── Argument Shapes ─────────────────────────────────────────────────────────

export const COMMAND_SHAPES = {
  play_note: {
    note: midiNote.describe("MIDI note number (0-127, 60 = middle C)"),
    velocity: velocity.default(100).describe("Velocity (1-127)"),
    duration_seconds: z.number().positive().max(30).default(0.5).describe("Note length in seconds"),
    channel_index: channelIndex.optional().describe("Channel rack index (default: selected channel)"),
  },
  create_track: {
    track_type: z.enum(TRACK_TYPES).default("instrument").describe("Kind of track to create"),
    name: z.string().min(1).max(64).optional().describe("Display name"),
  },
  load_instrument: {
    instrument: z.string().min(1).max(64).describe("Plugin name, e.g. 'FLEX' or '3x Osc'"),
    channel_index: channelIndex.optional().describe("Target channel (default: new channel)"),
  },
  create_chord_progression: {
    chords: z.array(z.string().min(1).max(12)).min(1).max(64).describe("Chord symbols, e.g. ['C', 'G', 'Am', 'F']"),
    duration_beats: z.number().positive().max(64).default(4).describe("Length of each chord in beats"),
    octave: z.number().int().min(0).max(8).default(4).describe("Octave of the chord roots"),
    velocity: velocity.default(100),
    channel_index: channelIndex.optional().describe("Target channel (default: selected channel)"),
    start_beat: z.number().min(0).default(0).describe("Where the first chord starts"),
  },
  add_midi_effect: {
    channel_index: channelIndex,
    effect: z.string().min(1).max(64).describe("MIDI effect name, e.g. 'Arpeggiator'"),
  },
  create_melody: {
    notes: z.array(MelodyNoteSchema).min(1).max(512),
    channel_index: channelIndex.optional(),
  },
  automate_parameter: {
    target: z.string().min(1).max(64).describe("Parameter to automate, e.g. 'filter_cutoff'"),
    points: z.array(AutomationPointSchema).min(2).max(512),
    channel_index: channelIndex.optional(),
  },
  set_arrangement: {
    sections: z.array(ArrangementSectionSchema).min(1).max(256),
  },
  get_status: {},
  get_channel_names: {},
  get_channel_name: {
    index: channelIndex.describe("Channel rack index"),
  },
  get_channel_count: {},
  select_channel: {
    index: z.number().int().min(0).max(127).describe("Channel rack index"),
  },
  set_channel_volume: {
    index: channelIndex,
    volume: unitLevel.describe("Volume (0.0-1.0)"),
  },
  set_channel_pan: {
    index: channelIndex,
    pan: z.number().min(-1).max(1).describe("Pan (-1.0 left to 1.0 right)"),
  },
  set_channel_mute: {
    index: channelIndex,
    mute: z.boolean(),
  },
  set_channel_solo: {
    index: channelIndex,
    solo: z.boolean(),
  },
  set_mixer_level: {
    track_index: mixerTrack.describe("Mixer track (0 = master)"),
    level: unitLevel.describe("Fader level (0.0-1.0)"),
  },
  add_audio_effect: {
    track_index: mixerTrack,
    effect: z.string().min(1).max(64).describe("Effect plugin name, e.g. 'Fruity Reeverb 2'"),
    slot: z.number().int().min(0).max(9).optional().describe("Effect slot (default: first free)"),
  },
  get_mixer_track_count: {},
  get_mixer_level: {
    track_index: mixerTrack,
  },
  set_master_level: {
    level: unitLevel.describe("Master fader level (0.0-1.0)"),
  },
  set_tempo: {
    bpm: z.number().min(10).max(522).describe("Tempo in BPM"),
  },
  get_tempo: {},
  control_transport: {
    action: z.enum(TRANSPORT_ACTIONS).describe("Transport action"),
  },
  get_is_playing: {},
  select_pattern: {
    pattern: z.number().int().min(1).max(999).describe("Pattern number (1-based)"),
  },
  get_current_pattern: {},
} satisfies Record<string, z.ZodRawShape>;

type Shapes = typeof COMMAND_SHAPES;

/** Every command the bridge can carry. */
export type CommandName = keyof Shapes;

/** Parsed arguments (defaults applied) of one command. */
export type CommandArgs<K extends CommandName> = z.output<z.ZodObject<Shapes[K], "strict">>;

/** Parsed arguments of every command, keyed by name. */
export type CommandArgsMap = { [K in CommandName]: CommandArgs<K> };

/** Arguments as a caller may write them (defaults still optional). */
export type CommandInput<K extends CommandName> = z.input<z.ZodObject<Shapes[K], "strict">>;

// ─── Wire Routing ────────────────────────────────────────────────────────────

/** How a CC value byte represents the command's single argument. */
export type CcEncoding =
  | { kind: "enum"; values: readonly string[] }
  | { kind: "int" }
  | { kind: "range"; min: number; max: number };

export interface CcRoute<K extends CommandName> {
  controller: number;
  param: keyof CommandArgs<K> & string;
  encoding: CcEncoding;
}

export interface CommandSpec<K extends CommandName> {
  name: K;
  /** Command id byte in SysEx envelopes (0x01-0x6F). */
  id: number;
  description: string;
  /** Present when the command travels as a single Control Change. */
  cc?: CcRoute<K>;
}

export type CommandSpecTable = { [K in CommandName]: CommandSpec<K> };

export const COMMAND_SPECS: CommandSpecTable = {
  play_note: {
    name: "play_note", id: 0x01,
    description: "Play a single note on a channel for a duration.",
  },
  create_track: {
    name: "create_track", id: 0x02,
    description: "Create a new track (instrument, audio or automation).",
  },
  load_instrument: {
    name: "load_instrument", id: 0x03,
    description: "Load an instrument plugin into a channel.",
  },
  create_chord_progression: {
    name: "create_chord_progression", id: 0x08,
    description: "Write a chord progression into the channel's pattern, one chord every duration_beats.",
  },
  add_midi_effect: {
    name: "add_midi_effect", id: 0x09,
    description: "Attach a MIDI effect to a channel.",
  },
  create_melody: {
    name: "create_melody", id: 0x0a,
    description: "Write a melody (timed notes) into a channel. Depends on DAW host support.",
  },
  automate_parameter: {
    name: "automate_parameter", id: 0x0b,
    description: "Create an automation curve for a parameter. Depends on DAW host support.",
  },
  set_arrangement: {
    name: "set_arrangement", id: 0x0c,
    description: "Place patterns on the playlist as arrangement sections. Depends on DAW host support.",
  },
  get_status: {
    name: "get_status", id: 0x0d,
    description: "Query the DAW's current state. Depends on DAW host support.",
  },
  get_channel_names: {
    name: "get_channel_names", id: 0x10,
    description: "List the names of all channels in the channel rack.",
  },
  get_channel_name: {
    name: "get_channel_name", id: 0x11,
    description: "Read the name of one channel.",
  },
  get_channel_count: {
    name: "get_channel_count", id: 0x14,
    description: "Count the channels in the channel rack.",
  },
  select_channel: {
    name: "select_channel", id: 0x16,
    description: "Select a channel in the channel rack (exclusive).",
    cc: { controller: 116, param: "index", encoding: { kind: "int" } },
  },
  set_channel_volume: {
    name: "set_channel_volume", id: 0x18,
    description: "Set a channel's volume.",
  },
  set_channel_pan: {
    name: "set_channel_pan", id: 0x1a,
    description: "Set a channel's stereo pan.",
  },
  set_channel_mute: {
    name: "set_channel_mute", id: 0x1c,
    description: "Mute or unmute a channel.",
  },
  set_channel_solo: {
    name: "set_channel_solo", id: 0x1e,
    description: "Solo or unsolo a channel.",
  },
  set_mixer_level: {
    name: "set_mixer_level", id: 0x20,
    description: "Set the fader level of a mixer track.",
  },
  add_audio_effect: {
    name: "add_audio_effect", id: 0x21,
    description: "Insert an audio effect into a mixer track slot.",
  },
  get_mixer_track_count: {
    name: "get_mixer_track_count", id: 0x22,
    description: "Count the mixer tracks, master included.",
  },
  get_mixer_level: {
    name: "get_mixer_level", id: 0x23,
    description: "Read the fader level of a mixer track.",
  },
  set_master_level: {
    name: "set_master_level", id: 0x24,
    description: "Set the master fader level (quantized to 128 steps).",
    cc: { controller: 114, param: "level", encoding: { kind: "range", min: 0, max: 1 } },
  },
  set_tempo: {
    name: "set_tempo", id: 0x30,
    description: "Set the project tempo in BPM.",
  },
  get_tempo: {
    name: "get_tempo", id: 0x31,
    description: "Read the project tempo.",
  },
  control_transport: {
    name: "control_transport", id: 0x32,
    description: "Play, stop, record or toggle playback.",
    cc: { controller: 118, param: "action", encoding: { kind: "enum", values: TRANSPORT_ACTIONS } },
  },
  get_is_playing: {
    name: "get_is_playing", id: 0x33,
    description: "Report whether playback is running.",
  },
  select_pattern: {
    name: "select_pattern", id: 0x34,
    description: "Jump to a pattern (patterns above 127 are clamped on the CC path).",
    cc: { controller: 115, param: "pattern", encoding: { kind: "int" } },
  },
  get_current_pattern: {
    name: "get_current_pattern", id: 0x35,
    description: "Read the currently selected pattern number.",
  },
};

/** Status replies travelling from the device back to the client. */
export const RESPONSE_SUCCESS_ID = 0x70;
export const RESPONSE_ERROR_ID = 0x71;

/** Unsolicited state changes pushed by the device (tempo edited in the DAW, ...). */
export const ASYNC_UPDATE_ID = 0x7f;

/** Tag carried by async updates. Command tags start at 1, so it never collides. */
export const ASYNC_UPDATE_TAG = 0;

export const COMMAND_NAMES: readonly CommandName[] = Object.keys(COMMAND_SPECS).filter(isCommandName);

const NAMES_BY_ID = new Map<number, CommandName>(
  COMMAND_NAMES.map((name) => [COMMAND_SPECS[name].id, name])
);

// ─── Lookups ────────────────────────────────────────────────────────────────

export function isCommandName(value: string): value is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMAND_SPECS, value);
}

export function getCommandSpec<K extends CommandName>(name: K): CommandSpec<K> {
  return COMMAND_SPECS[name];
}

/** Resolve a wire id byte to its command name (undefined for unknown ids). */
export function commandNameForId(id: number): CommandName | undefined {
  return NAMES_BY_ID.get(id);
}

/** Positional parameter order for a command (shape key order). */
export function parameterOrder(name: CommandName): string[] {
  return Object.keys(COMMAND_SHAPES[name]);
}
