// ─── Command Model ───────────────────────────────────────────────────────────
//
// Validated, immutable commands. A command is one case of a tagged union keyed
// by name, so `command.name === "set_tempo"` narrows `command.args` to
// `{ bpm: number }`.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ValidationError } from "../errors.js";
import {
  COMMAND_SHAPES,
  commandNameForId,
  isCommandName,
  parameterOrder,
  type CommandArgsMap,
  type CommandInput,
  type CommandName,
} from "./catalog.js";

/**
 * A validated command. `Command` alone is the union over every name;
 * `Command<"set_tempo">` is the single case.
 */
export type Command<K extends CommandName = CommandName> = {
  [P in K]: { readonly name: P; readonly args: CommandArgsMap[P] };
}[K];

type SchemaTable = {
  [K in CommandName]: z.ZodType<CommandArgsMap[K], z.ZodTypeDef, unknown>;
};

function strictObject<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).strict();
}

const COMMAND_SCHEMAS: SchemaTable = {
  play_note: strictObject(COMMAND_SHAPES.play_note),
  create_track: strictObject(COMMAND_SHAPES.create_track),
  load_instrument: strictObject(COMMAND_SHAPES.load_instrument),
  create_chord_progression: strictObject(COMMAND_SHAPES.create_chord_progression),
  add_midi_effect: strictObject(COMMAND_SHAPES.add_midi_effect),
  create_melody: strictObject(COMMAND_SHAPES.create_melody),
  automate_parameter: strictObject(COMMAND_SHAPES.automate_parameter),
  set_arrangement: strictObject(COMMAND_SHAPES.set_arrangement),
  get_status: strictObject(COMMAND_SHAPES.get_status),
  get_channel_names: strictObject(COMMAND_SHAPES.get_channel_names),
  get_channel_name: strictObject(COMMAND_SHAPES.get_channel_name),
  get_channel_count: strictObject(COMMAND_SHAPES.get_channel_count),
  select_channel: strictObject(COMMAND_SHAPES.select_channel),
  set_channel_volume: strictObject(COMMAND_SHAPES.set_channel_volume),
  set_channel_pan: strictObject(COMMAND_SHAPES.set_channel_pan),
  set_channel_mute: strictObject(COMMAND_SHAPES.set_channel_mute),
  set_channel_solo: strictObject(COMMAND_SHAPES.set_channel_solo),
  set_mixer_level: strictObject(COMMAND_SHAPES.set_mixer_level),
  add_audio_effect: strictObject(COMMAND_SHAPES.add_audio_effect),
  get_mixer_track_count: strictObject(COMMAND_SHAPES.get_mixer_track_count),
  get_mixer_level: strictObject(COMMAND_SHAPES.get_mixer_level),
  set_master_level: strictObject(COMMAND_SHAPES.set_master_level),
  set_tempo: strictObject(COMMAND_SHAPES.set_tempo),
  get_tempo: strictObject(COMMAND_SHAPES.get_tempo),
  control_transport: strictObject(COMMAND_SHAPES.control_transport),
  get_is_playing: strictObject(COMMAND_SHAPES.get_is_playing),
  select_pattern: strictObject(COMMAND_SHAPES.select_pattern),
  get_current_pattern: strictObject(COMMAND_SHAPES.get_current_pattern),
};

// ─── Construction ────────────────────────────────────────────────────────────

/**
 * Build a validated command.
 *
 * `args` is either an object keyed by parameter name or a positional array
 * in catalog order: `createCommand("set_mixer_level", [0, 0.8])` equals
 * `createCommand("set_mixer_level", { track_index: 0, level: 0.8 })`.
 *
 * @throws ValidationError for an unknown name or arguments that do not match.
 */
export function createCommand<K extends CommandName>(
  name: K,
  args?: CommandInput<K> | readonly unknown[]
): Command<K>;
export function createCommand(name: string, args?: unknown): Command;
export function createCommand(name: string, args: unknown = {}): Command {
  if (!isCommandName(name)) {
    throw new ValidationError(`unknown command "${name}"`);
  }
  return buildCommand(name, args);
}

/**
 * Rebuild a command from a SysEx command id and its decoded JSON payload.
 *
 * @throws ValidationError for an unknown id or a payload that fails the schema.
 */
export function commandFromWire(commandId: number, payload: unknown): Command {
  const name = commandNameForId(commandId);
  if (!name) {
    throw new ValidationError(`unknown command id 0x${commandId.toString(16).padStart(2, "0")}`);
  }
  return buildCommand(name, payload);
}

function buildCommand<K extends CommandName>(name: K, args: unknown): Command<K> {
  const input = Array.isArray(args) ? positionalToNamed(name, args) : args ?? {};
  const result = COMMAND_SCHEMAS[name].safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "args"}: ${issue.message}`
    );
    throw new ValidationError(`Invalid arguments for ${name}: ${issues.join("; ")}`, issues);
  }
  return deepFreeze({ name, args: result.data });
}

function positionalToNamed(name: CommandName, values: readonly unknown[]): Record<string, unknown> {
  const order = parameterOrder(name);
  if (values.length > order.length) {
    throw new ValidationError(
      `${name} takes at most ${order.length} argument(s), got ${values.length}`
    );
  }
  const named: Record<string, unknown> = {};
  values.forEach((value, i) => {
    if (value !== undefined) named[order[i]] = value;
  });
  return named;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
