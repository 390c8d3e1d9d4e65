// ─── Control Change Codec ────────────────────────────────────────────────────
//
// Commands whose whole payload is one scalar ride on a single CC message:
//
//   [0xB0 | channel, controller, value]
//
// Values are clamped/quantized into 0-127, so this path is lossy by design.
// No chunking and no acknowledgement.
// ─────────────────────────────────────────────────────────────────────────────

import {
  COMMAND_NAMES,
  COMMAND_SPECS,
  type CcEncoding,
  type CommandName,
} from "../commands/catalog.js";
import { createCommand, type Command } from "../commands/model.js";
import { ValidationError } from "../errors.js";

export const CC_STATUS = 0xb0;

/** A CC route with its parameter name widened to string. */
export interface CcBinding {
  controller: number;
  param: string;
  encoding: CcEncoding;
}

export function ccRouteFor(name: CommandName): CcBinding | undefined {
  return COMMAND_SPECS[name].cc;
}

const NAMES_BY_CONTROLLER = new Map<number, CommandName>();
for (const name of COMMAND_NAMES) {
  const route = ccRouteFor(name);
  if (route) NAMES_BY_CONTROLLER.set(route.controller, name);
}

/** True when the command travels as a single CC message. */
export function isCcCommand(command: Command): boolean {
  return ccRouteFor(command.name) !== undefined;
}

// ─── Encode ─────────────────────────────────────────────────────────────────

/**
 * Encode a CC-routed command as one 3-byte message.
 * @throws ValidationError when the command has no CC route.
 */
export function encodeCc(command: Command, channel: number = 0): number[] {
  const route = ccRouteFor(command.name);
  if (!route) {
    throw new ValidationError(`${command.name} is not carried over Control Change`);
  }
  if (!Number.isInteger(channel) || channel < 0 || channel > 15) {
    throw new RangeError(`MIDI channel must be 0-15: got ${channel}`);
  }
  const raw: unknown = Reflect.get(command.args, route.param);
  return [CC_STATUS | channel, route.controller, toValueByte(raw, route.encoding)];
}

function toValueByte(raw: unknown, encoding: CcEncoding): number {
  switch (encoding.kind) {
    case "enum": {
      const index = encoding.values.indexOf(String(raw));
      if (index < 0 || index > 127) {
        throw new ValidationError(`"${String(raw)}" is not one of: ${encoding.values.join(", ")}`);
      }
      return index;
    }
    case "int":
      return clampByte(Math.round(Number(raw)));
    case "range": {
      const x = Math.min(Math.max(Number(raw), encoding.min), encoding.max);
      return clampByte(Math.round(((x - encoding.min) / (encoding.max - encoding.min)) * 127));
    }
  }
}

function clampByte(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(value, 0), 127);
}

// ─── Decode ─────────────────────────────────────────────────────────────────

/**
 * Decode one inbound message on `channel`.
 *
 * Returns null for anything that is not a CC on this channel, an
 * unrecognized controller, or a value the command rejects. Unrelated
 * traffic on the same port is expected and is not an error.
 */
export function decodeCc(message: ArrayLike<number>, channel: number = 0): Command | null {
  if (message.length !== 3) return null;
  if ((message[0] & 0xf0) !== CC_STATUS || (message[0] & 0x0f) !== channel) return null;

  const name = NAMES_BY_CONTROLLER.get(message[1]);
  if (!name) return null;
  const route = ccRouteFor(name);
  if (!route) return null;

  const value = fromValueByte(message[2], route.encoding);
  if (value === undefined) return null;

  try {
    return createCommand(name, { [route.param]: value });
  } catch (err) {
    if (err instanceof ValidationError) return null;
    throw err;
  }
}

function fromValueByte(value: number, encoding: CcEncoding): string | number | undefined {
  switch (encoding.kind) {
    case "enum":
      return encoding.values[value];
    case "int":
      return value;
    case "range":
      return encoding.min + (value / 127) * (encoding.max - encoding.min);
  }
}
