// ─── SysEx Framing ───────────────────────────────────────────────────────────
//
// Structured commands travel as canonical JSON split across SysEx messages:
//
//   F0 7D 01 <command-id> <tag> <index> <total> <7-bit packed chunk> F7
//
// 7D is the non-commercial manufacturer id, 01 the bridge's command class.
// Chunking happens on the raw JSON bytes; each chunk is packed on its own.
// ─────────────────────────────────────────────────────────────────────────────

import type { Command } from "../commands/model.js";
import {
  ASYNC_UPDATE_ID,
  ASYNC_UPDATE_TAG,
  getCommandSpec,
  RESPONSE_ERROR_ID,
  RESPONSE_SUCCESS_ID,
} from "../commands/catalog.js";
import { PayloadTooLargeError } from "../errors.js";
import type { AsyncUpdate, StatusResult } from "../types.js";
import { encodeCanonical } from "./canonical-json.js";
import { pack7, unpack7 } from "./seven-bit.js";

export const SYSEX_START = 0xf0;
export const SYSEX_END = 0xf7;
export const MANUFACTURER_ID = 0x7d;
export const COMMAND_CLASS = 0x01;

/** Start byte + manufacturer + class. */
export const SYSEX_PREFIX: readonly number[] = [SYSEX_START, MANUFACTURER_ID, COMMAND_CLASS];

/** Prefix + command id + tag + index + total. */
const HEADER_LENGTH = SYSEX_PREFIX.length + 4;

/** Largest index/total/tag that fits a data byte. */
export const MAX_DATA_BYTE = 0x7f;

/** Last-resort reply when not even an overflow error fits the budget. */
const BARE_FAILURE: StatusResult = { command: "", success: false };

/** Raw bytes a chunk budget must hold so every command can be answered. */
export const MIN_STATUS_REPLY_BYTES = encodeCanonical(BARE_FAILURE).length;

/** One decoded SysEx chunk. `payload` holds the unpacked raw bytes. */
export interface ChunkEnvelope {
  commandId: number;
  tag: number;
  index: number;
  total: number;
  payload: Uint8Array;
}

export interface FramingOptions {
  /** Raw (pre-packing) bytes per chunk. */
  maxChunkBytes: number;
  /** Chunk budget per command, at most 127. */
  maxChunksPerCommand: number;
}

// ─── Framing ────────────────────────────────────────────────────────────────

/**
 * Frame a validated command as an ordered list of SysEx messages.
 *
 * @throws PayloadTooLargeError before anything is produced when the
 *   canonical payload needs more chunks than `maxChunksPerCommand`.
 */
export function frameCommand(command: Command, tag: number, options: FramingOptions): number[][] {
  return framePayload(getCommandSpec(command.name).id, tag, command.args, options);
}

/**
 * Frame a StatusResult for the feedback path (0x70 success, 0x71 error).
 * A result too large for the budget is replaced by a failure describing
 * the overflow, so the caller always gets an answer for its tag.
 */
export function frameStatus(result: StatusResult, tag: number, options: FramingOptions): number[][] {
  const id = result.success ? RESPONSE_SUCCESS_ID : RESPONSE_ERROR_ID;
  try {
    return framePayload(id, tag, result, options);
  } catch (err) {
    if (!(err instanceof PayloadTooLargeError)) throw err;
    const overflow: StatusResult = {
      command: result.command,
      success: false,
      error: `Status reply too large to send: ${err.message}`,
    };
    try {
      return framePayload(RESPONSE_ERROR_ID, tag, overflow, options);
    } catch (retryErr) {
      if (!(retryErr instanceof PayloadTooLargeError)) throw retryErr;
      // Budgets this tight only leave room for the bare flag.
      return framePayload(RESPONSE_ERROR_ID, tag, BARE_FAILURE, options);
    }
  }
}

/** Frame an unsolicited device update (id 0x7F, tag 0). */
export function frameUpdate(update: AsyncUpdate, options: FramingOptions): number[][] {
  return framePayload(ASYNC_UPDATE_ID, ASYNC_UPDATE_TAG, update, options);
}

/** Serialize any JSON value under a command id and split it into messages. */
export function framePayload(
  commandId: number,
  tag: number,
  payload: unknown,
  options: FramingOptions
): number[][] {
  assertDataByte(commandId, "command id");
  assertDataByte(tag, "tag");
  assertFramingOptions(options);

  const bytes = encodeCanonical(payload);
  const chunks = splitChunks(bytes, options.maxChunkBytes);
  if (chunks.length > options.maxChunksPerCommand) {
    throw new PayloadTooLargeError(bytes.length, chunks.length, options.maxChunksPerCommand);
  }

  return chunks.map((chunk, index) =>
    frameEnvelope({ commandId, tag, index, total: chunks.length, payload: chunk })
  );
}

/** Split bytes into slices of at most `size`. Empty input yields one empty chunk. */
export function splitChunks(bytes: Uint8Array, size: number): Uint8Array[] {
  if (bytes.length === 0) return [bytes];
  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += size) {
    chunks.push(bytes.subarray(offset, offset + size));
  }
  return chunks;
}

/** Wrap one chunk in its SysEx envelope. */
export function frameEnvelope(envelope: ChunkEnvelope): number[] {
  return [
    ...SYSEX_PREFIX,
    envelope.commandId,
    envelope.tag,
    envelope.index,
    envelope.total,
    ...pack7(envelope.payload),
    SYSEX_END,
  ];
}

// ─── Parsing ────────────────────────────────────────────────────────────────

export function isSysEx(message: ArrayLike<number>): boolean {
  return message.length > 0 && message[0] === SYSEX_START;
}

/**
 * Decode one SysEx message into its envelope.
 * Returns null for anything that is not a well-formed bridge message
 * (foreign manufacturer, wrong class, truncated, bad index or packing).
 */
export function parseEnvelope(message: ArrayLike<number>): ChunkEnvelope | null {
  if (message.length < HEADER_LENGTH + 1) return null;
  for (let i = 0; i < SYSEX_PREFIX.length; i++) {
    if (message[i] !== SYSEX_PREFIX[i]) return null;
  }
  if (message[message.length - 1] !== SYSEX_END) return null;

  const commandId = message[3];
  const tag = message[4];
  const index = message[5];
  const total = message[6];
  if ([commandId, tag, index, total].some((b) => b > MAX_DATA_BYTE)) return null;
  if (total === 0 || index >= total) return null;

  const packed = Array.from(message).slice(HEADER_LENGTH, message.length - 1);
  let payload: Uint8Array;
  try {
    payload = unpack7(packed);
  } catch {
    return null;
  }
  return { commandId, tag, index, total, payload };
}

// ─── Guards ─────────────────────────────────────────────────────────────────

function assertDataByte(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_DATA_BYTE) {
    throw new RangeError(`Invalid ${label}: ${value} (must be 0-127)`);
  }
}

function assertFramingOptions(options: FramingOptions): void {
  if (!Number.isInteger(options.maxChunkBytes) || options.maxChunkBytes < 1) {
    throw new RangeError(`maxChunkBytes must be a positive integer: got ${options.maxChunkBytes}`);
  }
  if (
    !Number.isInteger(options.maxChunksPerCommand) ||
    options.maxChunksPerCommand < 1 ||
    options.maxChunksPerCommand > MAX_DATA_BYTE
  ) {
    throw new RangeError(
      `maxChunksPerCommand must be between 1 and 127: got ${options.maxChunksPerCommand}`
    );
  }
}
