// ─── Device Session ──────────────────────────────────────────────────────────
//
// The DAW-side half of the bridge. Listens on its transport, decodes CC and
// SysEx traffic, runs commands through the dispatcher and answers every
// SysEx command with a status reply under the same tag. Changes made in the
// DAW itself (only the tempo is watched) are pushed as async updates.
//
// Messages and tempo polls are handled strictly one at a time, in arrival order.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import {
  ASYNC_UPDATE_ID,
  commandNameForId,
  RESPONSE_ERROR_ID,
  RESPONSE_SUCCESS_ID,
} from "./commands/catalog.js";
import { commandFromWire } from "./commands/model.js";
import type { Dispatcher } from "./dispatcher/dispatcher.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { decodeCc } from "./midi/cc.js";
import { SysExReassembler } from "./midi/reassembler.js";
import {
  frameStatus,
  frameUpdate,
  isSysEx,
  parseEnvelope,
  type FramingOptions,
} from "./midi/sysex.js";
import type { AsyncUpdate, MidiTransport, StatusResult } from "./types.js";

/** Smallest tempo difference reported as a change. */
const TEMPO_EPSILON = 0.01;

const TempoReadingSchema = z.object({ bpm: z.number() });

export interface DeviceSessionOptions extends FramingOptions {
  transport: MidiTransport;
  dispatcher: Dispatcher;
  logger: Logger;
  midiChannel: number;
  reassemblyTimeoutMs: number;
  /** How often stale partial sequences are swept. Default: 1000. */
  sweepIntervalMs?: number;
  /** Poll the DAW tempo this often and push changes. Off when unset. */
  tempoPollMs?: number;
  now?: () => number;
}

export class DeviceSession {
  private readonly transport: MidiTransport;
  private readonly dispatcher: Dispatcher;
  private readonly framing: FramingOptions;
  private readonly midiChannel: number;
  private readonly reassembler: SysExReassembler;
  private readonly log: Logger;
  private readonly unsubscribe: () => void;
  private readonly sweeper: ReturnType<typeof setInterval>;
  private readonly tempoPoller: ReturnType<typeof setInterval> | null = null;
  private lastTempo: number | null = null;
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: DeviceSessionOptions) {
    this.transport = options.transport;
    this.dispatcher = options.dispatcher;
    this.framing = {
      maxChunkBytes: options.maxChunkBytes,
      maxChunksPerCommand: options.maxChunksPerCommand,
    };
    this.midiChannel = options.midiChannel;
    this.log = options.logger.child({ component: "device" });
    this.reassembler = new SysExReassembler({
      timeoutMs: options.reassemblyTimeoutMs,
      logger: this.log,
      now: options.now,
    });

    this.unsubscribe = this.transport.onMessage((message) => {
      void this.enqueue(() => this.handle(message), "failed to handle MIDI message");
    });

    this.sweeper = setInterval(() => this.reassembler.sweep(), options.sweepIntervalMs ?? 1000);
    this.sweeper.unref();

    if (options.tempoPollMs !== undefined) {
      this.tempoPoller = setInterval(() => void this.pollTempo(), options.tempoPollMs);
      this.tempoPoller.unref();
    }
  }

  /** Resolves once every message received so far has been handled. */
  idle(): Promise<void> {
    return this.queue;
  }

  get pendingSequences(): number {
    return this.reassembler.pendingCount;
  }

  /**
   * Push an unsolicited update to the client.
   * @throws PayloadTooLargeError when the update exceeds the chunk budget.
   */
  publish(update: AsyncUpdate): void {
    for (const message of frameUpdate(update, this.framing)) this.transport.send(message);
    this.log.debug({ update }, "async update sent");
  }

  /**
   * Read the DAW tempo and publish `{ tempo }` when it moved since the last
   * reading. The first reading only sets the baseline.
   */
  pollTempo(): Promise<void> {
    return this.enqueue(() => this.checkTempo(), "tempo poll failed");
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.unsubscribe();
    clearInterval(this.sweeper);
    if (this.tempoPoller) clearInterval(this.tempoPoller);
    await this.queue;
    this.reassembler.clear();
  }

  private enqueue(task: () => Promise<void>, failure: string): Promise<void> {
    this.queue = this.queue.then(task).catch((err: unknown) => {
      this.log.error({ err }, failure);
    });
    return this.queue;
  }

  private async checkTempo(): Promise<void> {
    const result = await this.dispatcher.execute("get_tempo");
    const reading = TempoReadingSchema.safeParse(result.data);
    if (!result.success || !reading.success) {
      this.log.debug({ error: result.error }, "tempo not readable");
      return;
    }
    const tempo = reading.data.bpm;
    if (this.lastTempo !== null && Math.abs(tempo - this.lastTempo) > TEMPO_EPSILON) {
      this.publish({ tempo });
    }
    this.lastTempo = tempo;
  }

  private async handle(message: Uint8Array): Promise<void> {
    if (isSysEx(message)) {
      await this.handleSysEx(message);
      return;
    }

    const command = decodeCc(message, this.midiChannel);
    if (!command) {
      this.log.trace({ message: Array.from(message) }, "ignored MIDI message");
      return;
    }
    const result = await this.dispatcher.dispatch(command);
    this.log.debug({ command: command.name, success: result.success }, "CC command handled");
  }

  private async handleSysEx(message: Uint8Array): Promise<void> {
    const envelope = parseEnvelope(message);
    if (!envelope) {
      this.log.debug({ length: message.length }, "ignored foreign or malformed SysEx");
      return;
    }
    if (
      envelope.commandId === RESPONSE_SUCCESS_ID ||
      envelope.commandId === RESPONSE_ERROR_ID ||
      envelope.commandId === ASYNC_UPDATE_ID
    ) {
      return;
    }

    const assembled = this.reassembler.push(envelope);
    if (!assembled) return;

    const name =
      commandNameForId(assembled.commandId) ??
      `0x${assembled.commandId.toString(16).padStart(2, "0")}`;

    let result: StatusResult;
    if (!assembled.ok) {
      result = { command: name, success: false, error: assembled.error };
    } else {
      try {
        const command = commandFromWire(assembled.commandId, assembled.payload);
        result = await this.dispatcher.dispatch(command);
      } catch (err) {
        result = { command: name, success: false, error: errorMessage(err) };
      }
    }
    this.reply(result, assembled.tag);
  }

  private reply(result: StatusResult, tag: number): void {
    const messages = frameStatus(result, tag, this.framing);
    for (const message of messages) this.transport.send(message);
    this.log.debug({ command: result.command, tag, success: result.success }, "status sent");
  }
}
