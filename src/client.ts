// ─── Bridge Client ───────────────────────────────────────────────────────────
//
// The server-side half of the bridge: validates a command, picks its wire
// path and reports the outcome.
//
//   CC-routed command  → one Control Change, fire-and-forget
//   everything else    → tagged SysEx chunks, then wait for the status reply
//
// Async updates pushed by the device reach onUpdate() listeners.
//
// execute() never throws; every failure is a StatusResult.
// ─────────────────────────────────────────────────────────────────────────────

import { createCommand, type Command } from "./commands/model.js";
import { errorMessage } from "./errors.js";
import { FeedbackTracker } from "./feedback.js";
import type { Logger } from "./logger.js";
import { encodeCc, isCcCommand } from "./midi/cc.js";
import { frameCommand, type FramingOptions } from "./midi/sysex.js";
import { TagAllocator } from "./midi/tags.js";
import type { MidiTransport, StatusResult, UpdateListener } from "./types.js";

export interface BridgeClientOptions extends FramingOptions {
  transport: MidiTransport;
  logger: Logger;
  /** MIDI channel for CC messages (0-15). */
  midiChannel: number;
  responseTimeoutMs: number;
  reassemblyTimeoutMs: number;
  now?: () => number;
}

export class BridgeClient {
  private readonly transport: MidiTransport;
  private readonly framing: FramingOptions;
  private readonly midiChannel: number;
  private readonly tags = new TagAllocator();
  private readonly feedback: FeedbackTracker;
  private readonly unsubscribe: () => void;
  private readonly log: Logger;

  constructor(options: BridgeClientOptions) {
    this.transport = options.transport;
    this.framing = {
      maxChunkBytes: options.maxChunkBytes,
      maxChunksPerCommand: options.maxChunksPerCommand,
    };
    this.midiChannel = options.midiChannel;
    this.log = options.logger.child({ component: "client" });
    this.feedback = new FeedbackTracker({
      responseTimeoutMs: options.responseTimeoutMs,
      reassemblyTimeoutMs: options.reassemblyTimeoutMs,
      logger: options.logger,
      now: options.now,
    });
    this.unsubscribe = this.transport.onMessage((message) => {
      this.feedback.handle(message);
    });
  }

  /**
   * Run a command by name. `args` is an object keyed by parameter name or a
   * positional array in catalog order.
   */
  async execute(name: string, args: unknown = {}): Promise<StatusResult> {
    let command: Command;
    try {
      command = createCommand(name, args);
    } catch (err) {
      return failure(name, err);
    }
    return this.send(command);
  }

  /** Send an already validated command. */
  async send(command: Command): Promise<StatusResult> {
    return isCcCommand(command) ? this.sendCc(command) : this.sendSysEx(command);
  }

  /** Listen for unsolicited device updates. Returns an unsubscribe function. */
  onUpdate(listener: UpdateListener): () => void {
    return this.feedback.onUpdate(listener);
  }

  /** Commands still waiting for a status reply. */
  get pendingCount(): number {
    return this.feedback.pendingCount;
  }

  async close(): Promise<void> {
    this.unsubscribe();
    this.feedback.close();
  }

  private sendCc(command: Command): StatusResult {
    try {
      const message = encodeCc(command, this.midiChannel);
      this.transport.send(message);
      this.log.debug({ command: command.name, message }, "sent CC");
      return { command: command.name, success: true, data: { delivery: "cc", value: message[2] } };
    } catch (err) {
      this.log.error({ command: command.name, err }, "CC send failed");
      return failure(command.name, err);
    }
  }

  private async sendSysEx(command: Command): Promise<StatusResult> {
    let tag: number;
    let messages: number[][];
    try {
      tag = this.tags.allocate();
    } catch (err) {
      return failure(command.name, err);
    }

    try {
      messages = frameCommand(command, tag, this.framing);
    } catch (err) {
      this.tags.release(tag);
      this.log.warn({ command: command.name, err }, "command not sent");
      return failure(command.name, err);
    }

    const reply = this.feedback.expect(tag, command.name);
    try {
      for (const message of messages) this.transport.send(message);
      this.log.debug({ command: command.name, tag, chunks: messages.length }, "sent SysEx");
    } catch (err) {
      this.log.error({ command: command.name, tag, err }, "SysEx send failed");
      this.feedback.cancel(tag, errorMessage(err));
    }

    try {
      return await reply;
    } finally {
      this.tags.release(tag);
    }
  }
}

function failure(command: string, err: unknown): StatusResult {
  return { command, success: false, error: errorMessage(err) };
}
