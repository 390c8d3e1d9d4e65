// ─── Feedback Tracking ───────────────────────────────────────────────────────
//
// Client side of the feedback port. Status replies (0x70 success, 0x71 error)
// arrive as SysEx under the tag of the command they answer; each pending tag
// has one waiter that resolves with the reply or with a timeout failure.
// Async updates (0x7F) need no waiter; they go to every update listener.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ASYNC_UPDATE_ID, RESPONSE_ERROR_ID, RESPONSE_SUCCESS_ID } from "./commands/catalog.js";
import type { Logger } from "./logger.js";
import { SysExReassembler } from "./midi/reassembler.js";
import { isSysEx, parseEnvelope } from "./midi/sysex.js";
import type { AsyncUpdate, StatusResult, UpdateListener } from "./types.js";

export const StatusResultSchema = z.object({
  command: z.string(),
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

const AsyncUpdateSchema = z.record(z.unknown());

export interface FeedbackTrackerOptions {
  /** How long a waiter lives before resolving with a timeout failure. */
  responseTimeoutMs: number;
  /** Age at which partial replies are discarded. */
  reassemblyTimeoutMs: number;
  logger: Logger;
  now?: () => number;
}

interface Waiter {
  command: string;
  timer: ReturnType<typeof setTimeout>;
  resolve: (result: StatusResult) => void;
}

export class FeedbackTracker {
  private readonly waiters = new Map<number, Waiter>();
  private readonly updateListeners = new Set<UpdateListener>();
  private readonly reassembler: SysExReassembler;
  private readonly responseTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: FeedbackTrackerOptions) {
    this.responseTimeoutMs = options.responseTimeoutMs;
    this.log = options.logger.child({ component: "feedback" });
    this.reassembler = new SysExReassembler({
      timeoutMs: options.reassemblyTimeoutMs,
      logger: this.log,
      now: options.now,
    });
  }

  /**
   * Register interest in the reply for `tag`. Call before sending, so a fast
   * reply cannot arrive ahead of its waiter.
   */
  expect(tag: number, command: string): Promise<StatusResult> {
    this.cancel(tag, "superseded by a new command with the same tag");
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiters.delete(tag);
        this.log.warn({ tag, command }, "no status reply before timeout");
        resolve({
          command,
          success: false,
          error: `Timed out after ${this.responseTimeoutMs}ms waiting for a status reply (tag ${tag})`,
        });
      }, this.responseTimeoutMs);
      this.waiters.set(tag, { command, timer, resolve });
    });
  }

  /** Resolve a pending waiter with a failure. No-op for unknown tags. */
  cancel(tag: number, reason: string): void {
    const waiter = this.waiters.get(tag);
    if (!waiter) return;
    this.settle(tag, waiter, { command: waiter.command, success: false, error: reason });
  }

  /** Subscribe to async updates. Returns an unsubscribe function. */
  onUpdate(listener: UpdateListener): () => void {
    this.updateListeners.add(listener);
    return () => {
      this.updateListeners.delete(listener);
    };
  }

  /**
   * Feed one inbound MIDI message. Returns true when it was a status or
   * update chunk (complete or not), false for anything else on the port.
   */
  handle(message: Uint8Array): boolean {
    if (!isSysEx(message)) return false;
    const envelope = parseEnvelope(message);
    if (!envelope) return false;
    const isUpdate = envelope.commandId === ASYNC_UPDATE_ID;
    if (!isUpdate && envelope.commandId !== RESPONSE_SUCCESS_ID && envelope.commandId !== RESPONSE_ERROR_ID) {
      return false;
    }

    const assembled = this.reassembler.push(envelope);
    if (!assembled) return true;

    if (isUpdate) {
      if (!assembled.ok) {
        this.log.warn({ error: assembled.error }, "malformed async update dropped");
        return true;
      }
      const update = AsyncUpdateSchema.safeParse(assembled.payload);
      if (!update.success) {
        this.log.warn({ payload: assembled.payload }, "async update is not a JSON object");
        return true;
      }
      this.emitUpdate(update.data);
      return true;
    }

    const waiter = this.waiters.get(assembled.tag);
    if (!waiter) {
      this.log.info({ tag: assembled.tag }, "unsolicited status reply ignored");
      return true;
    }

    if (!assembled.ok) {
      this.settle(assembled.tag, waiter, {
        command: waiter.command,
        success: false,
        error: assembled.error,
      });
      return true;
    }

    const parsed = StatusResultSchema.safeParse(assembled.payload);
    if (!parsed.success) {
      this.settle(assembled.tag, waiter, {
        command: waiter.command,
        success: false,
        error: "Malformed status reply",
      });
      return true;
    }
    // The id byte is authoritative for success/failure.
    const reply = parsed.data;
    const success = assembled.commandId === RESPONSE_SUCCESS_ID && reply.success;
    this.settle(assembled.tag, waiter, {
      ...reply,
      command: reply.command || waiter.command,
      success,
      ...(!success && reply.error === undefined
        ? { error: "Device reported a failure without details" }
        : {}),
    });
    return true;
  }

  get pendingCount(): number {
    return this.waiters.size;
  }

  /** Fail every waiter, drop partial replies and update listeners. */
  close(): void {
    for (const tag of [...this.waiters.keys()]) this.cancel(tag, "Bridge client closed");
    this.updateListeners.clear();
    this.reassembler.clear();
  }

  private emitUpdate(update: AsyncUpdate): void {
    this.log.info({ update }, "async update received");
    for (const listener of this.updateListeners) {
      try {
        listener(update);
      } catch (err) {
        this.log.error({ err }, "update listener threw");
      }
    }
  }

  private settle(tag: number, waiter: Waiter, result: StatusResult): void {
    clearTimeout(waiter.timer);
    this.waiters.delete(tag);
    waiter.resolve(result);
  }
}
