// ─── SysEx Reassembly ────────────────────────────────────────────────────────
//
// Collects chunks per tag until all `total` have arrived, then concatenates
// them in index order and decodes the JSON. Chunks may arrive out of order
// or more than once. Partial sequences older than the timeout are dropped.
// ─────────────────────────────────────────────────────────────────────────────

import { ReassemblyTimeout, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ChunkEnvelope } from "./sysex.js";

export type ReassemblyResult =
  | { ok: true; tag: number; commandId: number; payload: unknown }
  | { ok: false; tag: number; commandId: number; error: string };

export interface ReassemblerOptions {
  timeoutMs: number;
  logger: Logger;
  /** Clock in milliseconds. Injected by tests. */
  now?: () => number;
}

interface PendingSequence {
  commandId: number;
  total: number;
  firstSeen: number;
  chunks: Map<number, Uint8Array>;
}

export class SysExReassembler {
  private readonly pending = new Map<number, PendingSequence>();
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(options: ReassemblerOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Add one chunk. Returns the decoded payload once the sequence for its
   * tag is complete, or null while chunks are still missing.
   */
  push(envelope: ChunkEnvelope): ReassemblyResult | null {
    const now = this.now();
    this.sweep(now);

    let sequence = this.pending.get(envelope.tag);
    if (sequence && (sequence.commandId !== envelope.commandId || sequence.total !== envelope.total)) {
      this.logger.warn(
        { tag: envelope.tag, had: sequence.chunks.size, total: sequence.total },
        "SysEx tag reused by a different command; dropping the partial sequence"
      );
      sequence = undefined;
    }
    if (!sequence) {
      sequence = {
        commandId: envelope.commandId,
        total: envelope.total,
        firstSeen: now,
        chunks: new Map(),
      };
      this.pending.set(envelope.tag, sequence);
    }

    if (sequence.chunks.has(envelope.index)) {
      this.logger.debug({ tag: envelope.tag, index: envelope.index }, "duplicate SysEx chunk ignored");
    } else {
      sequence.chunks.set(envelope.index, envelope.payload);
    }

    if (sequence.chunks.size < sequence.total) return null;
    this.pending.delete(envelope.tag);
    return this.complete(envelope.tag, sequence);
  }

  /** Drop every sequence older than the timeout. Returns how many were dropped. */
  sweep(now: number = this.now()): number {
    let dropped = 0;
    for (const [tag, sequence] of this.pending) {
      const age = now - sequence.firstSeen;
      if (age < this.timeoutMs) continue;
      this.pending.delete(tag);
      dropped++;
      const timeout = new ReassemblyTimeout(tag, sequence.chunks.size, sequence.total, age);
      this.logger.warn({ tag, code: timeout.code }, timeout.message);
    }
    return dropped;
  }

  clear(): void {
    this.pending.clear();
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  isPending(tag: number): boolean {
    return this.pending.has(tag);
  }

  private complete(tag: number, sequence: PendingSequence): ReassemblyResult {
    const length = [...sequence.chunks.values()].reduce((sum, chunk) => sum + chunk.length, 0);
    const bytes = new Uint8Array(length);
    let offset = 0;
    for (let index = 0; index < sequence.total; index++) {
      const chunk = sequence.chunks.get(index);
      if (!chunk) {
        return { ok: false, tag, commandId: sequence.commandId, error: `chunk ${index} missing` };
      }
      bytes.set(chunk, offset);
      offset += chunk.length;
    }

    try {
      const payload: unknown = JSON.parse(this.decoder.decode(bytes));
      return { ok: true, tag, commandId: sequence.commandId, payload };
    } catch (err) {
      return {
        ok: false,
        tag,
        commandId: sequence.commandId,
        error: `Malformed payload: ${errorMessage(err)}`,
      };
    }
  }
}
