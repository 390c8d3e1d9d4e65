// ─── Bridge Errors ──────────────────────────────────────────────────────────
//
// Error taxonomy shared by the encoder, transport, reassembler and dispatcher.
// Everything that reaches the client or dispatcher boundary is turned into a
// StatusResult; these classes only exist below that line.
// ─────────────────────────────────────────────────────────────────────────────

export type BridgeErrorCode =
  | "VALIDATION"
  | "PAYLOAD_TOO_LARGE"
  | "TRANSPORT"
  | "REASSEMBLY_TIMEOUT"
  | "DAW_API";

/** Base class: every bridge error carries a stable code. */
export class BridgeError extends Error {
  constructor(
    readonly code: BridgeErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A command (or config) failed schema validation. Nothing was sent. */
export class ValidationError extends BridgeError {
  constructor(message: string, readonly issues: string[] = []) {
    super("VALIDATION", message);
  }
}

/** A structured command needs more SysEx chunks than the configured budget. */
export class PayloadTooLargeError extends BridgeError {
  constructor(
    readonly payloadBytes: number,
    readonly chunksNeeded: number,
    readonly maxChunks: number
  ) {
    super(
      "PAYLOAD_TOO_LARGE",
      `Payload of ${payloadBytes} bytes needs ${chunksNeeded} chunks (limit ${maxChunks})`
    );
  }
}

/** The MIDI port could not be opened or a send failed. Not retried. */
export class TransportError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSPORT", message, options);
  }
}

/** A partial SysEx sequence was abandoned. Only ever logged. */
export class ReassemblyTimeout extends BridgeError {
  constructor(
    readonly tag: number,
    readonly received: number,
    readonly total: number,
    readonly ageMs: number
  ) {
    super(
      "REASSEMBLY_TIMEOUT",
      `Discarded tag ${tag}: ${received}/${total} chunks after ${ageMs}ms`
    );
  }
}

/** The DAW host raised while executing a command. */
export class DawApiError extends BridgeError {
  constructor(readonly command: string, cause: unknown) {
    super("DAW_API", errorMessage(cause), { cause });
  }
}

/** Human-readable message for anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
