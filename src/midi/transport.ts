// ─── MIDI Transports ─────────────────────────────────────────────────────────
//
// Three implementations of MidiTransport:
//   - node-midi ports (virtual IAC/loopMIDI buses in practice)
//   - an in-process loopback pair, for tests and --loopback mode
//   - a recording mock, for tests that inspect what was sent
//
// node-midi is an optional native dependency, loaded on first use so the
// rest of the bridge works on machines without it.
// ─────────────────────────────────────────────────────────────────────────────

import { TransportError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { MidiListener, MidiStatus, MidiTransport } from "../types.js";

// ─── node-midi ──────────────────────────────────────────────────────────────

export interface NodeMidiPort {
  getPortCount(): number;
  getPortName(index: number): string;
  openPort(index: number): void;
  closePort(): void;
}

export interface NodeMidiOutput extends NodeMidiPort {
  sendMessage(message: number[]): void;
}

export interface NodeMidiInput extends NodeMidiPort {
  on(event: "message", listener: (deltaTime: number, message: number[]) => void): unknown;
  ignoreTypes(sysex: boolean, timing: boolean, activeSensing: boolean): void;
}

/** The part of node-midi the bridge uses. */
export interface NodeMidiModule {
  Input: new () => NodeMidiInput;
  Output: new () => NodeMidiOutput;
}

function isNodeMidiModule(value: unknown): value is NodeMidiModule {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "Input") === "function" &&
    typeof Reflect.get(value, "Output") === "function"
  );
}

let nodeMidi: Promise<NodeMidiModule> | null = null;

/**
 * Load node-midi once. The module may arrive as CJS exports or under
 * `default`, depending on how Node wraps it.
 * @throws TransportError when the package is not installed or not built.
 */
async function loadNodeMidi(): Promise<NodeMidiModule> {
  nodeMidi ??= (async () => {
    const specifier = "midi";
    let mod: unknown;
    try {
      mod = await import(specifier);
    } catch (err) {
      throw new TransportError(`node-midi is not available: ${errorMessage(err)}`, { cause: err });
    }
    if (isNodeMidiModule(mod)) return mod;
    const fallback: unknown = typeof mod === "object" && mod !== null ? Reflect.get(mod, "default") : undefined;
    if (isNodeMidiModule(fallback)) return fallback;
    throw new TransportError("node-midi loaded but exports no Input/Output classes");
  })();

  try {
    return await nodeMidi;
  } catch (err) {
    nodeMidi = null;
    throw err;
  }
}

function portNames(port: NodeMidiPort): string[] {
  const names: string[] = [];
  for (let i = 0; i < port.getPortCount(); i++) names.push(port.getPortName(i));
  return names;
}

/** Exact name first, then case-insensitive substring (drivers often decorate names). */
function findPort(names: readonly string[], wanted: string): number {
  const exact = names.indexOf(wanted);
  if (exact >= 0) return exact;
  const lower = wanted.toLowerCase();
  return names.findIndex((name) => name.toLowerCase().includes(lower));
}

export interface MidiPortList {
  inputs: string[];
  outputs: string[];
}

export async function listMidiPorts(midi?: NodeMidiModule): Promise<MidiPortList> {
  midi ??= await loadNodeMidi();
  const input = new midi.Input();
  const output = new midi.Output();
  try {
    return { inputs: portNames(input), outputs: portNames(output) };
  } finally {
    input.closePort();
    output.closePort();
  }
}

/** Close a port while unwinding from another failure; the first error wins. */
function closeAfterFailure(port: NodeMidiPort, log: Logger): void {
  try {
    port.closePort();
  } catch (err) {
    log.warn({ err }, "could not close MIDI port");
  }
}

export interface NodeMidiTransportOptions {
  /** Port we send on. */
  outputPort: string;
  /** Port we listen on (omit for send-only). */
  inputPort?: string;
  logger: Logger;
  /** node-midi itself. Default: loaded on demand. */
  midi?: NodeMidiModule;
}

/**
 * Open node-midi ports as one bidirectional transport.
 * @throws TransportError when node-midi is missing or a port is not found.
 */
export async function createNodeMidiTransport(options: NodeMidiTransportOptions): Promise<MidiTransport> {
  const midi = options.midi ?? (await loadNodeMidi());
  const log = options.logger.child({ component: "transport" });

  const output = new midi.Output();
  const outputs = portNames(output);
  const outIndex = findPort(outputs, options.outputPort);
  if (outIndex < 0) {
    throw new TransportError(
      `MIDI output "${options.outputPort}" not found. Available: ${outputs.join(", ") || "(none)"}`
    );
  }

  let input: NodeMidiInput | null = null;
  let inIndex = -1;
  if (options.inputPort) {
    input = new midi.Input();
    const inputs = portNames(input);
    inIndex = findPort(inputs, options.inputPort);
    if (inIndex < 0) {
      throw new TransportError(
        `MIDI input "${options.inputPort}" not found. Available: ${inputs.join(", ") || "(none)"}`
      );
    }
  }

  const listeners = new Set<MidiListener>();
  let status: MidiStatus = "connecting";

  try {
    output.openPort(outIndex);
    if (input) {
      // Receive SysEx; keep ignoring timing clock and active sensing.
      input.ignoreTypes(false, true, true);
      input.on("message", (_deltaTime, message) => {
        const bytes = Uint8Array.from(message);
        for (const listener of listeners) listener(bytes);
      });
      input.openPort(inIndex);
    }
  } catch (err) {
    status = "error";
    closeAfterFailure(output, log);
    if (input) closeAfterFailure(input, log);
    throw new TransportError(`Could not open MIDI ports: ${errorMessage(err)}`, { cause: err });
  }
  status = "connected";

  const name = input
    ? `out:${outputs[outIndex]} in:${input.getPortName(inIndex)}`
    : outputs[outIndex];
  log.info({ port: name }, "MIDI ports open");

  return {
    name,
    status: () => status,
    send(message) {
      if (status !== "connected") throw new TransportError(`MIDI port ${name} is ${status}`);
      try {
        output.sendMessage([...message]);
      } catch (err) {
        throw new TransportError(`MIDI send failed: ${errorMessage(err)}`, { cause: err });
      }
    },
    onMessage(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    async close() {
      if (status === "disconnected") return;
      status = "disconnected";
      listeners.clear();
      output.closePort();
      input?.closePort();
      log.info({ port: name }, "MIDI ports closed");
    },
  };
}

// ─── In-Process ─────────────────────────────────────────────────────────────

interface Endpoint extends MidiTransport {
  deliver(message: Uint8Array): void;
}

function createEndpoint(name: string, onSend: (message: Uint8Array) => void): Endpoint {
  const listeners = new Set<MidiListener>();
  let status: MidiStatus = "connected";

  return {
    name,
    status: () => status,
    send(message) {
      if (status !== "connected") throw new TransportError(`MIDI port ${name} is ${status}`);
      onSend(Uint8Array.from(message));
    },
    onMessage(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    async close() {
      status = "disconnected";
      listeners.clear();
    },
    deliver(message) {
      if (status !== "connected") return;
      for (const listener of listeners) listener(message);
    },
  };
}

/**
 * Two transports wired back to back: what one sends, the other receives.
 * Delivery is deferred to a microtask, as a real port never calls back
 * inside send().
 */
export function createLoopbackPair(): [MidiTransport, MidiTransport] {
  const a: Endpoint = createEndpoint("loopback:a", (message) => {
    queueMicrotask(() => b.deliver(message));
  });
  const b: Endpoint = createEndpoint("loopback:b", (message) => {
    queueMicrotask(() => a.deliver(message));
  });
  return [a, b];
}

/** A transport that records what it sends and lets tests inject inbound messages. */
export interface MockTransport extends MidiTransport {
  readonly sent: number[][];
  /** Deliver a message to subscribers synchronously. */
  receive(message: readonly number[]): void;
}

export function createMockTransport(name: string = "mock"): MockTransport {
  const sent: number[][] = [];
  const endpoint = createEndpoint(name, (message) => {
    sent.push(Array.from(message));
  });
  return {
    name: endpoint.name,
    status: endpoint.status,
    send: endpoint.send,
    onMessage: endpoint.onMessage,
    close: endpoint.close,
    sent,
    receive(message) {
      endpoint.deliver(Uint8Array.from(message));
    },
  };
}
