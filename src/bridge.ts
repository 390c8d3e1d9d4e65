// ─── Bridge Wiring ───────────────────────────────────────────────────────────
//
// Turns a BridgeConfig into a connected BridgeClient:
//
//   midi      client on node-midi ports (command port out, feedback port in)
//   loopback  client and device session joined in-process over a virtual DAW,
//             with the device watching the DAW tempo for async updates
// ─────────────────────────────────────────────────────────────────────────────

import { BridgeClient } from "./client.js";
import type { BridgeConfig } from "./config/schema.js";
import { VirtualDaw } from "./daw/virtual-daw.js";
import { DeviceSession } from "./device.js";
import { Dispatcher } from "./dispatcher/dispatcher.js";
import type { Logger } from "./logger.js";
import type { FramingOptions } from "./midi/sysex.js";
import { createLoopbackPair, createNodeMidiTransport } from "./midi/transport.js";
import type { DawApi, MidiTransport } from "./types.js";

export type BridgeMode = "midi" | "loopback";

const LOOPBACK_TEMPO_POLL_MS = 1000;

export interface Bridge {
  mode: BridgeMode;
  client: BridgeClient;
  /** The in-process device session (loopback only). */
  device?: DeviceSession;
  close(): Promise<void>;
}

export interface OpenBridgeOptions {
  mode: BridgeMode;
  logger: Logger;
  /** DAW host behind a loopback bridge. Default: a fresh VirtualDaw. */
  daw?: DawApi;
}

export function framingFromConfig(config: BridgeConfig): FramingOptions {
  return {
    maxChunkBytes: config.max_chunk_bytes,
    maxChunksPerCommand: config.max_chunks_per_command,
  };
}

function createClient(transport: MidiTransport, config: BridgeConfig, logger: Logger): BridgeClient {
  return new BridgeClient({
    ...framingFromConfig(config),
    transport,
    logger,
    midiChannel: config.midi_channel,
    responseTimeoutMs: config.response_timeout_seconds * 1000,
    reassemblyTimeoutMs: config.reassembly_timeout_seconds * 1000,
  });
}

/**
 * Open a bridge in the requested mode.
 * @throws TransportError when MIDI ports cannot be opened.
 */
export async function openBridge(config: BridgeConfig, options: OpenBridgeOptions): Promise<Bridge> {
  const { logger } = options;

  if (options.mode === "loopback") {
    const [clientSide, deviceSide] = createLoopbackPair();
    const device = new DeviceSession({
      ...framingFromConfig(config),
      transport: deviceSide,
      dispatcher: new Dispatcher({ daw: options.daw ?? new VirtualDaw(), logger }),
      logger,
      midiChannel: config.midi_channel,
      reassemblyTimeoutMs: config.reassembly_timeout_seconds * 1000,
      tempoPollMs: LOOPBACK_TEMPO_POLL_MS,
    });
    const client = createClient(clientSide, config, logger);
    logger.info("loopback bridge ready (virtual DAW)");
    return {
      mode: "loopback",
      client,
      device,
      async close() {
        await client.close();
        await device.close();
        await clientSide.close();
        await deviceSide.close();
      },
    };
  }

  const transport = await createNodeMidiTransport({
    outputPort: config.midi_port_name,
    inputPort: config.feedback_port_name,
    logger,
  });
  const client = createClient(transport, config, logger);
  return {
    mode: "midi",
    client,
    async close() {
      await client.close();
      await transport.close();
    },
  };
}
