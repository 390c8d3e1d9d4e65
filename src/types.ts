// ─── flstudio-midi-bridge: Core Types ───────────────────────────────────────
//
// Seams between the wire layer and its collaborators: the MIDI transport on
// one side, the DAW scripting host on the other, and the StatusResult that
// flows back to the AI caller.
// ─────────────────────────────────────────────────────────────────────────────

import type { CommandArgs, TrackType, TransportAction } from "./commands/catalog.js";

// ─── Status ─────────────────────────────────────────────────────────────────

/** Outcome of one command, returned to the MCP caller as the tool response. */
export interface StatusResult {
  /** Command name as requested (may be an unknown name). */
  command: string;

  success: boolean;

  /** Query results or acknowledgement details. */
  data?: unknown;

  /** Human-readable reason when success is false. */
  error?: string;
}

/**
 * State change pushed by the device without a request, e.g. `{ tempo: 128 }`
 * after the tempo was edited in the DAW.
 */
export type AsyncUpdate = Record<string, unknown>;

export type UpdateListener = (update: AsyncUpdate) => void;

// ─── MIDI Transport ─────────────────────────────────────────────────────────

/** MIDI connection status. */
export type MidiStatus = "disconnected" | "connecting" | "connected" | "error";

/** Called once per complete inbound MIDI message (status byte first). */
export type MidiListener = (message: Uint8Array) => void;

/**
 * One bidirectional MIDI link. Implementations: node-midi ports, an
 * in-process loopback pair, and a recording mock for tests.
 */
export interface MidiTransport {
  /** Port description for logs. */
  readonly name: string;

  status(): MidiStatus;

  /**
   * Emit one complete MIDI message.
   * @throws TransportError when the port is closed or the driver rejects it.
   */
  send(message: readonly number[]): void;

  /** Subscribe to inbound messages. Returns an unsubscribe function. */
  onMessage(listener: MidiListener): () => void;

  close(): Promise<void>;
}

// ─── DAW Host ───────────────────────────────────────────────────────────────

/** A note written into a pattern, positioned in beats. */
export interface PlacedNote {
  note: number;
  velocity: number;
  startBeat: number;
  lengthBeats: number;
}

export interface TransportState {
  playing: boolean;
  recording: boolean;
}

/** Snapshot returned by hosts that support status queries. */
export interface DawStatus extends TransportState {
  tempo: number;
  pattern: number;
  selectedChannel: number;
  channelCount: number;
}

/**
 * The DAW scripting surface the dispatcher drives. Every operation may throw;
 * the dispatcher turns that into a failed StatusResult.
 *
 * The optional operations back commands whose host-side behaviour is still
 * open. A host that leaves one out reports the command as unsupported.
 */
export interface DawApi {
  transport(action: TransportAction): Promise<TransportState>;
  isPlaying(): Promise<boolean>;
  selectPattern(pattern: number): Promise<void>;
  currentPattern(): Promise<number>;

  selectChannel(index: number): Promise<void>;
  selectedChannel(): Promise<number>;
  getChannelNames(): Promise<string[]>;
  getChannelName(index: number): Promise<string>;
  getChannelCount(): Promise<number>;
  setChannelVolume(index: number, volume: number): Promise<void>;
  setChannelPan(index: number, pan: number): Promise<void>;
  setChannelMute(index: number, mute: boolean): Promise<void>;
  setChannelSolo(index: number, solo: boolean): Promise<void>;

  /** Returns the index of the new track/channel. */
  createTrack(type: TrackType, name?: string): Promise<number>;
  /** Returns the channel the instrument landed on. */
  loadInstrument(instrument: string, channel?: number): Promise<number>;
  addMidiEffect(channel: number, effect: string): Promise<void>;

  setTempo(bpm: number): Promise<void>;
  getTempo(): Promise<number>;

  setMixerLevel(track: number, level: number): Promise<void>;
  getMixerLevel(track: number): Promise<number>;
  /** Includes the master track. */
  getMixerTrackCount(): Promise<number>;
  /** Returns the slot the effect was inserted into. */
  addAudioEffect(track: number, effect: string, slot?: number): Promise<number>;

  /** Preview a note immediately (the host schedules the note-off). */
  playNote(channel: number, note: number, velocity: number, durationSeconds: number): Promise<void>;
  /** Write notes into the current pattern of a channel. */
  addNotes(channel: number, notes: readonly PlacedNote[]): Promise<void>;

  createMelody?(args: CommandArgs<"create_melody">): Promise<unknown>;
  automateParameter?(args: CommandArgs<"automate_parameter">): Promise<unknown>;
  setArrangement?(args: CommandArgs<"set_arrangement">): Promise<unknown>;
  getStatus?(): Promise<DawStatus>;
}
