// ─── Virtual DAW ─────────────────────────────────────────────────────────────
//
// In-memory DawApi. Stands in for the DAW scripting host in tests and in
// --loopback mode, and keeps enough state that query commands answer with
// what earlier commands set.
// ─────────────────────────────────────────────────────────────────────────────

import type {
  ArrangementSection,
  CommandArgsMap,
  TrackType,
  TransportAction,
} from "../commands/catalog.js";
import { resolveNote } from "../music/note-parser.js";
import type { DawApi, DawStatus, PlacedNote, TransportState } from "../types.js";

export interface VirtualChannel {
  name: string;
  type: TrackType;
  instrument?: string;
  volume: number;
  pan: number;
  muted: boolean;
  soloed: boolean;
  midiEffects: string[];
  /** Notes per pattern number. */
  patterns: Map<number, PlacedNote[]>;
}

export interface VirtualMixerTrack {
  level: number;
  /** Effect per slot (0-9). */
  slots: (string | undefined)[];
}

export interface Automation {
  channel: number;
  target: string;
  points: { beat: number; value: number }[];
}

export interface PlayedNote {
  channel: number;
  note: number;
  velocity: number;
  durationSeconds: number;
}

const MIXER_TRACKS = 126;
const EFFECT_SLOTS = 10;

export class VirtualDaw implements DawApi {
  readonly channels: VirtualChannel[] = [];
  readonly mixer: VirtualMixerTrack[] = Array.from({ length: MIXER_TRACKS }, () => ({
    level: 0.8,
    slots: new Array<string | undefined>(EFFECT_SLOTS).fill(undefined),
  }));
  readonly played: PlayedNote[] = [];
  readonly automations: Automation[] = [];
  arrangement: ArrangementSection[] = [];

  tempo = 140;
  pattern = 1;
  playing = false;
  recording = false;
  selected = 0;

  constructor(channelNames: readonly string[] = ["Kick", "Clap", "Hat", "Snare"]) {
    for (const name of channelNames) this.addChannel(name, "instrument");
  }

  // ─── Transport & Patterns ─────────────────────────────────────────────

  async transport(action: TransportAction): Promise<TransportState> {
    switch (action) {
      case "play":
        this.playing = true;
        break;
      case "stop":
        this.playing = false;
        this.recording = false;
        break;
      case "record":
        this.recording = !this.recording;
        break;
      case "toggle":
        this.playing = !this.playing;
        break;
    }
    return { playing: this.playing, recording: this.recording };
  }

  async isPlaying(): Promise<boolean> {
    return this.playing;
  }

  async selectPattern(pattern: number): Promise<void> {
    this.pattern = pattern;
  }

  async currentPattern(): Promise<number> {
    return this.pattern;
  }

  // ─── Channels ─────────────────────────────────────────────────────────

  async selectChannel(index: number): Promise<void> {
    this.channel(index);
    this.selected = index;
  }

  async selectedChannel(): Promise<number> {
    return this.selected;
  }

  async getChannelNames(): Promise<string[]> {
    return this.channels.map((c) => c.name);
  }

  async getChannelName(index: number): Promise<string> {
    return this.channel(index).name;
  }

  async getChannelCount(): Promise<number> {
    return this.channels.length;
  }

  async setChannelVolume(index: number, volume: number): Promise<void> {
    this.channel(index).volume = volume;
  }

  async setChannelPan(index: number, pan: number): Promise<void> {
    this.channel(index).pan = pan;
  }

  async setChannelMute(index: number, mute: boolean): Promise<void> {
    this.channel(index).muted = mute;
  }

  async setChannelSolo(index: number, solo: boolean): Promise<void> {
    this.channel(index).soloed = solo;
  }

  async createTrack(type: TrackType, name?: string): Promise<number> {
    return this.addChannel(name ?? `${type} ${this.channels.length + 1}`, type);
  }

  async loadInstrument(instrument: string, channel?: number): Promise<number> {
    const index = channel ?? this.addChannel(instrument, "instrument");
    this.channel(index).instrument = instrument;
    return index;
  }

  async addMidiEffect(channel: number, effect: string): Promise<void> {
    this.channel(channel).midiEffects.push(effect);
  }

  // ─── Project ──────────────────────────────────────────────────────────

  async setTempo(bpm: number): Promise<void> {
    this.tempo = bpm;
  }

  async getTempo(): Promise<number> {
    return this.tempo;
  }

  // ─── Mixer ────────────────────────────────────────────────────────────

  async setMixerLevel(track: number, level: number): Promise<void> {
    this.mixerTrack(track).level = level;
  }

  async getMixerLevel(track: number): Promise<number> {
    return this.mixerTrack(track).level;
  }

  async getMixerTrackCount(): Promise<number> {
    return this.mixer.length;
  }

  async addAudioEffect(track: number, effect: string, slot?: number): Promise<number> {
    const slots = this.mixerTrack(track).slots;
    const target = slot ?? slots.findIndex((s) => s === undefined);
    if (target < 0) throw new Error(`Mixer track ${track} has no free effect slot`);
    slots[target] = effect;
    return target;
  }

  // ─── Notes ────────────────────────────────────────────────────────────

  async playNote(channel: number, note: number, velocity: number, durationSeconds: number): Promise<void> {
    this.channel(channel);
    this.played.push({ channel, note, velocity, durationSeconds });
  }

  async addNotes(channel: number, notes: readonly PlacedNote[]): Promise<void> {
    const patterns = this.channel(channel).patterns;
    const existing = patterns.get(this.pattern) ?? [];
    patterns.set(this.pattern, [...existing, ...notes]);
  }

  /** Notes written to a channel in the current (or given) pattern. */
  notesIn(channel: number, pattern: number = this.pattern): PlacedNote[] {
    return this.channel(channel).patterns.get(pattern) ?? [];
  }

  async createMelody(args: CommandArgsMap["create_melody"]): Promise<unknown> {
    const channel = args.channel_index ?? this.selected;
    const notes = args.notes.map((n) => ({
      note: resolveNote(n.note),
      velocity: n.velocity ?? 100,
      startBeat: n.start_beat,
      lengthBeats: n.length_beats,
    }));
    await this.addNotes(channel, notes);
    return { channel, notes: notes.length };
  }

  async automateParameter(args: CommandArgsMap["automate_parameter"]): Promise<unknown> {
    const channel = args.channel_index ?? this.selected;
    this.channel(channel);
    this.automations.push({ channel, target: args.target, points: [...args.points] });
    return { channel, target: args.target, points: args.points.length };
  }

  async setArrangement(args: CommandArgsMap["set_arrangement"]): Promise<unknown> {
    this.arrangement = [...args.sections];
    const bars = args.sections.reduce((end, s) => Math.max(end, s.start_bar + s.length_bars - 1), 0);
    return { sections: args.sections.length, bars };
  }

  async getStatus(): Promise<DawStatus> {
    return {
      playing: this.playing,
      recording: this.recording,
      tempo: this.tempo,
      pattern: this.pattern,
      selectedChannel: this.selected,
      channelCount: this.channels.length,
    };
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private addChannel(name: string, type: TrackType): number {
    this.channels.push({
      name,
      type,
      volume: 0.78,
      pan: 0,
      muted: false,
      soloed: false,
      midiEffects: [],
      patterns: new Map(),
    });
    return this.channels.length - 1;
  }

  private channel(index: number): VirtualChannel {
    const channel = this.channels[index];
    if (!channel) throw new RangeError(`Channel ${index} does not exist (${this.channels.length} channels)`);
    return channel;
  }

  private mixerTrack(index: number): VirtualMixerTrack {
    const track = this.mixer[index];
    if (!track) throw new RangeError(`Mixer track ${index} does not exist`);
    return track;
  }
}
