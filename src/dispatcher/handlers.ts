// ─── Command Handlers ────────────────────────────────────────────────────────
//
// One handler per catalog command, each a thin translation onto the DAW host.
// The value a handler resolves to becomes StatusResult.data.
// ─────────────────────────────────────────────────────────────────────────────

import type { CommandArgsMap, CommandName } from "../commands/catalog.js";
import { DawApiError } from "../errors.js";
import { chordToMidi } from "../music/chord-symbols.js";
import { midiNotesToNames } from "../music/note-parser.js";
import type { DawApi, PlacedNote } from "../types.js";

export type Handler<K extends CommandName> = (args: CommandArgsMap[K]) => Promise<unknown>;

export type HandlerTable = { [K in CommandName]: Handler<K> };

function unsupported(command: CommandName): DawApiError {
  return new DawApiError(command, `${command} is not supported by this DAW host`);
}

/** Build the handler table for one DAW host. */
export function createHandlerTable(daw: DawApi): HandlerTable {
  const channelOrSelected = async (channel: number | undefined): Promise<number> =>
    channel ?? (await daw.selectedChannel());

  return {
    // ─── Notes & Patterns ─────────────────────────────────────────────────

    play_note: async (args) => {
      const channel = await channelOrSelected(args.channel_index);
      await daw.playNote(channel, args.note, args.velocity, args.duration_seconds);
      return { channel, note: args.note };
    },

    create_chord_progression: async (args) => {
      const channel = await channelOrSelected(args.channel_index);
      const notes: PlacedNote[] = [];
      const chords = args.chords.map((symbol, i) => {
        const startBeat = args.start_beat + i * args.duration_beats;
        const voicing = chordToMidi(symbol, args.octave);
        for (const note of voicing) {
          notes.push({ note, velocity: args.velocity, startBeat, lengthBeats: args.duration_beats });
        }
        return { symbol, start_beat: startBeat, notes: midiNotesToNames(voicing) };
      });
      await daw.addNotes(channel, notes);
      return { channel, chords };
    },

    create_melody: async (args) => {
      if (!daw.createMelody) throw unsupported("create_melody");
      return daw.createMelody(args);
    },

    select_pattern: async (args) => {
      await daw.selectPattern(args.pattern);
      return { pattern: args.pattern };
    },

    get_current_pattern: async () => ({ pattern: await daw.currentPattern() }),

    // ─── Channels ─────────────────────────────────────────────────────────

    create_track: async (args) => ({
      index: await daw.createTrack(args.track_type, args.name),
      track_type: args.track_type,
    }),

    load_instrument: async (args) => ({
      channel: await daw.loadInstrument(args.instrument, args.channel_index),
      instrument: args.instrument,
    }),

    add_midi_effect: async (args) => {
      await daw.addMidiEffect(args.channel_index, args.effect);
      return { channel: args.channel_index, effect: args.effect };
    },

    get_channel_names: async () => ({ names: await daw.getChannelNames() }),

    get_channel_name: async (args) => ({
      index: args.index,
      name: await daw.getChannelName(args.index),
    }),

    get_channel_count: async () => ({ count: await daw.getChannelCount() }),

    select_channel: async (args) => {
      await daw.selectChannel(args.index);
      return { index: args.index };
    },

    set_channel_volume: async (args) => {
      await daw.setChannelVolume(args.index, args.volume);
      return { index: args.index, volume: args.volume };
    },

    set_channel_pan: async (args) => {
      await daw.setChannelPan(args.index, args.pan);
      return { index: args.index, pan: args.pan };
    },

    set_channel_mute: async (args) => {
      await daw.setChannelMute(args.index, args.mute);
      return { index: args.index, mute: args.mute };
    },

    set_channel_solo: async (args) => {
      await daw.setChannelSolo(args.index, args.solo);
      return { index: args.index, solo: args.solo };
    },

    // ─── Mixer ────────────────────────────────────────────────────────────

    set_mixer_level: async (args) => {
      await daw.setMixerLevel(args.track_index, args.level);
      return { track_index: args.track_index, level: args.level };
    },

    get_mixer_level: async (args) => ({
      track_index: args.track_index,
      level: await daw.getMixerLevel(args.track_index),
    }),

    get_mixer_track_count: async () => ({ count: await daw.getMixerTrackCount() }),

    set_master_level: async (args) => {
      await daw.setMixerLevel(0, args.level);
      return { level: args.level };
    },

    add_audio_effect: async (args) => ({
      track_index: args.track_index,
      effect: args.effect,
      slot: await daw.addAudioEffect(args.track_index, args.effect, args.slot),
    }),

    automate_parameter: async (args) => {
      if (!daw.automateParameter) throw unsupported("automate_parameter");
      return daw.automateParameter(args);
    },

    // ─── Project & Transport ──────────────────────────────────────────────

    set_tempo: async (args) => {
      await daw.setTempo(args.bpm);
      return { bpm: args.bpm };
    },

    get_tempo: async () => ({ bpm: await daw.getTempo() }),

    control_transport: async (args) => ({
      action: args.action,
      ...(await daw.transport(args.action)),
    }),

    get_is_playing: async () => ({ playing: await daw.isPlaying() }),

    set_arrangement: async (args) => {
      if (!daw.setArrangement) throw unsupported("set_arrangement");
      return daw.setArrangement(args);
    },

    get_status: async () => {
      if (!daw.getStatus) throw unsupported("get_status");
      return daw.getStatus();
    },
  };
}
