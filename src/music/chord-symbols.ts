// ─── Chord Symbols ───────────────────────────────────────────────────────────
//
// Chord symbol -> MIDI notes, for writing progressions into a pattern.
//
// Usage:
//   chordToMidi("C", 4);     // → [60, 64, 67]
//   chordToMidi("Am", 4);    // → [69, 72, 76]
//   chordToMidi("G7/B", 3);  // → [47, 55, 59, 62, 65]
// ─────────────────────────────────────────────────────────────────────────────

import { ValidationError } from "../errors.js";
import { pitchClass } from "./note-parser.js";

/** Chord quality: intervals from root in semitones. */
const QUALITIES: Readonly<Record<string, readonly number[]>> = {
  // Triads
  "":       [0, 4, 7],
  "m":      [0, 3, 7],
  "dim":    [0, 3, 6],
  "aug":    [0, 4, 8],
  "sus4":   [0, 5, 7],
  "sus2":   [0, 2, 7],

  // Sixths and sevenths
  "6":      [0, 4, 7, 9],
  "m6":     [0, 3, 7, 9],
  "maj7":   [0, 4, 7, 11],
  "m7":     [0, 3, 7, 10],
  "7":      [0, 4, 7, 10],
  "m7b5":   [0, 3, 6, 10],
  "dim7":   [0, 3, 6, 9],
  "maj7#5": [0, 4, 8, 11],
  "mMaj7":  [0, 3, 7, 11],

  // Extensions
  "add9":   [0, 4, 7, 14],
  "9":      [0, 4, 7, 10, 14],
  "m9":     [0, 3, 7, 10, 14],
  "maj9":   [0, 4, 7, 11, 14],
};

/** Alternate spellings. */
const ALIASES: Readonly<Record<string, string>> = {
  "maj": "",
  "M": "",
  "min": "m",
  "-": "m",
  "M7": "maj7",
  "min7": "m7",
  "-7": "m7",
  "ø": "m7b5",
  "°": "dim",
  "+": "aug",
  "sus": "sus4",
};

export interface ParsedChord {
  root: number;
  intervals: readonly number[];
  /** Pitch class of a slash bass, if any. */
  bass?: number;
}

/**
 * Parse a chord symbol such as "C", "F#m7", "Bbmaj7" or "C/E".
 * @throws ValidationError for an unknown root or quality.
 */
export function parseChordSymbol(symbol: string): ParsedChord {
  const match = symbol.trim().match(/^([A-G])(#|b)?([^/]*)(?:\/([A-G])(#|b)?)?$/);
  if (!match) {
    throw new ValidationError(`Invalid chord symbol: "${symbol}"`);
  }

  const [, letter, accidental, rawQuality, bassLetter, bassAccidental] = match;
  const quality = ALIASES[rawQuality] ?? rawQuality;
  const intervals = QUALITIES[quality];
  if (!intervals) {
    throw new ValidationError(`Unknown chord quality "${rawQuality}" in "${symbol}"`);
  }

  const parsed: ParsedChord = { root: pitchClass(letter, accidental), intervals };
  if (bassLetter) parsed.bass = pitchClass(bassLetter, bassAccidental);
  return parsed;
}

/**
 * Voice a chord symbol in close position with its root in `octave`.
 * A slash bass goes below the root, within the octave under it.
 * @throws ValidationError when a voiced note falls outside 0-127.
 */
export function chordToMidi(symbol: string, octave: number): number[] {
  const chord = parseChordSymbol(symbol);
  const rootMidi = (octave + 1) * 12 + chord.root;
  const notes = chord.intervals.map((interval) => rootMidi + interval);
  if (chord.bass !== undefined) {
    notes.unshift(rootMidi - 12 + ((chord.bass - chord.root + 12) % 12));
  }

  const outOfRange = notes.find((n) => n < 0 || n > 127);
  if (outOfRange !== undefined) {
    throw new ValidationError(`"${symbol}" in octave ${octave} reaches MIDI note ${outOfRange}`);
  }
  return notes;
}
