// ─── Note Names ──────────────────────────────────────────────────────────────
//
// Scientific pitch notation <-> MIDI note numbers. Middle C is C4 = 60.
// ─────────────────────────────────────────────────────────────────────────────

import { ValidationError } from "../errors.js";

export const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

/** Semitone offset of each natural note from C. */
export const NOTE_OFFSETS: Readonly<Record<string, number>> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

/** Pitch class (0-11) of a letter plus optional accidental, e.g. "Bb" -> 10. */
export function pitchClass(letter: string, accidental?: string): number {
  const base = NOTE_OFFSETS[letter.toUpperCase()];
  if (base === undefined) {
    throw new ValidationError(`Unknown note letter: "${letter}"`);
  }
  const shift = accidental === "#" ? 1 : accidental === "b" ? -1 : 0;
  return (base + shift + 12) % 12;
}

/**
 * Parse a scientific pitch string into a MIDI note number.
 *
 * Examples:
 *   "C4"  → 60  (middle C)
 *   "A4"  → 69  (concert A)
 *   "F#5" → 78
 *   "Bb3" → 58
 *   "C-1" → 0
 */
export function parseNoteToMidi(noteStr: string): number {
  const match = noteStr.trim().match(/^([A-Ga-g])(#|b)?(-1|\d)$/);
  if (!match) {
    throw new ValidationError(`Invalid note: "${noteStr}"`);
  }

  const [, letter, accidental, octaveStr] = match;
  let midi = (parseInt(octaveStr, 10) + 1) * 12 + (NOTE_OFFSETS[letter.toUpperCase()] ?? 0);
  if (accidental === "#") midi += 1;
  if (accidental === "b") midi -= 1;

  if (midi < 0 || midi > 127) {
    throw new ValidationError(`MIDI note out of range: ${midi} (from "${noteStr}")`);
  }
  return midi;
}

/**
 * Convert a MIDI note number back to a note name (for display).
 *
 * 60 → "C4", 69 → "A4", 78 → "F#5"
 */
export function midiToNoteName(midi: number): string {
  const octave = Math.floor(midi / 12) - 1;
  return `${NOTE_NAMES[midi % 12]}${octave}`;
}

/** Compact note names like "C4 E4 G4", lowest first. */
export function midiNotesToNames(midiNotes: readonly number[]): string {
  return [...midiNotes]
    .sort((a, b) => a - b)
    .map(midiToNoteName)
    .join(" ");
}

/** Accept either a MIDI number or a note name. */
export function resolveNote(note: number | string): number {
  return typeof note === "number" ? note : parseNoteToMidi(note);
}
