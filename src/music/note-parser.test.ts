import { describe, it, expect } from "vitest";
import { midiNotesToNames, midiToNoteName, parseNoteToMidi, resolveNote } from "./note-parser.js";

describe("parseNoteToMidi", () => {
  it("converts C4 to 60 (middle C)", () => {
    expect(parseNoteToMidi("C4")).toBe(60);
  });

  it("converts A4 to 69 (concert A)", () => {
    expect(parseNoteToMidi("A4")).toBe(69);
  });

  it("handles sharps: F#5 = 78", () => {
    expect(parseNoteToMidi("F#5")).toBe(78);
  });

  it("handles flats: Bb3 = 58", () => {
    expect(parseNoteToMidi("Bb3")).toBe(58);
  });

  it("handles the lowest octave: C-1 = 0", () => {
    expect(parseNoteToMidi("C-1")).toBe(0);
  });

  it("throws on invalid note", () => {
    expect(() => parseNoteToMidi("X4")).toThrow("Invalid note");
  });

  it("throws past G9", () => {
    expect(() => parseNoteToMidi("G#9")).toThrow("MIDI note out of range: 128");
  });
});

describe("midiToNoteName", () => {
  it("names notes with sharps", () => {
    expect(midiToNoteName(60)).toBe("C4");
    expect(midiToNoteName(78)).toBe("F#5");
  });

  it("lists notes lowest first", () => {
    expect(midiNotesToNames([67, 60, 64])).toBe("C4 E4 G4");
  });
});

describe("resolveNote", () => {
  it("accepts numbers and names", () => {
    expect(resolveNote(61)).toBe(61);
    expect(resolveNote("Db4")).toBe(61);
  });
});
