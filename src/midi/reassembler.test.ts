import { describe, it, expect, beforeEach } from "vitest";
import { silentLogger } from "../logger.js";
import { SysExReassembler } from "./reassembler.js";
import { framePayload, parseEnvelope, type ChunkEnvelope } from "./sysex.js";

const payload = { chords: ["C", "G", "Am", "F"], duration_beats: 4, octave: 4, start_beat: 0, velocity: 100 };

function chunks(tag: number, value: unknown = payload): ChunkEnvelope[] {
  return framePayload(0x08, tag, value, { maxChunkBytes: 32, maxChunksPerCommand: 64 }).map((message) => {
    const envelope = parseEnvelope(message);
    if (!envelope) throw new Error("framing produced an unparseable message");
    return envelope;
  });
}

describe("SysExReassembler", () => {
  let clock: number;
  let reassembler: SysExReassembler;

  beforeEach(() => {
    clock = 0;
    reassembler = new SysExReassembler({ timeoutMs: 5000, logger: silentLogger(), now: () => clock });
  });

  it("completes once every chunk has arrived", () => {
    const [a, b, c] = chunks(7);
    expect(reassembler.push(a)).toBeNull();
    expect(reassembler.push(b)).toBeNull();
    expect(reassembler.push(c)).toEqual({ ok: true, tag: 7, commandId: 0x08, payload });
    expect(reassembler.pendingCount).toBe(0);
  });

  it("tolerates out-of-order arrival", () => {
    const [a, b, c] = chunks(7);
    expect(reassembler.push(c)).toBeNull();
    expect(reassembler.push(a)).toBeNull();
    expect(reassembler.push(b)).toMatchObject({ ok: true, payload });
  });

  it("ignores duplicate chunks", () => {
    const [a, b, c] = chunks(7);
    reassembler.push(a);
    expect(reassembler.push(a)).toBeNull();
    reassembler.push(b);
    expect(reassembler.push(c)).toMatchObject({ ok: true, payload });
  });

  it("keeps sequences for different tags apart", () => {
    const first = chunks(1, { n: "first" });
    const second = chunks(2, { n: "second" });
    expect(reassembler.push(first[0])).toMatchObject({ tag: 1, payload: { n: "first" } });
    expect(reassembler.push(second[0])).toMatchObject({ tag: 2, payload: { n: "second" } });
  });

  it("purges partial sequences once they reach the timeout", () => {
    const [a] = chunks(7);
    reassembler.push(a);
    clock = 4999;
    expect(reassembler.sweep()).toBe(0);
    expect(reassembler.isPending(7)).toBe(true);
    clock = 5000;
    expect(reassembler.sweep()).toBe(1);
    expect(reassembler.pendingCount).toBe(0);
  });

  it("starts over when a late chunk arrives after the purge", () => {
    const [a, b, c] = chunks(7);
    reassembler.push(a);
    clock = 6000;
    expect(reassembler.push(b)).toBeNull();
    expect(reassembler.push(c)).toBeNull();
    expect(reassembler.pendingCount).toBe(1);
  });

  it("replaces a partial sequence when its tag shows up with another shape", () => {
    const [a] = chunks(7);
    reassembler.push(a);
    const [single] = chunks(7, { short: true });
    expect(reassembler.push(single)).toMatchObject({ ok: true, tag: 7, payload: { short: true } });
    expect(reassembler.pendingCount).toBe(0);
  });

  it("reports undecodable payloads as failures", () => {
    const broken: ChunkEnvelope = {
      commandId: 0x30,
      tag: 3,
      index: 0,
      total: 1,
      payload: new TextEncoder().encode("{bpm:"),
    };
    const result = reassembler.push(broken);
    expect(result?.ok).toBe(false);
    if (result && !result.ok) expect(result.error).toMatch(/^Malformed payload: /);
  });
});
