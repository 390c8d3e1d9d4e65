import { describe, it, expect } from "vitest";
import { canonicalJson } from "./canonical-json.js";
import { pack7, packedLength, unpack7 } from "./seven-bit.js";

describe("pack7", () => {
  it("moves high bits into the group header", () => {
    expect(pack7([0x80, 0x01, 0xff])).toEqual([0x05, 0x00, 0x01, 0x7f]);
  });

  it("adds one header byte per group of seven", () => {
    expect(packedLength(0)).toBe(0);
    expect(packedLength(7)).toBe(8);
    expect(packedLength(8)).toBe(10);
    expect(pack7(new Uint8Array(8))).toHaveLength(10);
  });

  it("is reversed by unpack7 for every byte value", () => {
    const all = Uint8Array.from({ length: 256 }, (_, i) => i);
    const packed = pack7(all);
    expect(packed.every((b) => b <= 0x7f)).toBe(true);
    expect(unpack7(packed)).toEqual(all);
  });
});

describe("unpack7", () => {
  it("rejects a trailing header byte", () => {
    expect(() => unpack7([0x00, 0x41, 0x00])).not.toThrow();
    expect(() => unpack7([0x05])).toThrow(RangeError);
  });

  it("rejects bytes with the high bit set", () => {
    expect(() => unpack7([0x80, 0x01])).toThrow(RangeError);
  });
});

describe("canonicalJson", () => {
  it("sorts keys at every depth without whitespace", () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: [{ z: 1, y: 2 }] } })).toBe(
      '{"a":{"c":[{"y":2,"z":1}],"d":2},"b":1}'
    );
  });

  it("drops undefined members", () => {
    expect(canonicalJson({ a: undefined, b: null })).toBe('{"b":null}');
  });
});
