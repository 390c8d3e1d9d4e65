// ─── 7-bit Packing ───────────────────────────────────────────────────────────
//
// SysEx data bytes must stay below 0x80. Arbitrary bytes are packed in groups
// of up to seven: a header byte carrying the high bit of each member (bit i
// for member i), followed by the members with their high bit cleared.
// The final group is not padded, so n bytes pack into n + ceil(n / 7).
// ─────────────────────────────────────────────────────────────────────────────

const GROUP = 7;

export function packedLength(rawLength: number): number {
  return rawLength + Math.ceil(rawLength / GROUP);
}

export function pack7(data: ArrayLike<number>): number[] {
  const out: number[] = [];
  for (let start = 0; start < data.length; start += GROUP) {
    const end = Math.min(start + GROUP, data.length);
    let highBits = 0;
    const group: number[] = [];
    for (let i = start; i < end; i++) {
      const byte = data[i];
      if (byte & 0x80) highBits |= 1 << (i - start);
      group.push(byte & 0x7f);
    }
    out.push(highBits, ...group);
  }
  return out;
}

/**
 * Inverse of pack7.
 * @throws RangeError on a byte >= 0x80 or a dangling header byte.
 */
export function unpack7(packed: ArrayLike<number>): Uint8Array {
  const out: number[] = [];
  for (let start = 0; start < packed.length; start += GROUP + 1) {
    const highBits = packed[start];
    const end = Math.min(start + GROUP + 1, packed.length);
    if (end - start < 2) {
      throw new RangeError("Packed data ends with a header byte and no members");
    }
    for (let i = start; i < end; i++) {
      if (packed[i] > 0x7f) {
        throw new RangeError(`Packed byte 0x${packed[i].toString(16)} has its high bit set`);
      }
    }
    for (let i = start + 1; i < end; i++) {
      const bit = (highBits >> (i - start - 1)) & 1;
      out.push(packed[i] | (bit << 7));
    }
  }
  return Uint8Array.from(out);
}
