// ─── Tag Allocation ──────────────────────────────────────────────────────────
//
// A tag ties the SysEx chunks of one command (and its status reply) together.
// Tags come from a counter that wraps within 1..127 and skips any tag still
// in flight, so concurrently issued commands never share one.
// ─────────────────────────────────────────────────────────────────────────────

import { TransportError } from "../errors.js";

export const MIN_TAG = 1;
export const MAX_TAG = 0x7f;

export class TagAllocator {
  private readonly inFlight = new Set<number>();
  private last: number;

  constructor(start: number = MAX_TAG) {
    this.last = start;
  }

  /**
   * Reserve the next free tag.
   * @throws TransportError when every tag is in flight.
   */
  allocate(): number {
    const span = MAX_TAG - MIN_TAG + 1;
    for (let step = 1; step <= span; step++) {
      const candidate = ((this.last - MIN_TAG + step) % span) + MIN_TAG;
      if (!this.inFlight.has(candidate)) {
        this.last = candidate;
        this.inFlight.add(candidate);
        return candidate;
      }
    }
    throw new TransportError(`All ${span} SysEx tags are in flight`);
  }

  release(tag: number): void {
    this.inFlight.delete(tag);
  }

  isInFlight(tag: number): boolean {
    return this.inFlight.has(tag);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }
}
