import { describe, it, expect } from "vitest";
import { TransportError } from "../errors.js";
import { TagAllocator } from "./tags.js";

describe("TagAllocator", () => {
  it("starts at 1 and counts up", () => {
    const tags = new TagAllocator();
    expect([tags.allocate(), tags.allocate(), tags.allocate()]).toEqual([1, 2, 3]);
    expect(tags.inFlightCount).toBe(3);
  });

  it("keeps counting after a release instead of reusing at once", () => {
    const tags = new TagAllocator();
    tags.allocate();
    const second = tags.allocate();
    tags.allocate();
    tags.release(second);
    expect(tags.allocate()).toBe(4);
    expect(tags.isInFlight(second)).toBe(false);
  });

  it("wraps from 127 to 1", () => {
    const tags = new TagAllocator(126);
    expect(tags.allocate()).toBe(127);
    expect(tags.allocate()).toBe(1);
  });

  it("skips tags still in flight after wrapping", () => {
    const tags = new TagAllocator();
    for (let i = 0; i < 127; i++) tags.allocate();
    tags.release(1);
    tags.release(3);
    expect(tags.allocate()).toBe(1);
    expect(tags.allocate()).toBe(3);
  });

  it("throws once all 127 tags are in flight", () => {
    const tags = new TagAllocator();
    const issued = Array.from({ length: 127 }, () => tags.allocate());
    expect(new Set(issued).size).toBe(127);
    expect(() => tags.allocate()).toThrow(TransportError);
    tags.release(42);
    expect(tags.allocate()).toBe(42);
  });
});
