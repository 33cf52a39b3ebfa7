import { describe, it, expect } from "vitest";
import { FrameRingBuffer } from "../FrameRingBuffer";
import type { BufferedFrame } from "../clipTypes";

const frame = (seq: number, timestamp = seq * 10): BufferedFrame => ({
  seq,
  timestamp,
  data: Uint8Array.of(seq),
});

const seqs = (ring: FrameRingBuffer) => ring.filter(() => true).map((f) => f.seq);

describe("FrameRingBuffer", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new FrameRingBuffer(0)).toThrow(RangeError);
    expect(() => new FrameRingBuffer(2.5)).toThrow(RangeError);
    expect(() => new FrameRingBuffer(4, 2)).toThrow(RangeError);
  });

  it("keeps frames in arrival order", () => {
    const ring = new FrameRingBuffer(4);
    [0, 1, 2].forEach((s) => ring.push(frame(s)));
    expect(ring.length).toBe(3);
    expect(seqs(ring)).toEqual([0, 1, 2]);
    expect(ring.peekOldest()?.seq).toBe(0);
    expect(ring.peekNewest()?.seq).toBe(2);
  });

  it("drops and counts the oldest frame when full at the cap", () => {
    const ring = new FrameRingBuffer(3);
    const dropped = [0, 1, 2, 3, 4].map((s) => ring.push(frame(s))?.seq);
    expect(dropped).toEqual([undefined, undefined, undefined, 0, 1]);
    expect(seqs(ring)).toEqual([2, 3, 4]);
    expect(ring.totalOverflow).toBe(2);
  });

  it("doubles instead of dropping below the cap, keeping order across the wrap", () => {
    const ring = new FrameRingBuffer(2, 5);
    [0, 1].forEach((s) => ring.push(frame(s)));
    ring.evictBefore(10); // tail now mid-array
    [2, 3].forEach((s) => ring.push(frame(s)));

    expect(ring.capacity).toBe(4);
    expect(seqs(ring)).toEqual([1, 2, 3]);

    [4, 5, 6].forEach((s) => ring.push(frame(s)));
    expect(ring.capacity).toBe(5);
    expect(seqs(ring)).toEqual([2, 3, 4, 5, 6]);
    expect(ring.totalOverflow).toBe(1);
    expect(ring.peekNewest()?.seq).toBe(6);
  });

  it("evicts from the old end up to the first recent frame", () => {
    const ring = new FrameRingBuffer(8);
    ring.push(frame(0, 0));
    ring.push(frame(1, 50));
    ring.push(frame(2, 20)); // late, out of order
    ring.push(frame(3, 60));

    expect(ring.evictBefore(30)).toBe(1);
    // The late frame survives behind a recent one
    expect(seqs(ring)).toEqual([1, 2, 3]);
  });

  it("filters without exposing the ring", () => {
    const ring = new FrameRingBuffer(4);
    [0, 1, 2, 3].forEach((s) => ring.push(frame(s)));
    const copy = ring.filter((f) => f.seq % 2 === 1);
    copy.pop();
    expect(copy.map((f) => f.seq)).toEqual([1]);
    expect(ring.length).toBe(4);
  });

  it("clears to empty", () => {
    const ring = new FrameRingBuffer(2);
    ring.push(frame(0));
    ring.clear();
    expect(ring.length).toBe(0);
    expect(ring.peekOldest()).toBeUndefined();
    expect(ring.peekNewest()).toBeUndefined();
  });
});
