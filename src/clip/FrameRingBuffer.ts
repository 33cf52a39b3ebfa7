/**
 * FrameRingBuffer - Circular buffer of timestamped frames.
 *
 * Frames are kept in arrival order. Eviction is explicit and time-based
 * (`evictBefore`) so the owner decides what must be retained. The slot
 * count starts at `initialCapacity` and doubles when full, up to
 * `maxCapacity`; only a push into a full ring at the hard cap drops the
 * oldest frame, and that drop is counted.
 */

import type { BufferedFrame } from "./clipTypes";

export class FrameRingBuffer {
  private slots: (BufferedFrame | undefined)[];
  private _capacity: number;
  private readonly maxCapacity: number;
  private head = 0; // write position
  private tail = 0; // oldest frame
  private _size = 0;
  private overflowFrames = 0;

  constructor(initialCapacity: number, maxCapacity = initialCapacity) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 1) {
      throw new RangeError(
        `FrameRingBuffer capacity must be a positive integer, got ${initialCapacity}`,
      );
    }
    if (!Number.isInteger(maxCapacity) || maxCapacity < initialCapacity) {
      throw new RangeError(
        `FrameRingBuffer max capacity must be an integer >= ${initialCapacity}, got ${maxCapacity}`,
      );
    }
    this._capacity = initialCapacity;
    this.maxCapacity = maxCapacity;
    this.slots = new Array<BufferedFrame | undefined>(initialCapacity);
  }

  get length(): number {
    return this._size;
  }

  /** Current slot count */
  get capacity(): number {
    return this._capacity;
  }

  /**
   * Append a frame, growing the ring when full. At the hard cap the oldest
   * frame is discarded and returned.
   */
  push(frame: BufferedFrame): BufferedFrame | undefined {
    let dropped: BufferedFrame | undefined;
    if (this._size === this._capacity) {
      if (this._capacity < this.maxCapacity) {
        this.grow();
      } else {
        this.overflowFrames++;
        dropped = this.dropOldest();
      }
    }
    this.slots[this.head] = frame;
    this.head = (this.head + 1) % this._capacity;
    this._size++;
    return dropped;
  }

  /** Oldest frame, without removing it */
  peekOldest(): BufferedFrame | undefined {
    return this._size > 0 ? this.slots[this.tail] : undefined;
  }

  peekNewest(): BufferedFrame | undefined {
    if (this._size === 0) return undefined;
    return this.slots[(this.head - 1 + this._capacity) % this._capacity];
  }

  /**
   * Drop frames from the old end while their timestamp is below `cutoff`.
   * Stops at the first frame that is recent enough, so a late out-of-order
   * frame behind it survives until it reaches the old end.
   */
  evictBefore(cutoff: number): number {
    let evicted = 0;
    for (;;) {
      const oldest = this.peekOldest();
      if (!oldest || oldest.timestamp >= cutoff) break;
      this.dropOldest();
      evicted++;
    }
    return evicted;
  }

  /** Copy of the frames (oldest first) for which `predicate` holds. */
  filter(predicate: (frame: BufferedFrame) => boolean): BufferedFrame[] {
    const out: BufferedFrame[] = [];
    for (let i = 0; i < this._size; i++) {
      const frame = this.slots[(this.tail + i) % this._capacity];
      if (frame && predicate(frame)) out.push(frame);
    }
    return out;
  }

  /** Reset to empty, keeping the current slot count */
  clear(): void {
    this.slots = new Array<BufferedFrame | undefined>(this._capacity);
    this.head = 0;
    this.tail = 0;
    this._size = 0;
  }

  /** Frames dropped because the ring was full at its hard cap */
  get totalOverflow(): number {
    return this.overflowFrames;
  }

  private grow(): void {
    const next = Math.min(this.maxCapacity, this._capacity * 2);
    const slots = new Array<BufferedFrame | undefined>(next);
    for (let i = 0; i < this._size; i++) {
      slots[i] = this.slots[(this.tail + i) % this._capacity];
    }
    this.slots = slots;
    this.tail = 0;
    this.head = this._size % next;
    this._capacity = next;
  }

  private dropOldest(): BufferedFrame | undefined {
    const frame = this.slots[this.tail];
    this.slots[this.tail] = undefined;
    this.tail = (this.tail + 1) % this._capacity;
    this._size--;
    return frame;
  }
}
