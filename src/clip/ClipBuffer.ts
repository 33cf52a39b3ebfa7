/**
 * Rolling Clip Buffer
 * ===================
 *
 * Keeps the last `preEventMs` of raw frames warm and, once an alert anchors a
 * recording, holds every frame of `[anchor − pre, anchor + post]` until the
 * coordinator finalizes it into an immutable Clip.
 *
 * Retention is by time. The ring starts at twice the nominal frame count of
 * the whole window and grows on demand, so a camera faster than `frameRate`
 * loses nothing; only the hard cap drops frames, and that is reported.
 *
 * All methods are synchronous: ingestion never waits on a finalization, and
 * `finalize()` hands back a frozen copy, so the reader never iterates the
 * live ring.
 *
 * @module clip/ClipBuffer
 */

import type { ErrorReporter } from "../lib/boundaries";
import { ClipBufferOverflowError } from "../lib/errors";
import { clipLog } from "../lib/logger";
import type { ConfigProvider } from "../store/configStore";
import type {
  BufferedFrame,
  Clip,
  ClipBufferStats,
  RecordingWindow,
} from "./clipTypes";
import { FrameRingBuffer } from "./FrameRingBuffer";

/** Slots per nominal frame of the full pre+post window */
const CAPACITY_HEADROOM = 2;

/** Hard cap, as a multiple of the initial slot count */
const MAX_GROWTH = 16;

export interface RecordingMetadata {
  eventId: string;
  confidence: number;
  alertWallTime: number;
}

export function ringCapacityFor(
  preEventMs: number,
  postEventMs: number,
  frameRate: number,
): number {
  const seconds = (preEventMs + postEventMs) / 1000;
  return Math.max(1, Math.ceil(seconds * frameRate * CAPACITY_HEADROOM));
}

export class ClipBuffer {
  private readonly ring: FrameRingBuffer;
  private recording: RecordingWindow | null = null;
  private nextSeq = 0;
  private latestTimestamp = Number.NEGATIVE_INFINITY;
  private retainFloor: number | null = null;
  private windowClosed: (() => void) | null = null;
  private overflowing = false;

  constructor(
    private readonly getConfig: ConfigProvider,
    private readonly reporter?: ErrorReporter,
  ) {
    const { preEventMs, postEventMs, frameRate } = getConfig();
    const initial = ringCapacityFor(preEventMs, postEventMs, frameRate);
    this.ring = new FrameRingBuffer(initial, initial * MAX_GROWTH);
  }

  /**
   * Append a frame and evict what has fallen out of the pre-event window.
   * While a recording is in flight nothing at or after its window start is
   * evicted.
   */
  ingest(data: Uint8Array, timestamp: number): BufferedFrame {
    const frame: BufferedFrame = Object.freeze({
      seq: this.nextSeq++,
      timestamp,
      data,
    });
    const dropped = this.ring.push(frame);
    if (dropped) this.reportOverflow(dropped);
    else this.overflowing = false;

    if (timestamp > this.latestTimestamp) this.latestTimestamp = timestamp;
    this.evict();

    const window = this.recording;
    if (window && timestamp > window.endTimestamp) this.releaseWindowWaiter();
    return frame;
  }

  /**
   * Keep the pre-event window of `timestamp` even when newer frames have
   * arrived: frames ingested ahead of detection may still turn out to anchor
   * an alert. `null` measures retention from the newest frame again.
   */
  retainFrom(timestamp: number | null): void {
    this.retainFloor = timestamp;
    this.evict();
  }

  /**
   * Resolves once a frame past the recording's end has been ingested, or the
   * recording is finalized or dropped. Resolves at once with no recording.
   */
  whenWindowClosed(): Promise<void> {
    const window = this.recording;
    if (!window || this.latestTimestamp > window.endTimestamp) return Promise.resolve();
    this.releaseWindowWaiter();
    return new Promise<void>((resolve) => {
      this.windowClosed = resolve;
    });
  }

  /**
   * Start holding the window around `anchorTimestamp`. Returns false (and
   * changes nothing) when a recording is already in flight.
   */
  beginRecording(anchorTimestamp: number, meta: RecordingMetadata): boolean {
    if (this.recording) {
      clipLog.warn(
        `Consistency warning: recording ${this.recording.eventId} already in flight; rejected ${meta.eventId}`,
      );
      return false;
    }

    const { preEventMs, postEventMs } = this.getConfig();
    this.recording = {
      eventId: meta.eventId,
      confidence: meta.confidence,
      alertWallTime: meta.alertWallTime,
      anchorTimestamp,
      startTimestamp: anchorTimestamp - preEventMs,
      endTimestamp: anchorTimestamp + postEventMs,
    };
    clipLog.info(
      `Recording ${meta.eventId}: ${this.recording.startTimestamp}..${this.recording.endTimestamp}ms`,
    );
    return true;
  }

  isRecording(): boolean {
    return this.recording !== null;
  }

  getRecordingWindow(): Readonly<RecordingWindow> | null {
    return this.recording;
  }

  /**
   * Freeze the in-flight window into a Clip (timestamp order, ties by ingest
   * order) and resume normal eviction. Returns null when nothing is recording.
   */
  finalize(): Clip | null {
    const window = this.recording;
    if (!window) {
      clipLog.warn("finalize() called with no recording in flight");
      return null;
    }

    const frames = this.ring
      .filter(
        (f) =>
          f.timestamp >= window.startTimestamp && f.timestamp <= window.endTimestamp,
      )
      .sort((a, b) => a.timestamp - b.timestamp || a.seq - b.seq);

    this.recording = null;
    this.releaseWindowWaiter();
    this.evict();

    clipLog.info(`Finalized ${window.eventId} with ${frames.length} frame(s)`);
    return Object.freeze({
      eventId: window.eventId,
      confidence: window.confidence,
      anchorTimestamp: window.anchorTimestamp,
      startTimestamp: window.startTimestamp,
      endTimestamp: window.endTimestamp,
      alertWallTime: window.alertWallTime,
      frameRate: this.getConfig().frameRate,
      frames: Object.freeze(frames),
    });
  }

  /** Drop the in-flight window without producing a clip. */
  cancelRecording(): RecordingWindow | null {
    const window = this.recording;
    if (!window) return null;
    this.recording = null;
    this.releaseWindowWaiter();
    this.evict();
    clipLog.info(`Discarded recording ${window.eventId}`);
    return window;
  }

  /** Empty the ring (and any recording) */
  clear(): void {
    this.ring.clear();
    this.recording = null;
    this.releaseWindowWaiter();
    this.latestTimestamp = Number.NEGATIVE_INFINITY;
    this.retainFloor = null;
  }

  getStats(): ClipBufferStats {
    const window = this.recording;
    return {
      bufferedFrames: this.ring.length,
      capacity: this.ring.capacity,
      isRecording: window !== null,
      recordingFrames: window
        ? this.ring.filter(
            (f) =>
              f.timestamp >= window.startTimestamp &&
              f.timestamp <= window.endTimestamp,
          ).length
        : 0,
      overflowFrames: this.ring.totalOverflow,
      oldestTimestamp: this.ring.peekOldest()?.timestamp ?? null,
      newestTimestamp: this.ring.peekNewest()?.timestamp ?? null,
    };
  }

  private evict(): void {
    if (!Number.isFinite(this.latestTimestamp)) return;
    const reference =
      this.retainFloor === null
        ? this.latestTimestamp
        : Math.min(this.latestTimestamp, this.retainFloor);
    let cutoff = reference - this.getConfig().preEventMs;
    if (this.recording) cutoff = Math.min(cutoff, this.recording.startTimestamp);
    this.ring.evictBefore(cutoff);
  }

  private releaseWindowWaiter(): void {
    const resolve = this.windowClosed;
    this.windowClosed = null;
    resolve?.();
  }

  /** One report per run of consecutive drops */
  private reportOverflow(dropped: BufferedFrame): void {
    if (this.overflowing) return;
    this.overflowing = true;
    const error = new ClipBufferOverflowError(this.ring.capacity, dropped.timestamp);
    if (this.reporter) {
      this.reporter.report(error, {
        stage: "clip-buffer",
        eventId: this.recording?.eventId ?? null,
      });
    } else {
      clipLog.warn(error.message);
    }
  }
}
