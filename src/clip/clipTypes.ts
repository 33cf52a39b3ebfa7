/**
 * Raw frame and clip types shared by the ring, the clip buffer and storage.
 */

export interface BufferedFrame {
  /** Ingest order; breaks timestamp ties and identifies duplicates */
  readonly seq: number;
  /** Monotonic capture time, ms */
  readonly timestamp: number;
  /** Encoded image (JPEG) exactly as captured */
  readonly data: Uint8Array;
}

export interface Clip {
  readonly eventId: string;
  readonly confidence: number;
  readonly anchorTimestamp: number;
  /** anchor − pre-event window */
  readonly startTimestamp: number;
  /** anchor + post-event window */
  readonly endTimestamp: number;
  /** Wall-clock ms of the alert, for naming and metadata */
  readonly alertWallTime: number;
  readonly frameRate: number;
  readonly frames: readonly BufferedFrame[];
}

export interface RecordingWindow {
  eventId: string;
  confidence: number;
  alertWallTime: number;
  anchorTimestamp: number;
  startTimestamp: number;
  endTimestamp: number;
}

export interface ClipBufferStats {
  bufferedFrames: number;
  capacity: number;
  isRecording: boolean;
  /** Frames inside the in-flight window so far */
  recordingFrames: number;
  overflowFrames: number;
  oldestTimestamp: number | null;
  newestTimestamp: number | null;
}
