/**
 * Clip serialization shared by the local and HTTP clip stores.
 *
 * A clip is stored as Motion-JPEG: the captured JPEG frames concatenated in
 * order. Per-frame timing goes in a JSON manifest beside it.
 */

import type { Clip } from "../clip/clipTypes";

export const CLIP_EXTENSION = ".mjpeg";
export const CLIP_CONTENT_TYPE = "video/x-motion-jpeg";

export interface ClipManifest {
  event_id: string;
  format: "mjpeg";
  confidence: number;
  alert_time_iso: string;
  frame_rate: number;
  frame_count: number;
  window_ms: { start: number; anchor: number; end: number };
  /** Per-frame offset from the window start, ms */
  frame_offsets_ms: number[];
  frame_bytes: number[];
}

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * `fall_YYYYMMDD_HHMMSS_<epochSeconds>_<eventId>` in UTC, from the alert's
 * wall time. The event id keeps clips of sources alerting in the same second
 * apart; characters outside `[A-Za-z0-9_-]` become `-`.
 */
export function clipBaseName(clip: Clip): string {
  const d = new Date(clip.alertWallTime);
  const date = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  const id = clip.eventId.replace(/[^A-Za-z0-9_-]/g, "-");
  return `fall_${date}_${time}_${Math.floor(clip.alertWallTime / 1000)}_${id}`;
}

export function encodeMjpeg(clip: Clip): Uint8Array {
  let total = 0;
  for (const frame of clip.frames) total += frame.data.byteLength;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const frame of clip.frames) {
    out.set(frame.data, offset);
    offset += frame.data.byteLength;
  }
  return out;
}

export function buildClipManifest(clip: Clip): ClipManifest {
  return {
    event_id: clip.eventId,
    format: "mjpeg",
    confidence: Math.round(clip.confidence * 1000) / 1000,
    alert_time_iso: new Date(clip.alertWallTime).toISOString(),
    frame_rate: clip.frameRate,
    frame_count: clip.frames.length,
    window_ms: {
      start: clip.startTimestamp,
      anchor: clip.anchorTimestamp,
      end: clip.endTimestamp,
    },
    frame_offsets_ms: clip.frames.map((f) => f.timestamp - clip.startTimestamp),
    frame_bytes: clip.frames.map((f) => f.data.byteLength),
  };
}
