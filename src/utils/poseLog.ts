/**
 * JSONL pose logs: one `{ "t": ms, "landmarks": [...] | null }` per line.
 * Used to replay recorded or synthetic sessions through a pipeline offline.
 */

import type { Landmark } from "../pose/poseTypes";
import type { ScriptedFrame } from "./SyntheticPoseGenerator";

export interface PoseLogIssue {
  line: number;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toLandmark(value: unknown): Landmark | null {
  if (!isRecord(value)) return null;
  const { x, y, z, visibility } = value;
  if (typeof x !== "number" || typeof y !== "number") return null;
  return {
    x,
    y,
    z: typeof z === "number" ? z : 0,
    visibility: typeof visibility === "number" ? visibility : 1,
  };
}

export function parsePoseLog(text: string): {
  frames: ScriptedFrame[];
  issues: PoseLogIssue[];
} {
  const frames: ScriptedFrame[] = [];
  const issues: PoseLogIssue[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    if (raw.trim() === "") return;

    let entry: unknown;
    try {
      entry = JSON.parse(raw);
    } catch {
      issues.push({ line, message: "invalid JSON" });
      return;
    }
    if (!isRecord(entry) || typeof entry.t !== "number") {
      issues.push({ line, message: 'expected an object with numeric "t"' });
      return;
    }

    if (entry.landmarks === null || entry.landmarks === undefined) {
      frames.push({ t: entry.t, landmarks: null });
      return;
    }
    if (!Array.isArray(entry.landmarks)) {
      issues.push({ line, message: '"landmarks" must be an array or null' });
      return;
    }

    const pose: Landmark[] = [];
    for (const item of entry.landmarks) {
      const landmark = toLandmark(item);
      if (!landmark) {
        issues.push({ line, message: "landmark without numeric x/y" });
        return;
      }
      pose.push(landmark);
    }
    frames.push({ t: entry.t, landmarks: pose });
  });

  return { frames, issues };
}

const round = (value: number) => Math.round(value * 10000) / 10000;

export function formatPoseLog(frames: readonly ScriptedFrame[]): string {
  const lines = frames.map((frame) =>
    JSON.stringify({
      t: frame.t,
      landmarks: frame.landmarks
        ? frame.landmarks.map((l) => ({
            x: round(l.x),
            y: round(l.y),
            z: round(l.z),
            visibility: round(l.visibility),
          }))
        : null,
    }),
  );
  return `${lines.join("\n")}\n`;
}

/** Stand-in JPEG bytes (SOI, frame index, EOI) for replays without video. */
export function placeholderJpeg(index: number): Uint8Array {
  return Uint8Array.of(
    0xff,
    0xd8,
    (index >>> 8) & 0xff,
    index & 0xff,
    0xff,
    0xd9,
  );
}
