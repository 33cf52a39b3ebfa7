/**
 * Synthetic Pose Generator
 * ========================
 *
 * Deterministic 33-point poses for tests, replays and demo logs. A body is
 * the standing template rotated about the ankles by `tiltDeg` (0 upright,
 * 90 lying on its side) and placed on a ground line in the frame.
 *
 * Body units are frame heights; lateral offsets are divided by the frame
 * aspect so the body keeps its proportions in normalized x.
 */

import { MathUtils } from "three";
import { POSE_LANDMARK_COUNT, type Landmark, type Pose } from "../pose/poseTypes";
import template from "./standingPoseTemplate.json";

export interface BodyPlacement {
  tiltDeg: number;
  /** Normalized x of the ankle midpoint */
  centerX?: number;
  /** Normalized y of the ground line */
  groundY?: number;
  /** Frame width / height */
  frameAspect?: number;
  visibility?: number;
  /** Uniform noise amplitude added to x and y */
  jitter?: number;
  seed?: number;
}

export interface ScriptedFrame {
  /** Monotonic ms */
  t: number;
  landmarks: Pose | null;
}

const DEFAULT_CENTER_X = 0.35;
const DEFAULT_GROUND_Y = 0.9;
const DEFAULT_FRAME_ASPECT = 4 / 3;
const DEFAULT_VISIBILITY = 0.98;

const TEMPLATE: readonly (readonly [number, number])[] = template.landmarks.map(
  (point): [number, number] => [point[0] ?? 0, point[1] ?? 0],
);

if (TEMPLATE.length !== POSE_LANDMARK_COUNT) {
  throw new Error(`Pose template has ${TEMPLATE.length} points, expected ${POSE_LANDMARK_COUNT}`);
}

/** Linear congruential generator in [-1, 1] */
function createNoise(seed: number): () => number {
  let state = seed & 0x7fffffff;
  return () => {
    state = (state * 1664525 + 1013904223) & 0x7fffffff;
    return (state / 0x7fffffff) * 2 - 1;
  };
}

export function poseAt(placement: BodyPlacement): Pose {
  const cx = placement.centerX ?? DEFAULT_CENTER_X;
  const ground = placement.groundY ?? DEFAULT_GROUND_Y;
  const aspect = placement.frameAspect ?? DEFAULT_FRAME_ASPECT;
  const visibility = placement.visibility ?? DEFAULT_VISIBILITY;
  const jitter = placement.jitter ?? 0;
  const noise = createNoise(placement.seed ?? 1);

  const theta = MathUtils.degToRad(placement.tiltDeg);
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);

  return TEMPLATE.map(([u, h]): Landmark => ({
    x: cx + (u * cos + h * sin) / aspect + (jitter ? noise() * jitter : 0),
    y: ground - (h * cos - u * sin) + (jitter ? noise() * jitter : 0),
    z: 0,
    visibility,
  }));
}

export function standingPose(overrides: Partial<BodyPlacement> = {}): Pose {
  return poseAt({ ...overrides, tiltDeg: overrides.tiltDeg ?? 0 });
}

export function lyingPose(overrides: Partial<BodyPlacement> = {}): Pose {
  return poseAt({ ...overrides, tiltDeg: overrides.tiltDeg ?? 90 });
}

/** Copy of `pose` with the given points (all, by default) set to `visibility`. */
export function withVisibility(
  pose: Pose,
  visibility: number,
  indices?: readonly number[],
): Pose {
  const selected = indices ? new Set(indices) : null;
  return pose.map((l, i) =>
    !selected || selected.has(i) ? { ...l, visibility } : l,
  );
}

export interface FallScriptOptions {
  frameRate?: number;
  startMs?: number;
  standMs?: number;
  fallMs?: number;
  lieMs?: number;
  frameAspect?: number;
  /** Standing sway noise amplitude */
  jitter?: number;
}

/**
 * Stand still, tip over to lying within `fallMs` (ease-in, like a body
 * accelerating under gravity), then lie still.
 */
export function fallScript(options: FallScriptOptions = {}): ScriptedFrame[] {
  const frameRate = options.frameRate ?? 30;
  const start = options.startMs ?? 0;
  const standMs = options.standMs ?? 2000;
  const fallMs = options.fallMs ?? 600;
  const lieMs = options.lieMs ?? 3000;
  const interval = 1000 / frameRate;
  const total = standMs + fallMs + lieMs;

  const frames: ScriptedFrame[] = [];
  for (let i = 0; i * interval < total; i++) {
    const elapsed = i * interval;
    let tiltDeg = 0;
    if (elapsed >= standMs + fallMs) tiltDeg = 90;
    else if (elapsed > standMs) tiltDeg = 90 * ((elapsed - standMs) / fallMs) ** 2;

    frames.push({
      t: Math.round(start + elapsed),
      landmarks: poseAt({
        tiltDeg,
        frameAspect: options.frameAspect,
        jitter: tiltDeg === 0 ? options.jitter : 0,
        seed: i + 1,
      }),
    });
  }
  return frames;
}

/** Standing only, e.g. to check that normal posture never alerts. */
export function standingScript(
  durationMs: number,
  options: Pick<FallScriptOptions, "frameRate" | "startMs" | "jitter"> = {},
): ScriptedFrame[] {
  const interval = 1000 / (options.frameRate ?? 30);
  const frames: ScriptedFrame[] = [];
  for (let i = 0; i * interval < durationMs; i++) {
    frames.push({
      t: Math.round((options.startMs ?? 0) + i * interval),
      landmarks: standingPose({ jitter: options.jitter, seed: i + 1 }),
    });
  }
  return frames;
}
