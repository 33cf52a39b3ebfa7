/**
 * Landmark Feature Extractor
 * ==========================
 *
 * Turns one frame's pose into the four posture metrics the scorer consumes:
 * bounding-box aspect ratio, torso tilt from vertical, smoothed vertical
 * velocity of the head reference point, and head height.
 *
 * Pure functions only. The only memory between frames is the PreviousSample
 * the caller passes back in.
 *
 * @module detection/FeatureExtractor
 */

import * as THREE from "three";
import type { FallDetectionConfig } from "../config/detectorConfig";
import {
  BOUNDING_LANDMARKS,
  CORE_LANDMARKS,
  POSE_LANDMARK_COUNT,
  PoseLandmark,
  isFiniteLandmark,
  type Landmark,
  type Pose,
} from "../pose/poseTypes";
import type { PoseMetrics, PreviousSample } from "./detectionTypes";

export type ExtractorOptions = Pick<
  FallDetectionConfig,
  | "minLandmarkVisibility"
  | "minPoseVisibility"
  | "velocitySmoothing"
  | "minFrameIntervalMs"
  | "maxReferenceStep"
  | "frameAspect"
>;

/** Ratio reported when too few points are visible to build a box. */
export const NEUTRAL_ASPECT_RATIO = 1.0;

const MIN_BOX_POINTS = 3;
const WIDTH_EPSILON = 1e-6;

function isVisible(l: Landmark | undefined, min: number): l is Landmark {
  return isFiniteLandmark(l) && l.visibility >= min;
}

function midpoint(a: Landmark, b: Landmark): THREE.Vector2 {
  return new THREE.Vector2(a.x, a.y)
    .add(new THREE.Vector2(b.x, b.y))
    .multiplyScalar(0.5);
}

/**
 * Mean visibility of nose, shoulders and hips. Non-finite entries count as 0.
 */
export function corePoseVisibility(pose: Pose): number {
  let sum = 0;
  for (const index of CORE_LANDMARKS) {
    const l = pose[index];
    sum += isFiniteLandmark(l) ? l.visibility : 0;
  }
  return sum / CORE_LANDMARKS.length;
}

/**
 * Height / width of the box around the visible bounding landmarks.
 */
export function computeAspectRatio(pose: Pose, minVisibility: number): number {
  const points: THREE.Vector2[] = [];
  for (const index of BOUNDING_LANDMARKS) {
    const l = pose[index];
    if (isVisible(l, minVisibility)) points.push(new THREE.Vector2(l.x, l.y));
  }
  if (points.length < MIN_BOX_POINTS) return NEUTRAL_ASPECT_RATIO;

  const size = new THREE.Box2().setFromPoints(points).getSize(new THREE.Vector2());
  return size.y / (size.x + WIDTH_EPSILON);
}

/**
 * Angle between the hip→shoulder vector and vertical, in degrees.
 * x is scaled by the frame's width/height so the angle is measured in pixels.
 */
export function computeTiltDeg(
  shoulderMid: THREE.Vector2,
  hipMid: THREE.Vector2,
  frameAspect: number,
): number {
  const dx = Math.abs(shoulderMid.x - hipMid.x) * frameAspect;
  const dy = Math.abs(shoulderMid.y - hipMid.y);
  if (dx === 0 && dy === 0) return 0;
  return THREE.MathUtils.radToDeg(Math.atan2(dx, dy));
}

/**
 * Smoothed vertical velocity of the reference point.
 *
 * Elapsed time <= 0 (duplicate or skewed timestamps) skips the update and
 * carries the previous velocity forward; very short intervals are floored at
 * minFrameIntervalMs and the per-frame displacement is clamped.
 */
export function computeVerticalVelocity(
  referenceY: number,
  timestamp: number,
  previous: PreviousSample | null,
  options: Pick<
    ExtractorOptions,
    "velocitySmoothing" | "minFrameIntervalMs" | "maxReferenceStep"
  >,
): number {
  if (!previous) return 0;
  const prevVelocity = Number.isFinite(previous.verticalVelocity)
    ? previous.verticalVelocity
    : 0;

  const elapsedMs = timestamp - previous.timestamp;
  if (!Number.isFinite(elapsedMs) || elapsedMs <= 0) return prevVelocity;
  if (!Number.isFinite(previous.referenceY)) return prevVelocity;

  const dtSec = Math.max(elapsedMs, options.minFrameIntervalMs) / 1000;
  const dy = THREE.MathUtils.clamp(
    referenceY - previous.referenceY,
    -options.maxReferenceStep,
    options.maxReferenceStep,
  );
  const raw = dy / dtSec;
  const alpha = options.velocitySmoothing;
  return alpha * raw + (1 - alpha) * prevVelocity;
}

/**
 * Metrics for one frame, or null when posture cannot be assessed:
 * no pose, wrong landmark count, a shoulder or hip below the visibility
 * gate, or a marginal pose overall.
 */
export function extractMetrics(
  pose: Pose | null,
  previous: PreviousSample | null,
  timestamp: number,
  options: ExtractorOptions,
): PoseMetrics | null {
  if (!pose || pose.length !== POSE_LANDMARK_COUNT) return null;

  const minVis = options.minLandmarkVisibility;
  const leftShoulder = pose[PoseLandmark.LEFT_SHOULDER];
  const rightShoulder = pose[PoseLandmark.RIGHT_SHOULDER];
  const leftHip = pose[PoseLandmark.LEFT_HIP];
  const rightHip = pose[PoseLandmark.RIGHT_HIP];
  if (
    !isVisible(leftShoulder, minVis) ||
    !isVisible(rightShoulder, minVis) ||
    !isVisible(leftHip, minVis) ||
    !isVisible(rightHip, minVis)
  ) {
    return null;
  }

  if (corePoseVisibility(pose) < options.minPoseVisibility) return null;

  const shoulderMid = midpoint(leftShoulder, rightShoulder);
  const hipMid = midpoint(leftHip, rightHip);

  const nose = pose[PoseLandmark.NOSE];
  const headY = isVisible(nose, minVis) ? nose.y : shoulderMid.y;

  return {
    aspectRatio: computeAspectRatio(pose, minVis),
    tiltDeg: computeTiltDeg(shoulderMid, hipMid, options.frameAspect),
    verticalVelocity: computeVerticalVelocity(headY, timestamp, previous, options),
    headY,
    referenceY: headY,
  };
}

export function toPreviousSample(
  metrics: PoseMetrics,
  timestamp: number,
): PreviousSample {
  return {
    referenceY: metrics.referenceY,
    timestamp,
    verticalVelocity: metrics.verticalVelocity,
  };
}
