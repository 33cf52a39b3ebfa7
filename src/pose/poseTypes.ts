/**
 * Pose landmark types (33-point BlazePose topology)
 *
 * Coordinates are normalized to the frame: x grows rightwards, y grows
 * downwards, both in [0, 1]. A frame without a usable person is `null`,
 * never a pose full of zeros.
 */

export interface Landmark {
  x: number;
  y: number;
  z: number;
  /** 0..1 likelihood that the point is visible in the frame */
  visibility: number;
}

export type Pose = readonly Landmark[];

export const POSE_LANDMARK_COUNT = 33;

export const PoseLandmark = {
  NOSE: 0,
  LEFT_EYE_INNER: 1,
  LEFT_EYE: 2,
  LEFT_EYE_OUTER: 3,
  RIGHT_EYE_INNER: 4,
  RIGHT_EYE: 5,
  RIGHT_EYE_OUTER: 6,
  LEFT_EAR: 7,
  RIGHT_EAR: 8,
  MOUTH_LEFT: 9,
  MOUTH_RIGHT: 10,
  LEFT_SHOULDER: 11,
  RIGHT_SHOULDER: 12,
  LEFT_ELBOW: 13,
  RIGHT_ELBOW: 14,
  LEFT_WRIST: 15,
  RIGHT_WRIST: 16,
  LEFT_PINKY: 17,
  RIGHT_PINKY: 18,
  LEFT_INDEX: 19,
  RIGHT_INDEX: 20,
  LEFT_THUMB: 21,
  RIGHT_THUMB: 22,
  LEFT_HIP: 23,
  RIGHT_HIP: 24,
  LEFT_KNEE: 25,
  RIGHT_KNEE: 26,
  LEFT_ANKLE: 27,
  RIGHT_ANKLE: 28,
  LEFT_HEEL: 29,
  RIGHT_HEEL: 30,
  LEFT_FOOT_INDEX: 31,
  RIGHT_FOOT_INDEX: 32,
} as const;

export type PoseLandmarkIndex = (typeof PoseLandmark)[keyof typeof PoseLandmark];

/** Points used for the body bounding box. */
export const BOUNDING_LANDMARKS: readonly PoseLandmarkIndex[] = [
  PoseLandmark.NOSE,
  PoseLandmark.LEFT_SHOULDER,
  PoseLandmark.RIGHT_SHOULDER,
  PoseLandmark.LEFT_HIP,
  PoseLandmark.RIGHT_HIP,
  PoseLandmark.LEFT_ANKLE,
  PoseLandmark.RIGHT_ANKLE,
];

/** Points whose mean visibility decides whether a pose is usable at all. */
export const CORE_LANDMARKS: readonly PoseLandmarkIndex[] = [
  PoseLandmark.NOSE,
  PoseLandmark.LEFT_SHOULDER,
  PoseLandmark.RIGHT_SHOULDER,
  PoseLandmark.LEFT_HIP,
  PoseLandmark.RIGHT_HIP,
];

export function isFiniteLandmark(l: Landmark | undefined): l is Landmark {
  return (
    l !== undefined &&
    Number.isFinite(l.x) &&
    Number.isFinite(l.y) &&
    Number.isFinite(l.visibility)
  );
}
