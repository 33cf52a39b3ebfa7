/**
 * Detection pipeline types: per-frame metrics, calibrated baseline and the
 * state machine's observable output.
 */

export interface PoseMetrics {
  /** Vertical extent / horizontal extent of the visible key landmarks */
  aspectRatio: number;
  /** Torso angle from vertical, degrees (0 upright, 90 lying flat) */
  tiltDeg: number;
  /** Smoothed reference-point velocity, frame heights per second, + = downward */
  verticalVelocity: number;
  /** Normalized head y (0 top of frame, 1 bottom) */
  headY: number;
  /** y of the point velocity is tracked on (nose, or shoulder midpoint) */
  referenceY: number;
}

/** What the extractor needs to remember between frames. */
export interface PreviousSample {
  referenceY: number;
  timestamp: number;
  verticalVelocity: number;
}

export interface Baseline {
  aspectRatio: number;
  tiltDeg: number;
  frameCount: number;
}

export type DetectorStatus =
  | "idle"
  | "calibrating"
  | "monitoring"
  | "alert"
  | "cooldown";

export interface IndicatorScores {
  aspectRatio: number;
  tilt: number;
  velocity: number;
  headHeight: number;
}

export interface AlertSignal {
  confidence: number;
  /** Monotonic ms of the triggering frame; anchors the clip window */
  timestamp: number;
  indicators: IndicatorScores;
}

export interface Transition {
  from: DetectorStatus;
  to: DetectorStatus;
  timestamp: number;
}

export interface StepResult {
  status: DetectorStatus;
  /** null when no confidence was computed (no pose, idle, calibrating) */
  confidence: number | null;
  transitions: Transition[];
  alert: AlertSignal | null;
  calibrationProgress: number;
}
