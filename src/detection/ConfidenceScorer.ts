/**
 * Confidence Scorer
 * =================
 *
 * Maps metrics + baseline to a fall confidence in [0, 1]. Each metric gives
 * an indicator in [0, 1] (1 = strongly fall-like); confidence is their
 * weighted mean using the configured weights, normalized by the weight sum.
 *
 * @module detection/ConfidenceScorer
 */

import { MathUtils } from "three";
import type { FallDetectionConfig } from "../config/detectorConfig";
import type { Baseline, IndicatorScores, PoseMetrics } from "./detectionTypes";

export type ScorerConfig = Pick<FallDetectionConfig, "weights" | "thresholds">;

const RATIO_EPSILON = 1e-6;

/** clamp01 that also maps NaN to 0 */
function unit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return MathUtils.clamp(value, 0, 1);
}

/**
 * 0 while the ratio (relative to baseline) stays at or above 1, rising
 * linearly to 1 at `dropThreshold`.
 */
export function aspectIndicator(
  aspectRatio: number,
  baselineAspect: number,
  dropThreshold: number,
): number {
  const relative = aspectRatio / Math.max(baselineAspect, RATIO_EPSILON);
  return unit((1 - relative) / (1 - dropThreshold));
}

/** 0 at or below the baseline tilt, 1 at or beyond `thresholdDeg`. */
export function tiltIndicator(
  tiltDeg: number,
  baselineTilt: number,
  thresholdDeg: number,
): number {
  if (tiltDeg >= thresholdDeg) return 1;
  const span = thresholdDeg - baselineTilt;
  if (span <= 0) return 0;
  return unit((tiltDeg - baselineTilt) / span);
}

/** Downward velocity as a fraction of `threshold`; upward motion scores 0. */
export function velocityIndicator(velocity: number, threshold: number): number {
  return unit(velocity / threshold);
}

/** 1 once the head is at or below `threshold` (y grows downward), linear over `band` above it. */
export function headIndicator(headY: number, threshold: number, band: number): number {
  if (headY >= threshold) return 1;
  if (band <= 0) return 0;
  return unit((headY - (threshold - band)) / band);
}

export function scoreIndicators(
  metrics: PoseMetrics,
  baseline: Baseline,
  config: ScorerConfig,
): IndicatorScores {
  const t = config.thresholds;
  return {
    aspectRatio: aspectIndicator(
      metrics.aspectRatio,
      baseline.aspectRatio,
      t.aspectRatioDrop,
    ),
    tilt: tiltIndicator(metrics.tiltDeg, baseline.tiltDeg, t.tiltDeg),
    velocity: velocityIndicator(metrics.verticalVelocity, t.velocity),
    headHeight: headIndicator(metrics.headY, t.headY, t.headBand),
  };
}

export function combineIndicators(
  indicators: IndicatorScores,
  weights: ScorerConfig["weights"],
): number {
  const total =
    weights.aspectRatio + weights.tilt + weights.velocity + weights.headHeight;
  if (!(total > 0)) return 0;

  const weighted =
    weights.aspectRatio * indicators.aspectRatio +
    weights.tilt * indicators.tilt +
    weights.velocity * indicators.velocity +
    weights.headHeight * indicators.headHeight;
  return unit(weighted / total);
}

export function scoreConfidence(
  metrics: PoseMetrics,
  baseline: Baseline,
  config: ScorerConfig,
): number {
  return combineIndicators(scoreIndicators(metrics, baseline, config), config.weights);
}
