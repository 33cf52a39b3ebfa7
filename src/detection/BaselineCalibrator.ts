import type { Baseline, PoseMetrics } from "./detectionTypes";

/**
 * Accumulates the standing-posture baseline: running means of aspect ratio
 * and tilt over valid frames. The caller decides when enough frames have
 * been seen; `finish()` returns a frozen Baseline.
 */
export class BaselineCalibrator {
  private aspectSum = 0;
  private tiltSum = 0;
  private count = 0;

  get frameCount(): number {
    return this.count;
  }

  add(metrics: PoseMetrics): number {
    if (!Number.isFinite(metrics.aspectRatio) || !Number.isFinite(metrics.tiltDeg)) {
      return this.count;
    }
    this.aspectSum += metrics.aspectRatio;
    this.tiltSum += metrics.tiltDeg;
    this.count++;
    return this.count;
  }

  finish(): Readonly<Baseline> {
    if (this.count === 0) {
      throw new Error("Cannot finish calibration without samples");
    }
    return Object.freeze({
      aspectRatio: this.aspectSum / this.count,
      tiltDeg: this.tiltSum / this.count,
      frameCount: this.count,
    });
  }

  reset(): void {
    this.aspectSum = 0;
    this.tiltSum = 0;
    this.count = 0;
  }
}
