/**
 * Fall State Machine
 * ==================
 *
 * Turns a per-frame confidence stream into one debounced alert:
 *
 *   idle ──valid frame──▶ calibrating ──N valid frames──▶ monitoring
 *   monitoring ──confidence ≥ threshold──▶ alert ──(same step)──▶ cooldown
 *   cooldown ──cooldownMs elapsed──▶ monitoring
 *   any ──reset()──▶ idle
 *
 * Frames without a usable pose (`null`) are "no evidence": they never count
 * toward calibration, never reset it and never alert.
 *
 * Time is the frame's monotonic timestamp in ms; calibration counts frames.
 *
 * @module detection/FallStateMachine
 */

import { assertValidConfig } from "../config/detectorConfig";
import { toError } from "../lib/errors";
import { detectorLog } from "../lib/logger";
import type { ConfigProvider } from "../store/configStore";
import { BaselineCalibrator } from "./BaselineCalibrator";
import { scoreIndicators, combineIndicators } from "./ConfidenceScorer";
import type {
  AlertSignal,
  Baseline,
  DetectorStatus,
  PoseMetrics,
  StepResult,
  Transition,
} from "./detectionTypes";

type TransitionListener = (transition: Transition) => void;
type AlertListener = (alert: AlertSignal) => void;

export class FallStateMachine {
  private status: DetectorStatus = "idle";
  private readonly calibrator = new BaselineCalibrator();
  private baseline: Readonly<Baseline> | null = null;
  private cooldownUntil: number | null = null;
  private lastAlert: AlertSignal | null = null;
  private readonly transitionListeners = new Set<TransitionListener>();
  private readonly alertListeners = new Set<AlertListener>();

  constructor(private readonly getConfig: ConfigProvider) {
    // Fail fast: never reach monitoring with undefined thresholds
    assertValidConfig(getConfig());
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getStatus(): DetectorStatus {
    return this.status;
  }

  getBaseline(): Readonly<Baseline> | null {
    return this.baseline;
  }

  getCalibrationProgress(): number {
    return this.calibrator.frameCount;
  }

  getCooldownUntil(): number | null {
    return this.cooldownUntil;
  }

  getLastAlert(): AlertSignal | null {
    return this.lastAlert;
  }

  // ==========================================================================
  // Listeners
  // ==========================================================================

  onTransition(listener: TransitionListener): () => void {
    this.transitionListeners.add(listener);
    return () => this.transitionListeners.delete(listener);
  }

  onAlert(listener: AlertListener): () => void {
    this.alertListeners.add(listener);
    return () => this.alertListeners.delete(listener);
  }

  // ==========================================================================
  // Stepping
  // ==========================================================================

  /**
   * Advance by one frame. `metrics` is null when the frame had no usable pose.
   */
  step(metrics: PoseMetrics | null, timestamp: number): StepResult {
    const config = this.getConfig();
    const transitions: Transition[] = [];
    let confidence: number | null = null;
    let alert: AlertSignal | null = null;

    const move = (to: DetectorStatus) => {
      transitions.push({ from: this.status, to, timestamp });
      this.status = to;
    };

    if (
      this.status === "cooldown" &&
      this.cooldownUntil !== null &&
      timestamp >= this.cooldownUntil
    ) {
      this.cooldownUntil = null;
      move("monitoring");
    }

    if (!metrics) {
      detectorLog.trace(`No usable pose at ${timestamp}ms (${this.status})`);
    } else if (this.status === "idle" || this.status === "calibrating") {
      if (this.status === "idle") {
        this.calibrator.reset();
        move("calibrating");
      }
      const count = this.calibrator.add(metrics);
      if (count >= config.calibrationFrames) {
        this.baseline = this.calibrator.finish();
        move("monitoring");
        detectorLog.info(
          `Calibrated over ${count} frames: aspect=${this.baseline.aspectRatio.toFixed(2)}, tilt=${this.baseline.tiltDeg.toFixed(1)}°`,
        );
      }
    } else if (this.baseline) {
      const indicators = scoreIndicators(metrics, this.baseline, config);
      confidence = combineIndicators(indicators, config.weights);
      detectorLog.trace(`confidence=${confidence.toFixed(3)} (${this.status})`);

      if (this.status === "monitoring" && confidence >= config.alertThreshold) {
        move("alert");
        alert = { confidence, timestamp, indicators };
        this.lastAlert = alert;
        // Alert is transient: the refractory period starts in the same step
        this.cooldownUntil = timestamp + config.cooldownMs;
        move("cooldown");
        detectorLog.warn(
          `FALL DETECTED at ${timestamp}ms, confidence ${(confidence * 100).toFixed(1)}%`,
        );
      }
    }

    this.notify(transitions, alert);

    return {
      status: this.status,
      confidence,
      transitions,
      alert,
      calibrationProgress: this.calibrator.frameCount,
    };
  }

  /**
   * Back to idle from any state. The baseline is discarded and the next valid
   * frame starts a fresh calibration.
   */
  reset(timestamp: number): Transition | null {
    this.calibrator.reset();
    this.baseline = null;
    this.cooldownUntil = null;
    if (this.status === "idle") return null;

    const transition: Transition = { from: this.status, to: "idle", timestamp };
    this.status = "idle";
    detectorLog.info(`Reset from ${transition.from}; recalibration required`);
    this.notify([transition], null);
    return transition;
  }

  private notify(transitions: Transition[], alert: AlertSignal | null): void {
    for (const transition of transitions) {
      for (const listener of this.transitionListeners) {
        this.safeCall(() => listener(transition));
      }
    }
    if (!alert) return;
    const signal = alert;
    for (const listener of this.alertListeners) {
      this.safeCall(() => listener(signal));
    }
  }

  private safeCall(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      detectorLog.error("State listener threw", toError(error));
    }
  }
}
