/**
 * FallStateMachine Tests
 * ======================
 *
 * Calibration, alerting, cooldown debounce and reset, driven with metrics
 * directly (no poses) and frame timestamps at ~30 fps.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import fc from "fast-check";
import {
  DEFAULT_CONFIG,
  mergeConfig,
  type FallDetectionConfigInput,
} from "../../config/detectorConfig";
import { ConfigError } from "../../lib/errors";
import { FallStateMachine } from "../FallStateMachine";
import type { PoseMetrics, StepResult } from "../detectionTypes";

const FRAME_MS = 33;

const STANDING: PoseMetrics = {
  aspectRatio: 1.0,
  tiltDeg: 5,
  verticalVelocity: 0,
  headY: 0.3,
  referenceY: 0.3,
};

const FALLING: PoseMetrics = {
  aspectRatio: 0.5,
  tiltDeg: 60,
  verticalVelocity: 0.8,
  headY: 0.7,
  referenceY: 0.7,
};

function makeMachine(input: FallDetectionConfigInput = {}): FallStateMachine {
  const config = mergeConfig(DEFAULT_CONFIG, input);
  return new FallStateMachine(() => config);
}

/** Feed `count` copies of `metrics`, one frame apart, starting at `start`. */
function feed(
  machine: FallStateMachine,
  metrics: PoseMetrics | null,
  count: number,
  start: number,
): { results: StepResult[]; next: number } {
  const results: StepResult[] = [];
  let t = start;
  for (let i = 0; i < count; i++) {
    results.push(machine.step(metrics, t));
    t += FRAME_MS;
  }
  return { results, next: t };
}

describe("FallStateMachine", () => {
  let machine: FallStateMachine;

  beforeEach(() => {
    machine = makeMachine();
  });

  it("refuses to start with an invalid config", () => {
    expect(() => makeMachine({ alertThreshold: 1.5 })).toThrow(ConfigError);
    expect(() => makeMachine({ calibrationFrames: 0 })).toThrow(ConfigError);
  });

  it("starts idle and ignores frames without a pose", () => {
    const result = machine.step(null, 0);
    expect(result.status).toBe("idle");
    expect(result.transitions).toEqual([]);
    expect(result.confidence).toBeNull();
  });

  describe("fall scenario", () => {
    it("calibrates, alerts once, holds cooldown and re-arms", () => {
      const alerts: number[] = [];
      machine.onAlert((alert) => alerts.push(alert.timestamp));

      // 30 standing frames: idle → calibrating → monitoring on frame 30
      const calib = feed(machine, STANDING, 30, 0);
      expect(calib.results[0]?.transitions).toEqual([
        { from: "idle", to: "calibrating", timestamp: 0 },
      ]);
      expect(calib.results[28]?.status).toBe("calibrating");
      expect(calib.results[29]?.transitions).toEqual([
        { from: "calibrating", to: "monitoring", timestamp: 29 * FRAME_MS },
      ]);
      expect(machine.getBaseline()?.aspectRatio).toBeCloseTo(1.0, 9);
      expect(machine.getBaseline()?.tiltDeg).toBeCloseTo(5, 9);

      // One fall-like frame: monitoring → alert → cooldown
      const alertAt = calib.next;
      const hit = machine.step(FALLING, alertAt);
      expect(hit.confidence).toBeGreaterThanOrEqual(0.7);
      expect(hit.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
        "monitoring->alert",
        "alert->cooldown",
      ]);
      expect(hit.alert?.timestamp).toBe(alertAt);
      expect(machine.getCooldownUntil()).toBe(alertAt + 5000);

      // Four more seconds of the same: no new alert
      const held = feed(machine, FALLING, Math.floor(4000 / FRAME_MS), alertAt + FRAME_MS);
      expect(held.results.every((r) => r.alert === null)).toBe(true);
      expect(held.results.every((r) => r.status === "cooldown")).toBe(true);
      expect(alerts).toEqual([alertAt]);

      // Past the cooldown, standing: back to monitoring
      const back = machine.step(STANDING, alertAt + 5000);
      expect(back.transitions).toEqual([
        { from: "cooldown", to: "monitoring", timestamp: alertAt + 5000 },
      ]);
      expect(back.status).toBe("monitoring");
      expect(back.confidence).toBe(0);

      // And able to alert again
      const again = machine.step(FALLING, alertAt + 5000 + FRAME_MS);
      expect(again.alert).not.toBeNull();
      expect(alerts).toHaveLength(2);
    });

    it("evaluates the frame that ends the cooldown", () => {
      feed(machine, STANDING, 30, 0);
      machine.step(FALLING, 1000);

      const result = machine.step(FALLING, 6000);
      expect(result.transitions.map((t) => t.to)).toEqual(["monitoring", "alert", "cooldown"]);
      expect(result.alert?.timestamp).toBe(6000);
    });
  });

  it("stays in monitoring on a no-pose frame without computing confidence", () => {
    const { next } = feed(machine, STANDING, 30, 0);
    const result = machine.step(null, next);
    expect(result).toEqual({
      status: "monitoring",
      confidence: null,
      transitions: [],
      alert: null,
      calibrationProgress: 30,
    });
  });

  it("does not alert below the threshold", () => {
    feed(machine, STANDING, 30, 0);
    // tilt indicator only: 0.3 / 1.2 = 0.25
    const result = machine.step({ ...STANDING, tiltDeg: 80 }, 2000);
    expect(result.confidence).toBeCloseTo(0.25, 9);
    expect(result.status).toBe("monitoring");
  });

  it("reads a lowered threshold on the next frame", () => {
    let config = mergeConfig(DEFAULT_CONFIG, {});
    const live = new FallStateMachine(() => config);
    feed(live, STANDING, 30, 0);
    config = mergeConfig(config, { alertThreshold: 0.2 });
    expect(live.step({ ...STANDING, tiltDeg: 80 }, 2000).alert).not.toBeNull();
  });

  describe("calibration", () => {
    it("counts only valid frames, whatever is interleaved", () => {
      fc.assert(
        fc.property(
          fc.array(fc.boolean(), { minLength: 0, maxLength: 200 }),
          fc.integer({ min: 1, max: 40 }),
          (pattern, calibrationFrames) => {
            const m = makeMachine({ calibrationFrames });
            let t = 0;
            let valid = 0;
            // Interleave nulls per `pattern`, then keep feeding valid frames
            for (const present of pattern) {
              if (valid >= calibrationFrames - 1) break;
              m.step(present ? STANDING : null, t);
              if (present) valid++;
              t += FRAME_MS;
            }
            while (valid < calibrationFrames - 1) {
              m.step(STANDING, t);
              valid++;
              t += FRAME_MS;
            }
            if (calibrationFrames > 1) {
              expect(m.getStatus()).toBe("calibrating");
            }
            m.step(null, t);
            const last = m.step(STANDING, t + FRAME_MS);
            expect(last.status).toBe("monitoring");
            expect(m.getBaseline()?.frameCount).toBe(calibrationFrames);
          },
        ),
      );
    });

    it("reports progress", () => {
      feed(machine, STANDING, 12, 0);
      expect(machine.getCalibrationProgress()).toBe(12);
    });
  });

  describe("debounce", () => {
    it("never alerts twice within the cooldown", () => {
      fc.assert(
        fc.property(
          fc.array(
            fc.record({
              gap: fc.integer({ min: 0, max: 400 }),
              falling: fc.boolean(),
              present: fc.boolean(),
            }),
            { minLength: 1, maxLength: 300 },
          ),
          fc.integer({ min: 0, max: 8000 }),
          (frames, cooldownMs) => {
            const m = makeMachine({ calibrationFrames: 3, cooldownMs });
            feed(m, STANDING, 3, 0);
            const alertTimes: number[] = [];
            let t = 100;
            for (const frame of frames) {
              t += frame.gap;
              const metrics = frame.present ? (frame.falling ? FALLING : STANDING) : null;
              const result = m.step(metrics, t);
              if (result.alert) alertTimes.push(result.alert.timestamp);
            }
            for (let i = 1; i < alertTimes.length; i++) {
              const gap = (alertTimes[i] ?? 0) - (alertTimes[i - 1] ?? 0);
              expect(gap).toBeGreaterThanOrEqual(cooldownMs);
            }
          },
        ),
      );
    });
  });

  describe("reset", () => {
    it("returns to idle from any state and discards the baseline", () => {
      feed(machine, STANDING, 30, 0);
      machine.step(FALLING, 1000);
      expect(machine.getStatus()).toBe("cooldown");

      const transition = machine.reset(1100);
      expect(transition).toEqual({ from: "cooldown", to: "idle", timestamp: 1100 });
      expect(machine.getStatus()).toBe("idle");
      expect(machine.getBaseline()).toBeNull();
      expect(machine.getCooldownUntil()).toBeNull();
      expect(machine.getCalibrationProgress()).toBe(0);
    });

    it("starts a fresh calibration on the next valid frame", () => {
      feed(machine, STANDING, 20, 0);
      machine.reset(700);
      machine.step(null, 733);
      const next = machine.step(STANDING, 766);
      expect(next.transitions).toEqual([{ from: "idle", to: "calibrating", timestamp: 766 }]);
      expect(next.calibrationProgress).toBe(1);
    });

    it("is a no-op when already idle", () => {
      expect(machine.reset(0)).toBeNull();
    });
  });

  describe("listeners", () => {
    it("notifies transitions and survives a throwing listener", () => {
      const seen: string[] = [];
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      machine.onTransition(() => {
        throw new Error("listener failed");
      });
      const unsubscribe = machine.onTransition((t) => seen.push(t.to));

      machine.step(STANDING, 0);
      unsubscribe();
      machine.reset(10);

      expect(seen).toEqual(["calibrating"]);
      expect(error).toHaveBeenCalled();
    });
  });
});
