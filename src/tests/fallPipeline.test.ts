/**
 * Fall Pipeline Integration Tests
 * ===============================
 *
 * Synthetic poses through SourcePipeline / FallMonitor on a ManualClock,
 * with in-memory storage and publishing.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Clip } from "../clip/clipTypes";
import { DEFAULT_CONFIG, mergeConfig } from "../config/detectorConfig";
import type { DeviceStatus, FallEvent } from "../events/eventTypes";
import type { CameraFrame } from "../lib/boundaries";
import { ManualClock } from "../lib/clock";
import { FallMonitor } from "../pipeline/FallMonitor";
import { SourcePipeline, type FrameResult } from "../pipeline/SourcePipeline";
import type { Pose } from "../pose/poseTypes";
import { createConfigStore } from "../store/configStore";
import { createMonitorStore, type MonitorStore } from "../store/monitorStore";
import {
  fallScript,
  standingPose,
  standingScript,
  type ScriptedFrame,
} from "../utils/SyntheticPoseGenerator";
import { placeholderJpeg } from "../utils/poseLog";

/** Pose source that looks the pose up by frame timestamp. */
function scriptedPoseSource(frames: readonly ScriptedFrame[]) {
  const byTime = new Map<number, Pose | null>(frames.map((f) => [f.t, f.landmarks]));
  return { detect: (frame: CameraFrame) => byTime.get(frame.timestamp ?? -1) ?? null };
}

function makeHarness() {
  const clock = new ManualClock(0);
  const config = createConfigStore(mergeConfig(DEFAULT_CONFIG, { deviceId: "test-cam" }));
  const monitor = createMonitorStore();
  const clips: Clip[] = [];
  const published: FallEvent[] = [];
  const statuses: DeviceStatus[] = [];

  const clipStore = {
    store: vi.fn(async (clip: Clip) => {
      clips.push(clip);
      return `memory://${clip.eventId}`;
    }),
  };
  const publisher = {
    publish: vi.fn(async (event: FallEvent) => {
      published.push(event);
    }),
    publishStatus: vi.fn(async (status: DeviceStatus) => {
      statuses.push(status);
    }),
  };
  const errorReporter = { report: vi.fn() };

  return { clock, config, monitor, clips, published, statuses, clipStore, publisher, errorReporter };
}

type Harness = ReturnType<typeof makeHarness>;

function makePipeline(h: Harness, frames: readonly ScriptedFrame[], monitor?: MonitorStore) {
  return new SourcePipeline({
    sourceId: "cam-1",
    poseSource: scriptedPoseSource(frames),
    clipStore: h.clipStore,
    publisher: h.publisher,
    statusPublisher: h.publisher,
    errorReporter: h.errorReporter,
    clock: h.clock,
    config: h.config,
    monitor,
    createEventId: () => "evt-1",
  });
}

async function play(
  h: Harness,
  pipeline: SourcePipeline,
  frames: readonly ScriptedFrame[],
): Promise<FrameResult[]> {
  const results: FrameResult[] = [];
  for (const [i, frame] of frames.entries()) {
    await h.clock.advanceTo(frame.t);
    results.push(await pipeline.push({ data: placeholderJpeg(i), timestamp: frame.t }));
  }
  return results;
}

describe("SourcePipeline", () => {
  let h: Harness;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    h = makeHarness();
  });

  it("detects a synthetic fall once and ships its clip", async () => {
    const frames = fallScript();
    const pipeline = makePipeline(h, frames, h.monitor);
    await pipeline.start();

    const results = await play(h, pipeline, frames);
    await h.clock.advance(10_000);
    await pipeline.whenIdle();

    expect(results[29]?.transitions.map((t) => t.to)).toEqual(["monitoring"]);
    const alerts = results.filter((r) => r.alert !== null);
    expect(alerts).toHaveLength(1);
    const alertAt = alerts[0]?.timestamp ?? Number.NaN;
    // Somewhere in the 2000..2600ms tip-over, not while standing or lying still
    expect(alertAt).toBeGreaterThan(2000);
    expect(alertAt).toBeLessThanOrEqual(2600);
    expect(alerts[0]?.eventId).toBe("evt-1");

    expect(h.clips).toHaveLength(1);
    const clip = h.clips[0];
    expect(clip?.startTimestamp).toBe(alertAt - 3000);
    expect(clip?.endTimestamp).toBe(alertAt + 2000);
    const stamps = clip?.frames.map((f) => f.timestamp) ?? [];
    expect(stamps[0]).toBe(0);
    // 30 fps stamps are whole milliseconds, so the window end is itself a frame
    expect(stamps.at(-1)).toBe(alertAt + 2000);

    expect(h.published).toHaveLength(1);
    expect(h.published[0]).toMatchObject({
      eventId: "evt-1",
      clipReference: "memory://evt-1",
      clipStatus: "stored",
      deviceId: "test-cam",
    });

    const state = h.monitor.getState();
    expect(state.recentEvents.map((e) => e.eventId)).toEqual(["evt-1"]);
    expect(state.sources["cam-1"]?.status).toBe("cooldown");
    expect(state.sources["cam-1"]?.lastFallAt).toBe(h.published[0]?.timestampIso);
    expect(h.errorReporter.report).not.toHaveBeenCalled();
  });

  it("keeps the whole window when detection lags far behind arrival", async () => {
    const frames = fallScript();
    const byTime = new Map(frames.map((f) => [f.t, f.landmarks]));
    const pipeline = new SourcePipeline({
      sourceId: "cam-slow",
      poseSource: {
        // 80ms per frame against a 33ms arrival interval
        detect: async (frame: CameraFrame) => {
          await h.clock.delay(80);
          return byTime.get(frame.timestamp ?? -1) ?? null;
        },
      },
      clipStore: h.clipStore,
      publisher: h.publisher,
      errorReporter: h.errorReporter,
      clock: h.clock,
      config: h.config,
      createEventId: () => "evt-slow",
    });

    const pushed: Promise<FrameResult>[] = [];
    for (const [i, frame] of frames.entries()) {
      await h.clock.advanceTo(frame.t);
      pushed.push(pipeline.push({ data: placeholderJpeg(i), timestamp: frame.t }));
    }
    await h.clock.advance(20_000);
    const results = await Promise.all(pushed);
    await pipeline.whenIdle();

    const alerts = results.filter((r) => r.alert !== null);
    expect(alerts).toHaveLength(1);
    const alertAt = alerts[0]?.timestamp ?? Number.NaN;

    expect(h.clips).toHaveLength(1);
    const stamps = h.clips[0]?.frames.map((f) => f.timestamp) ?? [];
    expect(stamps).toEqual(
      frames.map((f) => f.t).filter((t) => t >= alertAt - 3000 && t <= alertAt + 2000),
    );
    expect(stamps[0]).toBe(0);
    expect(stamps.at(-1)).toBe(alertAt + 2000);
    expect(h.published[0]?.eventId).toBe("evt-slow");
    expect(h.errorReporter.report).not.toHaveBeenCalled();
  });

  it("never alerts on normal standing posture", async () => {
    const frames = standingScript(6000, { jitter: 0.002 });
    const pipeline = makePipeline(h, frames);

    const results = await play(h, pipeline, frames);

    expect(results.some((r) => r.alert !== null)).toBe(false);
    expect(results.at(-1)?.status).toBe("monitoring");
    expect(h.published).toHaveLength(0);
  });

  it("stays in monitoring on a no-pose frame mid-monitoring", async () => {
    const standing = standingScript(1500);
    const frames: ScriptedFrame[] = [...standing, { t: 1500, landmarks: null }];
    const pipeline = makePipeline(h, frames);

    const results = await play(h, pipeline, frames);

    expect(results.at(-2)?.status).toBe("monitoring");
    expect(results.at(-1)).toMatchObject({
      status: "monitoring",
      confidence: null,
      transitions: [],
      alert: null,
    });
    expect(h.errorReporter.report).not.toHaveBeenCalled();
  });

  it("reports a failing pose source and treats the frame as no pose", async () => {
    const failure = new Error("model crashed");
    const pipeline = new SourcePipeline({
      sourceId: "cam-err",
      poseSource: {
        detect: () => {
          throw failure;
        },
      },
      clipStore: h.clipStore,
      publisher: h.publisher,
      errorReporter: h.errorReporter,
      clock: h.clock,
      config: h.config,
    });

    const result = await pipeline.push({ data: placeholderJpeg(0), timestamp: 0 });

    expect(result.status).toBe("idle");
    expect(h.errorReporter.report).toHaveBeenCalledWith(failure, {
      stage: "pose-detect",
      sourceId: "cam-err",
      timestamp: 0,
    });
  });

  it("stamps frames without a timestamp from the clock", async () => {
    const pipeline = makePipeline(h, []);
    await h.clock.advanceTo(1234);
    const result = await pipeline.push({ data: placeholderJpeg(0) });
    expect(result.timestamp).toBe(1234);
  });

  it("cancels the in-flight clip on reset and recalibrates", async () => {
    const frames: ScriptedFrame[] = [
      ...fallScript({ lieMs: 1000 }),
      { t: 20_000, landmarks: standingPose() },
    ];
    const pipeline = makePipeline(h, frames);

    const results = await play(h, pipeline, frames.slice(0, -1));
    expect(results.some((r) => r.alert !== null)).toBe(true);

    pipeline.reset();
    await h.clock.advance(10_000);
    await pipeline.whenIdle();

    expect(h.clips).toHaveLength(0);
    expect(h.published).toHaveLength(0);
    expect(pipeline.machine.getStatus()).toBe("idle");

    const [next] = await play(h, pipeline, frames.slice(-1));
    expect(next?.transitions.map((t) => `${t.from}->${t.to}`)).toEqual(["idle->calibrating"]);
    expect(next?.calibrationProgress).toBe(1);
  });

  it("finalizes the in-flight clip on stop and announces presence", async () => {
    const frames = fallScript({ lieMs: 300 });
    const pipeline = makePipeline(h, frames);
    await pipeline.start();

    await play(h, pipeline, frames);
    expect(h.published).toHaveLength(0);

    await pipeline.stop();

    expect(h.published).toHaveLength(1);
    expect(h.statuses).toEqual(["online", "offline"]);
    await expect(pipeline.push({ data: placeholderJpeg(0), timestamp: 9000 })).rejects.toThrow(
      "Source cam-1 is stopped",
    );
  });

  it("picks up a config change on the next frame", async () => {
    const frames = standingScript(1200);
    const pipeline = makePipeline(h, frames);
    await play(h, pipeline, frames.slice(0, 20));

    h.config.getState().apply({ calibrationFrames: 20 });
    const [next] = await play(h, pipeline, frames.slice(20, 21));

    expect(next?.status).toBe("monitoring");
  });
});

describe("FallMonitor", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("runs sources independently", async () => {
    const h = makeHarness();
    const onEvent = vi.fn();
    const monitor = new FallMonitor({
      clock: h.clock,
      config: h.config,
      clipStore: h.clipStore,
      publisher: h.publisher,
      errorReporter: h.errorReporter,
      monitor: h.monitor,
      onEvent,
    });

    const falling = fallScript();
    const standing = standingScript(5600);
    await monitor.addSource("bedroom", scriptedPoseSource(falling), { deviceId: "bedroom-cam" });
    await monitor.addSource("kitchen", scriptedPoseSource(standing), { deviceId: "kitchen-cam" });
    await expect(monitor.addSource("kitchen", scriptedPoseSource([]))).rejects.toThrow(
      "Source kitchen is already registered",
    );

    for (const [i, frame] of falling.entries()) {
      await h.clock.advanceTo(frame.t);
      await monitor.push("bedroom", { data: placeholderJpeg(i), timestamp: frame.t });
      await monitor.push("kitchen", { data: placeholderJpeg(i), timestamp: frame.t });
    }
    await h.clock.advance(10_000);
    await monitor.whenIdle();

    expect(h.published).toHaveLength(1);
    expect(h.published[0]?.deviceId).toBe("bedroom-cam");
    expect(onEvent).toHaveBeenCalledWith(h.published[0], "bedroom");
    expect(h.monitor.getState().sources.kitchen?.status).toBe("monitoring");

    monitor.reset("bedroom");
    expect(monitor.getSource("bedroom")?.machine.getStatus()).toBe("idle");
    expect(() => monitor.reset("garage")).toThrow("Unknown source garage");

    await monitor.removeSource("kitchen");
    expect(monitor.sourceIds).toEqual(["bedroom"]);
    expect(h.monitor.getState().sources.kitchen).toBeUndefined();

    await monitor.stopAll();
    expect(monitor.getSource("bedroom")?.isStopped).toBe(true);
  });
});
