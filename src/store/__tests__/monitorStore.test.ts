import { describe, it, expect } from "vitest";
import { createFallEvent } from "../../events/eventTypes";
import { MAX_RECENT_EVENTS, createMonitorStore } from "../monitorStore";

const makeEvent = (n: number) =>
  createFallEvent({
    eventId: `evt-${n}`,
    wallTimeMs: Date.UTC(2024, 0, 1, 0, 0, n),
    confidence: 0.9,
    clipReference: `clips/${n}.mjpeg`,
    clipStatus: "stored",
    deviceId: "cam",
  });

describe("monitorStore", () => {
  it("merges source updates over defaults", () => {
    const store = createMonitorStore();
    store.getState().updateSource("kitchen", { status: "calibrating", calibrationProgress: 4 });
    store.getState().updateSource("kitchen", { lastConfidence: 0.1 });

    expect(store.getState().sources.kitchen).toEqual({
      status: "calibrating",
      calibrationProgress: 4,
      lastConfidence: 0.1,
      lastFrameAt: null,
      lastFallAt: null,
      online: false,
    });
  });

  it("keeps the most recent events, newest first", () => {
    const store = createMonitorStore();
    for (let n = 1; n <= MAX_RECENT_EVENTS + 5; n++) {
      store.getState().recordEvent("hall", makeEvent(n));
    }
    const { recentEvents, sources } = store.getState();
    expect(recentEvents).toHaveLength(MAX_RECENT_EVENTS);
    expect(recentEvents[0]?.eventId).toBe(`evt-${MAX_RECENT_EVENTS + 5}`);
    expect(recentEvents.at(-1)?.eventId).toBe("evt-6");
    expect(recentEvents[0]?.sourceId).toBe("hall");
    expect(sources.hall?.lastFallAt).toBe("2024-01-01T00:00:55.000Z");
  });

  it("removes a source", () => {
    const store = createMonitorStore();
    store.getState().updateSource("a", { online: true });
    store.getState().updateSource("b", { online: true });
    store.getState().removeSource("a");
    expect(Object.keys(store.getState().sources)).toEqual(["b"]);
  });
});
