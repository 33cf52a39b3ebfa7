/**
 * Monitor Store - per-source detector status and recent fall events
 *
 * Written by the pipelines; read by whatever surfaces status (a dashboard,
 * a health endpoint, tests).
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { DetectorStatus } from "../detection/detectionTypes";
import type { FallEvent } from "../events/eventTypes";

export const MAX_RECENT_EVENTS = 50;

export interface SourceStatus {
  status: DetectorStatus;
  calibrationProgress: number;
  /** Confidence of the most recent scored frame */
  lastConfidence: number | null;
  lastFrameAt: number | null;
  /** ISO time of the most recent fall event */
  lastFallAt: string | null;
  online: boolean;
}

export interface RecordedEvent extends FallEvent {
  sourceId: string;
}

interface MonitorState {
  sources: Record<string, SourceStatus>;
  /** Newest first, capped at MAX_RECENT_EVENTS */
  recentEvents: RecordedEvent[];

  // Actions
  updateSource: (sourceId: string, patch: Partial<SourceStatus>) => void;
  recordEvent: (sourceId: string, event: FallEvent) => void;
  removeSource: (sourceId: string) => void;
  clear: () => void;
}

export type MonitorStore = StoreApi<MonitorState>;

const initialSource = (): SourceStatus => ({
  status: "idle",
  calibrationProgress: 0,
  lastConfidence: null,
  lastFrameAt: null,
  lastFallAt: null,
  online: false,
});

export function createMonitorStore(): MonitorStore {
  return createStore<MonitorState>((set) => ({
    sources: {},
    recentEvents: [],

    updateSource: (sourceId, patch) =>
      set((state) => ({
        sources: {
          ...state.sources,
          [sourceId]: { ...(state.sources[sourceId] ?? initialSource()), ...patch },
        },
      })),

    recordEvent: (sourceId, event) =>
      set((state) => ({
        recentEvents: [{ ...event, sourceId }, ...state.recentEvents].slice(
          0,
          MAX_RECENT_EVENTS,
        ),
        sources: {
          ...state.sources,
          [sourceId]: {
            ...(state.sources[sourceId] ?? initialSource()),
            lastFallAt: event.timestampIso,
          },
        },
      })),

    removeSource: (sourceId) =>
      set((state) => {
        const sources = { ...state.sources };
        delete sources[sourceId];
        return { sources };
      }),

    clear: () => set({ sources: {}, recentEvents: [] }),
  }));
}
