/**
 * Config Store - live, hot-reloadable detection config
 *
 * The pipeline reads `getState().config` on every frame, so a reload takes
 * effect on the next frame. Invalid updates are rejected as a whole and the
 * previous config stays in force.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import {
  assertValidConfig,
  mergeConfig,
  validateConfig,
  type FallDetectionConfig,
  type FallDetectionConfigInput,
} from "../config/detectorConfig";
import type { ConfigIssue } from "../lib/errors";
import { configLog } from "../lib/logger";

interface ConfigState {
  config: FallDetectionConfig;
  /** Incremented on every accepted change */
  revision: number;
  lastIssues: ConfigIssue[];

  // Actions
  apply: (input: FallDetectionConfigInput) => ConfigIssue[];
  replace: (config: FallDetectionConfig) => ConfigIssue[];
}

export type ConfigStore = StoreApi<ConfigState>;

export function createConfigStore(initial: FallDetectionConfig): ConfigStore {
  // Fail fast: a store never starts from an invalid config
  assertValidConfig(initial);

  return createStore<ConfigState>((set, get) => ({
    config: initial,
    revision: 0,
    lastIssues: [],

    apply: (input) => get().replace(mergeConfig(get().config, input)),

    replace: (next) => {
      const issues = validateConfig(next);
      if (issues.length > 0) {
        configLog.warn(
          `Rejected config update (${issues.length} issue(s)); keeping revision ${get().revision}`,
        );
        set({ lastIssues: issues });
        return issues;
      }
      set((state) => ({
        config: next,
        revision: state.revision + 1,
        lastIssues: [],
      }));
      configLog.info(`Config updated to revision ${get().revision}`);
      return [];
    },
  }));
}

/** Read-only accessor handed to components that only consume config. */
export type ConfigProvider = () => FallDetectionConfig;

export function configProvider(store: ConfigStore): ConfigProvider {
  return () => store.getState().config;
}
