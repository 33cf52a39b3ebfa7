/**
 * Fall Detection Configuration
 * ============================
 *
 * Defaults, validation and loading for every tunable of the engine.
 * Sources are layered: DEFAULT_CONFIG ← JSON file ← FALL_* environment.
 * Any invalid value is fatal at startup (ConfigError lists all of them).
 *
 * @module config/detectorConfig
 */

import * as fs from "node:fs";
import { ConfigError, type ConfigIssue } from "../lib/errors";
import { configLog } from "../lib/logger";

// ============================================================================
// TYPES
// ============================================================================

export interface IndicatorWeights {
  aspectRatio: number;
  tilt: number;
  velocity: number;
  headHeight: number;
}

export interface IndicatorThresholds {
  /** Aspect ratio relative to baseline at which the aspect indicator saturates */
  aspectRatioDrop: number;
  /** Tilt from vertical (degrees) at which the tilt indicator saturates */
  tiltDeg: number;
  /** Downward velocity (frame heights per second) at which the velocity indicator saturates */
  velocity: number;
  /** Normalized head y at which the head indicator saturates */
  headY: number;
  /** Width of the ramp below headY */
  headBand: number;
}

export interface FallDetectionConfig {
  deviceId: string;
  calibrationFrames: number;
  alertThreshold: number;
  weights: IndicatorWeights;
  thresholds: IndicatorThresholds;
  cooldownMs: number;
  preEventMs: number;
  postEventMs: number;
  /** Nominal camera rate, only used to size the frame ring */
  frameRate: number;
  /** Storage deadline once the post-event window has elapsed */
  finalizeAllowanceMs: number;
  publishRetries: number;
  minLandmarkVisibility: number;
  /** Mean visibility of nose/shoulders/hips below which a pose counts as absent */
  minPoseVisibility: number;
  /** EMA weight given to the newest velocity sample */
  velocitySmoothing: number;
  minFrameIntervalMs: number;
  maxReferenceStep: number;
  /** Frame width / height */
  frameAspect: number;
  clipsDir: string;
}

export type FallDetectionConfigInput = Partial<
  Omit<FallDetectionConfig, "weights" | "thresholds">
> & {
  weights?: Partial<IndicatorWeights>;
  thresholds?: Partial<IndicatorThresholds>;
};

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_CONFIG: Readonly<FallDetectionConfig> = Object.freeze({
  deviceId: "fall_detector",
  calibrationFrames: 30,
  alertThreshold: 0.7,
  weights: Object.freeze({
    aspectRatio: 0.3,
    tilt: 0.3,
    velocity: 0.4,
    headHeight: 0.2,
  }),
  thresholds: Object.freeze({
    aspectRatioDrop: 0.5,
    tiltDeg: 60,
    velocity: 0.5,
    headY: 0.6,
    headBand: 0.2,
  }),
  cooldownMs: 5000,
  preEventMs: 3000,
  postEventMs: 2000,
  frameRate: 30,
  finalizeAllowanceMs: 5000,
  publishRetries: 3,
  minLandmarkVisibility: 0.5,
  minPoseVisibility: 0.5,
  velocitySmoothing: 0.6,
  minFrameIntervalMs: 8,
  maxReferenceStep: 0.5,
  frameAspect: 4 / 3,
  clipsDir: "clips",
});

export function mergeConfig(
  base: FallDetectionConfig,
  input: FallDetectionConfigInput,
): FallDetectionConfig {
  return {
    ...base,
    ...input,
    weights: { ...base.weights, ...input.weights },
    thresholds: { ...base.thresholds, ...input.thresholds },
  };
}

// ============================================================================
// VALIDATION
// ============================================================================

type Range = {
  min?: number;
  max?: number;
  minExclusive?: boolean;
  maxExclusive?: boolean;
  integer?: boolean;
};

function checkNumber(
  issues: ConfigIssue[],
  path: string,
  value: number,
  range: Range,
): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    issues.push({ path, message: "must be a finite number" });
    return;
  }
  if (range.integer && !Number.isInteger(value)) {
    issues.push({ path, message: "must be an integer" });
  }
  if (range.min !== undefined) {
    const below = range.minExclusive ? value <= range.min : value < range.min;
    if (below) {
      issues.push({
        path,
        message: `must be ${range.minExclusive ? ">" : ">="} ${range.min}`,
      });
    }
  }
  if (range.max !== undefined) {
    const above = range.maxExclusive ? value >= range.max : value > range.max;
    if (above) {
      issues.push({
        path,
        message: `must be ${range.maxExclusive ? "<" : "<="} ${range.max}`,
      });
    }
  }
}

const UNIT = { min: 0, max: 1 } satisfies Range;
const POSITIVE = { min: 0, minExclusive: true } satisfies Range;
const NON_NEGATIVE = { min: 0 } satisfies Range;

export function validateConfig(config: FallDetectionConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (typeof config.deviceId !== "string" || config.deviceId.trim() === "") {
    issues.push({ path: "deviceId", message: "must be a non-empty string" });
  }
  if (typeof config.clipsDir !== "string" || config.clipsDir.trim() === "") {
    issues.push({ path: "clipsDir", message: "must be a non-empty string" });
  }

  checkNumber(issues, "calibrationFrames", config.calibrationFrames, {
    min: 1,
    integer: true,
  });
  checkNumber(issues, "alertThreshold", config.alertThreshold, {
    min: 0,
    minExclusive: true,
    max: 1,
  });

  let weightSum = 0;
  for (const key of WEIGHT_KEYS) {
    const value = config.weights[key];
    checkNumber(issues, `weights.${key}`, value, NON_NEGATIVE);
    if (Number.isFinite(value) && value > 0) weightSum += value;
  }
  if (weightSum <= 0) {
    issues.push({ path: "weights", message: "at least one weight must be > 0" });
  }

  const t = config.thresholds;
  checkNumber(issues, "thresholds.aspectRatioDrop", t.aspectRatioDrop, {
    min: 0,
    minExclusive: true,
    max: 1,
    maxExclusive: true,
  });
  checkNumber(issues, "thresholds.tiltDeg", t.tiltDeg, {
    min: 0,
    minExclusive: true,
    max: 90,
  });
  checkNumber(issues, "thresholds.velocity", t.velocity, POSITIVE);
  checkNumber(issues, "thresholds.headY", t.headY, {
    min: 0,
    minExclusive: true,
    max: 1,
  });
  checkNumber(issues, "thresholds.headBand", t.headBand, {
    min: 0,
    max: 1,
    maxExclusive: true,
  });

  checkNumber(issues, "cooldownMs", config.cooldownMs, NON_NEGATIVE);
  checkNumber(issues, "preEventMs", config.preEventMs, NON_NEGATIVE);
  checkNumber(issues, "postEventMs", config.postEventMs, NON_NEGATIVE);
  checkNumber(issues, "frameRate", config.frameRate, POSITIVE);
  checkNumber(issues, "finalizeAllowanceMs", config.finalizeAllowanceMs, POSITIVE);
  checkNumber(issues, "publishRetries", config.publishRetries, {
    min: 1,
    integer: true,
  });
  checkNumber(issues, "minLandmarkVisibility", config.minLandmarkVisibility, UNIT);
  checkNumber(issues, "minPoseVisibility", config.minPoseVisibility, UNIT);
  checkNumber(issues, "velocitySmoothing", config.velocitySmoothing, {
    min: 0,
    minExclusive: true,
    max: 1,
  });
  checkNumber(issues, "minFrameIntervalMs", config.minFrameIntervalMs, POSITIVE);
  checkNumber(issues, "maxReferenceStep", config.maxReferenceStep, POSITIVE);
  checkNumber(issues, "frameAspect", config.frameAspect, POSITIVE);

  return issues;
}

/** Validate and return the config, or throw ConfigError with every issue. */
export function assertValidConfig(config: FallDetectionConfig): FallDetectionConfig {
  const issues = validateConfig(config);
  if (issues.length > 0) throw new ConfigError(issues);
  return config;
}

// ============================================================================
// PARSING (untyped JSON / env → FallDetectionConfigInput)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const NUMBER_KEYS = [
  "calibrationFrames",
  "alertThreshold",
  "cooldownMs",
  "preEventMs",
  "postEventMs",
  "frameRate",
  "finalizeAllowanceMs",
  "publishRetries",
  "minLandmarkVisibility",
  "minPoseVisibility",
  "velocitySmoothing",
  "minFrameIntervalMs",
  "maxReferenceStep",
  "frameAspect",
] as const satisfies readonly (keyof FallDetectionConfig)[];

const STRING_KEYS = [
  "deviceId",
  "clipsDir",
] as const satisfies readonly (keyof FallDetectionConfig)[];

const WEIGHT_KEYS = [
  "aspectRatio",
  "tilt",
  "velocity",
  "headHeight",
] as const satisfies readonly (keyof IndicatorWeights)[];

const THRESHOLD_KEYS = [
  "aspectRatioDrop",
  "tiltDeg",
  "velocity",
  "headY",
  "headBand",
] as const satisfies readonly (keyof IndicatorThresholds)[];

function pickNumbers<K extends string>(
  source: Record<string, unknown>,
  keys: readonly K[],
  prefix: string,
  issues: ConfigIssue[],
): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = source[key];
    if (value === undefined) continue;
    if (typeof value === "number") {
      out[key] = value;
    } else {
      issues.push({ path: `${prefix}${key}`, message: "must be a number" });
    }
  }
  return out;
}

/**
 * Read the known keys of an untyped object (parsed JSON). Unknown keys are
 * ignored with a warning; wrongly-typed known keys become issues.
 */
export function parseConfigInput(raw: unknown): {
  input: FallDetectionConfigInput;
  issues: ConfigIssue[];
} {
  const issues: ConfigIssue[] = [];
  if (!isRecord(raw)) {
    return { input: {}, issues: [{ path: "", message: "config must be an object" }] };
  }

  const input: FallDetectionConfigInput = pickNumbers(raw, NUMBER_KEYS, "", issues);

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "string") input[key] = value;
    else issues.push({ path: key, message: "must be a string" });
  }

  if (raw.weights !== undefined) {
    if (isRecord(raw.weights)) {
      input.weights = pickNumbers(raw.weights, WEIGHT_KEYS, "weights.", issues);
    } else {
      issues.push({ path: "weights", message: "must be an object" });
    }
  }
  if (raw.thresholds !== undefined) {
    if (isRecord(raw.thresholds)) {
      input.thresholds = pickNumbers(
        raw.thresholds,
        THRESHOLD_KEYS,
        "thresholds.",
        issues,
      );
    } else {
      issues.push({ path: "thresholds", message: "must be an object" });
    }
  }

  const known = new Set<string>([
    ...NUMBER_KEYS,
    ...STRING_KEYS,
    "weights",
    "thresholds",
  ]);
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) configLog.warn(`Ignoring unknown config key "${key}"`);
  }

  return { input, issues };
}

/** FALL_* environment variable → config key. */
const ENV_NUMBERS: Record<string, (typeof NUMBER_KEYS)[number]> = {
  FALL_CALIBRATION_FRAMES: "calibrationFrames",
  FALL_ALERT_THRESHOLD: "alertThreshold",
  FALL_COOLDOWN_MS: "cooldownMs",
  FALL_PRE_EVENT_MS: "preEventMs",
  FALL_POST_EVENT_MS: "postEventMs",
  FALL_FRAME_RATE: "frameRate",
  FALL_FINALIZE_ALLOWANCE_MS: "finalizeAllowanceMs",
  FALL_PUBLISH_RETRIES: "publishRetries",
  FALL_MIN_POSE_VISIBILITY: "minPoseVisibility",
};

const ENV_STRINGS: Record<string, (typeof STRING_KEYS)[number]> = {
  FALL_DEVICE_ID: "deviceId",
  FALL_CLIPS_DIR: "clipsDir",
};

export function readEnvOverrides(env: NodeJS.ProcessEnv): {
  input: FallDetectionConfigInput;
  issues: ConfigIssue[];
} {
  const input: FallDetectionConfigInput = {};
  const issues: ConfigIssue[] = [];

  for (const [name, key] of Object.entries(ENV_NUMBERS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      issues.push({ path: name, message: `"${raw}" is not a number` });
    } else {
      input[key] = value;
    }
  }

  for (const [name, key] of Object.entries(ENV_STRINGS)) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== "") input[key] = raw.trim();
  }

  // FALL_WEIGHTS=aspect,tilt,velocity,head
  const weights = env.FALL_WEIGHTS;
  if (weights !== undefined && weights.trim() !== "") {
    const parts = weights.split(",").map((p) => Number(p.trim()));
    if (parts.length !== WEIGHT_KEYS.length || parts.some(Number.isNaN)) {
      issues.push({
        path: "FALL_WEIGHTS",
        message: "expected four comma-separated numbers",
      });
    } else {
      input.weights = {
        aspectRatio: parts[0],
        tilt: parts[1],
        velocity: parts[2],
        headHeight: parts[3],
      };
    }
  }

  return { input, issues };
}

export function readConfigFile(path: string): {
  input: FallDetectionConfigInput;
  issues: ConfigIssue[];
} {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { input: {}, issues: [{ path, message: `cannot read file (${reason})` }] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { input: {}, issues: [{ path, message: `invalid JSON (${reason})` }] };
  }
  return parseConfigInput(raw);
}

export interface LoadConfigOptions {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: FallDetectionConfigInput;
}

/**
 * Build the startup config. Throws ConfigError on any issue so the pipeline
 * never starts monitoring with undefined thresholds.
 */
export function loadConfig(options: LoadConfigOptions = {}): FallDetectionConfig {
  const issues: ConfigIssue[] = [];
  let config: FallDetectionConfig = mergeConfig(DEFAULT_CONFIG, {});

  if (options.file) {
    const fromFile = readConfigFile(options.file);
    issues.push(...fromFile.issues);
    config = mergeConfig(config, fromFile.input);
  }

  if (options.env) {
    const fromEnv = readEnvOverrides(options.env);
    issues.push(...fromEnv.issues);
    config = mergeConfig(config, fromEnv.input);
  }

  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  issues.push(...validateConfig(config));
  if (issues.length > 0) throw new ConfigError(issues);

  configLog.info(
    `Loaded config: threshold=${config.alertThreshold}, calibration=${config.calibrationFrames} frames, cooldown=${config.cooldownMs}ms`,
  );
  return config;
}
