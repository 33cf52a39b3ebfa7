/**
 * fall-sentinel
 *
 * Pose-based fall detection with pre/post-event clip capture.
 */

// Detection
export {
  extractMetrics,
  toPreviousSample,
  computeAspectRatio,
  computeTiltDeg,
  computeVerticalVelocity,
  corePoseVisibility,
  NEUTRAL_ASPECT_RATIO,
  type ExtractorOptions,
} from "./detection/FeatureExtractor";
export {
  scoreIndicators,
  combineIndicators,
  scoreConfidence,
  aspectIndicator,
  tiltIndicator,
  velocityIndicator,
  headIndicator,
} from "./detection/ConfidenceScorer";
export { FallStateMachine } from "./detection/FallStateMachine";
export { BaselineCalibrator } from "./detection/BaselineCalibrator";
export type {
  AlertSignal,
  Baseline,
  DetectorStatus,
  IndicatorScores,
  PoseMetrics,
  PreviousSample,
  StepResult,
  Transition,
} from "./detection/detectionTypes";

// Clips
export { ClipBuffer, ringCapacityFor } from "./clip/ClipBuffer";
export { FrameRingBuffer } from "./clip/FrameRingBuffer";
export type { BufferedFrame, Clip, ClipBufferStats } from "./clip/clipTypes";

// Events
export { EventCoordinator, type EventCoordinatorDeps } from "./events/EventCoordinator";
export {
  createFallEvent,
  toFallEventPayload,
  DEGRADED_CLIP_SCHEME,
  type FallEvent,
  type FallEventPayload,
  type ClipStatus,
  type DeviceStatus,
} from "./events/eventTypes";

// Pipeline
export { SourcePipeline, type SourcePipelineDeps, type FrameResult } from "./pipeline/SourcePipeline";
export { FallMonitor, type FallMonitorOptions } from "./pipeline/FallMonitor";

// Config & state
export {
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfig,
  validateConfig,
  assertValidConfig,
  type FallDetectionConfig,
  type FallDetectionConfigInput,
} from "./config/detectorConfig";
export { reloadConfigFile, watchConfigFile } from "./config/watchConfig";
export { createConfigStore, configProvider, type ConfigStore, type ConfigProvider } from "./store/configStore";
export { createMonitorStore, MAX_RECENT_EVENTS, type MonitorStore, type SourceStatus } from "./store/monitorStore";

// Adapters
export { LocalClipStore } from "./adapters/LocalClipStore";
export { HttpClipStore } from "./adapters/HttpClipStore";
export { FallbackClipStore } from "./adapters/FallbackClipStore";
export { HttpEventPublisher } from "./adapters/HttpEventPublisher";
export { LogEventPublisher } from "./adapters/LogEventPublisher";
export { LoggingErrorReporter } from "./adapters/LoggingErrorReporter";

// Infrastructure
export { systemClock, ManualClock, type Clock } from "./lib/clock";
export * from "./lib/errors";
export type * from "./lib/boundaries";
export { createLogger, setLogLevel, type Logger, type LogLevel } from "./lib/logger";
export { PoseLandmark, POSE_LANDMARK_COUNT, type Landmark, type Pose } from "./pose/poseTypes";
