/**
 * Source Pipeline
 * ===============
 *
 * One camera, end to end:
 *
 *   push ─▶ ClipBuffer.ingest                      (synchronous, on arrival)
 *        └▶ queue ─▶ PoseSource.detect ─▶ extractMetrics
 *                  ─▶ FallStateMachine.step ─▶ (alert) EventCoordinator.handleAlert
 *
 * The clip buffer sees every frame as it arrives, however far detection
 * lags behind. Detection runs strictly in arrival order through a promise
 * chain, and the buffer keeps the pre-event window of the oldest frame not
 * yet detected. `push()` never waits on clip storage or publishing, which
 * run as background finalization tasks inside the coordinator.
 *
 * @module pipeline/SourcePipeline
 */

import { ClipBuffer } from "../clip/ClipBuffer";
import type { FallDetectionConfig } from "../config/detectorConfig";
import { FallStateMachine } from "../detection/FallStateMachine";
import { extractMetrics, toPreviousSample } from "../detection/FeatureExtractor";
import type { PreviousSample, StepResult } from "../detection/detectionTypes";
import { EventCoordinator } from "../events/EventCoordinator";
import type { FallEvent } from "../events/eventTypes";
import type {
  CameraFrame,
  ClipStore,
  ErrorReporter,
  EventPublisher,
  PoseSource,
  StatusPublisher,
} from "../lib/boundaries";
import type { Clock } from "../lib/clock";
import { toError } from "../lib/errors";
import { pipelineLog } from "../lib/logger";
import type { Pose } from "../pose/poseTypes";
import type { ConfigStore } from "../store/configStore";
import type { MonitorStore } from "../store/monitorStore";

export interface SourcePipelineDeps {
  sourceId: string;
  poseSource: PoseSource;
  clipStore: ClipStore;
  publisher: EventPublisher;
  statusPublisher?: StatusPublisher;
  errorReporter: ErrorReporter;
  clock: Clock;
  config: ConfigStore;
  monitor?: MonitorStore;
  /** Overrides config.deviceId in this source's events */
  deviceId?: string;
  createEventId?: () => string;
  onEvent?: (event: FallEvent, sourceId: string) => void;
}

export interface FrameResult extends StepResult {
  timestamp: number;
  /** Set when this frame's alert started a clip */
  eventId: string | null;
}

export class SourcePipeline {
  readonly sourceId: string;
  readonly machine: FallStateMachine;
  readonly clipBuffer: ClipBuffer;
  readonly coordinator: EventCoordinator;

  private previous: PreviousSample | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  /** Timestamps of frames ingested but not yet stepped, oldest first */
  private readonly pending: number[] = [];
  private stopped = false;
  private baseConfig: FallDetectionConfig | null = null;
  private effectiveConfig: FallDetectionConfig | null = null;

  constructor(private readonly deps: SourcePipelineDeps) {
    this.sourceId = deps.sourceId;
    const getConfig = () => this.config();

    this.machine = new FallStateMachine(getConfig);
    this.clipBuffer = new ClipBuffer(getConfig, deps.errorReporter);
    this.coordinator = new EventCoordinator({
      clipBuffer: this.clipBuffer,
      clipStore: deps.clipStore,
      publisher: deps.publisher,
      errorReporter: deps.errorReporter,
      clock: deps.clock,
      getConfig,
      createEventId: deps.createEventId,
      onEvent: (event) => {
        deps.monitor?.getState().recordEvent(this.sourceId, event);
        deps.onEvent?.(event, this.sourceId);
      },
    });
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async start(): Promise<void> {
    this.stopped = false;
    this.deps.monitor?.getState().updateSource(this.sourceId, {
      status: this.machine.getStatus(),
      online: true,
    });
    await this.sendStatus("online");
    pipelineLog.info(`Source ${this.sourceId} started`);
  }

  /**
   * Stop accepting frames, finish queued frames, finalize any in-flight clip
   * immediately and announce the source offline.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await this.queue;
    await this.coordinator.flush();
    this.deps.monitor?.getState().updateSource(this.sourceId, { online: false });
    await this.sendStatus("offline");
    pipelineLog.info(`Source ${this.sourceId} stopped`);
  }

  /**
   * External reset: back to idle, discard the baseline and any in-flight
   * clip. Frames already queued run against the fresh state.
   */
  reset(): void {
    const cancelled = this.coordinator.cancelAll();
    this.machine.reset(this.deps.clock.now());
    this.previous = null;
    this.deps.monitor?.getState().updateSource(this.sourceId, {
      status: this.machine.getStatus(),
      calibrationProgress: 0,
      lastConfidence: null,
    });
    pipelineLog.info(
      `Source ${this.sourceId} reset${cancelled > 0 ? ` (${cancelled} finalization(s) cancelled)` : ""}`,
    );
  }

  /** Resolves once queued frames and background finalizations are done. */
  async whenIdle(): Promise<void> {
    await this.queue;
    await this.coordinator.whenIdle();
  }

  // ==========================================================================
  // Frames
  // ==========================================================================

  /**
   * Buffer a frame for clips and queue it for detection. Frames without a
   * timestamp are stamped with clock.now() on arrival.
   */
  push(frame: CameraFrame): Promise<FrameResult> {
    if (this.stopped) {
      return Promise.reject(new Error(`Source ${this.sourceId} is stopped`));
    }
    const timestamp = frame.timestamp ?? this.deps.clock.now();
    this.clipBuffer.ingest(frame.data, timestamp);
    this.pending.push(timestamp);
    this.clipBuffer.retainFrom(this.pending[0] ?? null);

    const run = this.queue.then(() => this.process(frame, timestamp));
    this.queue = run.catch((error: unknown) => {
      this.deps.errorReporter.report(toError(error), {
        stage: "process-frame",
        sourceId: this.sourceId,
        timestamp,
      });
    });
    return run;
  }

  private async process(frame: CameraFrame, timestamp: number): Promise<FrameResult> {
    try {
      return await this.detectAndStep(frame, timestamp);
    } finally {
      this.pending.shift();
      this.clipBuffer.retainFrom(this.pending[0] ?? null);
    }
  }

  private async detectAndStep(frame: CameraFrame, timestamp: number): Promise<FrameResult> {
    const config = this.config();
    const pose = await this.detect(frame, timestamp);
    const metrics = extractMetrics(pose, this.previous, timestamp, config);
    if (metrics) this.previous = toPreviousSample(metrics, timestamp);

    const result = this.machine.step(metrics, timestamp);
    const eventId = result.alert ? this.coordinator.handleAlert(result.alert) : null;

    this.deps.monitor?.getState().updateSource(this.sourceId, {
      status: result.status,
      calibrationProgress: result.calibrationProgress,
      lastFrameAt: timestamp,
      ...(result.confidence !== null ? { lastConfidence: result.confidence } : {}),
    });

    return { ...result, timestamp, eventId };
  }

  /** A failing pose source is reported and the frame treated as no pose. */
  private async detect(frame: CameraFrame, timestamp: number): Promise<Pose | null> {
    try {
      return await this.deps.poseSource.detect(frame);
    } catch (error) {
      this.deps.errorReporter.report(toError(error), {
        stage: "pose-detect",
        sourceId: this.sourceId,
        timestamp,
      });
      return null;
    }
  }

  private async sendStatus(status: "online" | "offline"): Promise<void> {
    if (!this.deps.statusPublisher) return;
    try {
      await this.deps.statusPublisher.publishStatus(status);
    } catch (error) {
      this.deps.errorReporter.report(toError(error), {
        stage: "publish-status",
        sourceId: this.sourceId,
        status,
      });
    }
  }

  /** Store config with this source's deviceId, rebuilt only on a new revision. */
  private config(): FallDetectionConfig {
    const base = this.deps.config.getState().config;
    if (base === this.baseConfig && this.effectiveConfig) return this.effectiveConfig;
    const effective: FallDetectionConfig = this.deps.deviceId
      ? { ...base, deviceId: this.deps.deviceId }
      : base;
    this.baseConfig = base;
    this.effectiveConfig = effective;
    return effective;
  }
}
