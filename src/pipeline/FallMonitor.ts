/**
 * FallMonitor - registry of per-camera pipelines sharing one config, clock,
 * storage and publisher.
 */

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
import { pipelineLog } from "../lib/logger";
import type { ConfigStore } from "../store/configStore";
import type { MonitorStore } from "../store/monitorStore";
import { SourcePipeline, type FrameResult } from "./SourcePipeline";

export interface FallMonitorOptions {
  clock: Clock;
  config: ConfigStore;
  clipStore: ClipStore;
  publisher: EventPublisher;
  statusPublisher?: StatusPublisher;
  errorReporter: ErrorReporter;
  monitor?: MonitorStore;
  onEvent?: (event: FallEvent, sourceId: string) => void;
}

export interface AddSourceOptions {
  deviceId?: string;
  createEventId?: () => string;
}

export class FallMonitor {
  private readonly pipelines = new Map<string, SourcePipeline>();

  constructor(private readonly options: FallMonitorOptions) {}

  get sourceIds(): string[] {
    return [...this.pipelines.keys()];
  }

  async addSource(
    sourceId: string,
    poseSource: PoseSource,
    extra: AddSourceOptions = {},
  ): Promise<SourcePipeline> {
    if (this.pipelines.has(sourceId)) {
      throw new Error(`Source ${sourceId} is already registered`);
    }
    const pipeline = new SourcePipeline({
      ...this.options,
      ...extra,
      sourceId,
      poseSource,
    });
    this.pipelines.set(sourceId, pipeline);
    await pipeline.start();
    return pipeline;
  }

  getSource(sourceId: string): SourcePipeline | undefined {
    return this.pipelines.get(sourceId);
  }

  push(sourceId: string, frame: CameraFrame): Promise<FrameResult> {
    return this.require(sourceId).push(frame);
  }

  reset(sourceId: string): void {
    this.require(sourceId).reset();
  }

  async removeSource(sourceId: string): Promise<void> {
    const pipeline = this.pipelines.get(sourceId);
    if (!pipeline) return;
    this.pipelines.delete(sourceId);
    await pipeline.stop();
    this.options.monitor?.getState().removeSource(sourceId);
  }

  /** Stop every source, finalizing in-flight clips. */
  async stopAll(): Promise<void> {
    const pipelines = [...this.pipelines.values()];
    await Promise.all(pipelines.map((p) => p.stop()));
    pipelineLog.info(`Stopped ${pipelines.length} source(s)`);
  }

  async whenIdle(): Promise<void> {
    await Promise.all([...this.pipelines.values()].map((p) => p.whenIdle()));
  }

  private require(sourceId: string): SourcePipeline {
    const pipeline = this.pipelines.get(sourceId);
    if (!pipeline) throw new Error(`Unknown source ${sourceId}`);
    return pipeline;
  }
}
