import type { Clip } from "../clip/clipTypes";
import type { DeviceStatus, FallEvent } from "../events/eventTypes";
import type { Pose } from "../pose/poseTypes";

/**
 * External capability boundaries
 *
 * The engine depends only on these single-method interfaces; concrete
 * adapters live under src/adapters and tests substitute fakes.
 */

export interface CameraFrame {
  /** Encoded image bytes (JPEG) */
  data: Uint8Array;
  /** Monotonic capture time, ms; the pipeline stamps clock.now() when absent */
  timestamp?: number;
}

/** Landmark extraction (model inference lives outside the engine). */
export interface PoseSource {
  detect(frame: CameraFrame): Pose | null | Promise<Pose | null>;
}

/** Message bus / notification boundary. Delivery is at-least-once. */
export interface EventPublisher {
  publish(event: FallEvent): Promise<void>;
}

/** Device presence, published when a source starts and stops. */
export interface StatusPublisher {
  publishStatus(status: DeviceStatus): Promise<void>;
}

/** Clip storage sink. Resolves to a path or URL; rejects on failure. */
export interface ClipStore {
  store(clip: Clip): Promise<string>;
}

export interface ErrorContext {
  stage: string;
  [key: string]: unknown;
}

/** Out-of-band error reporting for failures that must not stop ingestion. */
export interface ErrorReporter {
  report(error: Error, context: ErrorContext): void;
}
