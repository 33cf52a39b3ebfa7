/**
 * Event Coordinator
 * =================
 *
 * Wires alert signals to the clip buffer and to the outside world:
 *
 *   alert ─▶ beginRecording ─▶ (background) wait for the window to close
 *         ─▶ finalize ─▶ store clip (deadline) ─▶ build FallEvent ─▶ publish
 *
 * The window closes when the buffer sees a frame past its end, so the frame
 * stamped exactly at the end is kept; `postEventMs` plus one nominal frame
 * interval bounds the wait when frames stop arriving.
 *
 * Each finalization is a tracked, cancellable task; the ingestion path only
 * ever calls handleAlert(), which returns immediately. A storage failure
 * never suppresses the event: it is reported and the event goes out with a
 * local-only clip reference.
 *
 * @module events/EventCoordinator
 */

import { randomUUID } from "node:crypto";
import type { ClipBuffer } from "../clip/ClipBuffer";
import type { Clip } from "../clip/clipTypes";
import type { AlertSignal } from "../detection/detectionTypes";
import type { ClipStore, ErrorReporter, EventPublisher } from "../lib/boundaries";
import type { Clock } from "../lib/clock";
import {
  CancelledError,
  FinalizationTimeoutError,
  PublishError,
  toError,
} from "../lib/errors";
import { eventLog } from "../lib/logger";
import type { ConfigProvider } from "../store/configStore";
import {
  DEGRADED_CLIP_SCHEME,
  createFallEvent,
  type ClipStatus,
  type FallEvent,
} from "./eventTypes";

/** Backoff step between publish attempts */
const PUBLISH_BACKOFF_MS = 500;

/** Event ids remembered for the idempotency guard */
const EMITTED_HISTORY = 256;

export interface EventCoordinatorDeps {
  clipBuffer: ClipBuffer;
  clipStore: ClipStore;
  publisher: EventPublisher;
  errorReporter: ErrorReporter;
  clock: Clock;
  getConfig: ConfigProvider;
  createEventId?: () => string;
  /** Called once per emitted event, after the publish attempts */
  onEvent?: (event: FallEvent) => void;
}

interface FinalizationTask {
  eventId: string;
  /** Aborted on reset: discard everything, emit nothing */
  cancel: AbortController;
  /** Aborted on flush or reset: stop waiting out the post-event window */
  skipWait: AbortController;
  promise: Promise<FallEvent | null>;
}

/**
 * Race `work` against the clock. The timer is always released.
 */
async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  clock: Clock,
  signal: AbortSignal,
): Promise<T> {
  const timer = new AbortController();
  const onAbort = () => timer.abort();
  signal.addEventListener("abort", onAbort, { once: true });
  try {
    return await Promise.race([
      work,
      clock.delay(timeoutMs, timer.signal).then((): never => {
        throw new FinalizationTimeoutError(timeoutMs);
      }),
    ]);
  } finally {
    signal.removeEventListener("abort", onAbort);
    timer.abort();
  }
}

export class EventCoordinator {
  private readonly tasks = new Map<string, FinalizationTask>();
  private readonly emitted = new Set<string>();
  private readonly createEventId: () => string;

  constructor(private readonly deps: EventCoordinatorDeps) {
    this.createEventId =
      deps.createEventId ?? (() => `fall_${deps.clock.wallTime()}_${randomUUID().slice(0, 8)}`);
  }

  /** Number of finalizations in flight */
  get inFlight(): number {
    return this.tasks.size;
  }

  /**
   * Start the clip + event sequence for one alert. Returns the event id, or
   * null when the clip buffer rejected the recording (one already in flight).
   */
  handleAlert(signal: AlertSignal): string | null {
    const eventId = this.createEventId();
    const alertWallTime = this.deps.clock.wallTime();

    const accepted = this.deps.clipBuffer.beginRecording(signal.timestamp, {
      eventId,
      confidence: signal.confidence,
      alertWallTime,
    });
    if (!accepted) {
      eventLog.warn(`Alert at ${signal.timestamp}ms ignored: a clip is already recording`);
      return null;
    }

    const task: FinalizationTask = {
      eventId,
      cancel: new AbortController(),
      skipWait: new AbortController(),
      promise: Promise.resolve(null),
    };
    task.promise = this.run(task, signal, alertWallTime)
      .catch((error: unknown) => {
        if (!(error instanceof CancelledError)) {
          this.deps.errorReporter.report(toError(error), {
            stage: "finalization",
            eventId,
          });
        }
        return null;
      })
      .finally(() => {
        this.tasks.delete(eventId);
      });
    this.tasks.set(eventId, task);
    return eventId;
  }

  /**
   * Abort every in-flight finalization (source reset). Partial clips are
   * discarded and no event is emitted for them.
   */
  cancelAll(): number {
    const count = this.tasks.size;
    for (const task of this.tasks.values()) {
      task.cancel.abort();
      task.skipWait.abort();
    }
    if (this.deps.clipBuffer.cancelRecording()) {
      eventLog.info("Discarded in-flight recording on reset");
    }
    return count;
  }

  /**
   * Finalize in-flight recordings now instead of waiting out the post-event
   * window (shutdown), then wait for them to finish.
   */
  async flush(): Promise<void> {
    for (const task of this.tasks.values()) task.skipWait.abort();
    await this.whenIdle();
  }

  /** Resolves once no finalization is in flight. */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks.values()].map((t) => t.promise));
    }
  }

  // ==========================================================================
  // Finalization task
  // ==========================================================================

  private async run(
    task: FinalizationTask,
    signal: AlertSignal,
    alertWallTime: number,
  ): Promise<FallEvent | null> {
    const { clipBuffer, getConfig } = this.deps;
    const cancelled = task.cancel.signal;

    await this.waitForWindow(task);
    if (cancelled.aborted) return null;

    const clip = clipBuffer.finalize();
    if (!clip) {
      throw new Error(`Recording for ${task.eventId} vanished before finalization`);
    }

    const { reference, status } = await this.storeClip(clip, cancelled);
    if (cancelled.aborted) {
      eventLog.info(`Dropped ${task.eventId}: source was reset during storage`);
      return null;
    }

    const event = createFallEvent({
      eventId: task.eventId,
      wallTimeMs: alertWallTime,
      confidence: signal.confidence,
      clipReference: reference,
      clipStatus: status,
      deviceId: getConfig().deviceId,
    });
    await this.emit(event, cancelled);
    return event;
  }

  /** Returns early when flush() or a reset aborts `skipWait`. */
  private async waitForWindow(task: FinalizationTask): Promise<void> {
    const { clock, clipBuffer, getConfig } = this.deps;
    const { postEventMs, frameRate } = getConfig();
    const skip = task.skipWait.signal;
    if (skip.aborted) return;

    const timer = new AbortController();
    const onSkip = () => timer.abort();
    skip.addEventListener("abort", onSkip, { once: true });
    try {
      await Promise.race([
        clipBuffer.whenWindowClosed(),
        clock.delay(postEventMs + 1000 / frameRate, timer.signal),
      ]);
    } catch (error) {
      if (!(error instanceof CancelledError)) throw error;
    } finally {
      skip.removeEventListener("abort", onSkip);
      timer.abort();
    }
  }

  private async storeClip(
    clip: Clip,
    cancelled: AbortSignal,
  ): Promise<{ reference: string; status: ClipStatus }> {
    const { clipStore, clock, errorReporter, getConfig } = this.deps;
    try {
      const reference = await withDeadline(
        clipStore.store(clip),
        getConfig().finalizeAllowanceMs,
        clock,
        cancelled,
      );
      return { reference, status: "stored" };
    } catch (error) {
      if (!cancelled.aborted) {
        errorReporter.report(toError(error), {
          stage: "clip-store",
          eventId: clip.eventId,
          frames: clip.frames.length,
        });
      }
      return { reference: `${DEGRADED_CLIP_SCHEME}${clip.eventId}`, status: "degraded" };
    }
  }

  /**
   * Publish with bounded retries, at most once per event id. A final
   * failure is reported; it never propagates.
   */
  private async emit(event: FallEvent, cancelled: AbortSignal): Promise<void> {
    if (this.emitted.has(event.eventId)) {
      eventLog.warn(`Event ${event.eventId} already emitted; skipping`);
      return;
    }
    this.remember(event.eventId);

    const attempts = this.deps.getConfig().publishRetries;
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.deps.publisher.publish(event);
        lastError = null;
        eventLog.info(
          `Published ${event.eventId} (confidence ${(event.confidence * 100).toFixed(1)}%, clip ${event.clipStatus})`,
        );
        break;
      } catch (error) {
        lastError = error;
        eventLog.warn(`Publish attempt ${attempt}/${attempts} for ${event.eventId} failed`);
        if (attempt < attempts) {
          try {
            await this.deps.clock.delay(PUBLISH_BACKOFF_MS * attempt, cancelled);
          } catch {
            break;
          }
        }
      }
    }

    if (lastError !== null && cancelled.aborted) {
      eventLog.info(`Dropped ${event.eventId}: source was reset during publish backoff`);
      return;
    }
    if (lastError !== null) {
      this.deps.errorReporter.report(
        new PublishError(`Failed to publish ${event.eventId}`, attempts, {
          cause: lastError,
        }),
        { stage: "publish", eventId: event.eventId },
      );
    }

    this.deps.onEvent?.(event);
  }

  private remember(eventId: string): void {
    this.emitted.add(eventId);
    if (this.emitted.size > EMITTED_HISTORY) {
      const oldest = this.emitted.values().next().value;
      if (oldest !== undefined) this.emitted.delete(oldest);
    }
  }
}
