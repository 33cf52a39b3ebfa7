/**
 * Clock abstraction
 *
 * Cooldown, post-event windows and storage deadlines all read time through a
 * Clock so that tests and log replays can drive time by hand.
 *
 * - now():      monotonic milliseconds (frame timestamps live on this axis)
 * - wallTime(): epoch milliseconds (event timestamps shown to people)
 * - delay():    resolves after `ms` on this clock; rejects with
 *               CancelledError when the signal aborts
 */

import { CancelledError } from "./errors";

export interface Clock {
  now(): number;
  wallTime(): number;
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  wallTime: () => Date.now(),
  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  },
};

interface PendingTimer {
  due: number;
  order: number;
  resolve: () => void;
}

/** Let every queued microtask and I/O callback run before continuing. */
function flushPending(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Hand-driven clock for tests and offline replays.
 *
 * Timers fire in due order during advance()/advanceTo(); after each firing
 * the pending work is flushed so tasks that schedule follow-up delays inside
 * the same span still fire.
 */
export class ManualClock implements Clock {
  private current: number;
  private readonly wallOrigin: number;
  private timers: PendingTimer[] = [];
  private order = 0;

  constructor(start = 0, wallOrigin = Date.UTC(2024, 0, 1, 12, 0, 0)) {
    this.current = start;
    this.wallOrigin = wallOrigin;
  }

  now(): number {
    return this.current;
  }

  wallTime(): number {
    return this.wallOrigin + this.current;
  }

  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      const timer: PendingTimer = {
        due: this.current + Math.max(0, ms),
        order: this.order++,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = () => {
        this.timers = this.timers.filter((t) => t !== timer);
        reject(new CancelledError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.timers.push(timer);
    });
  }

  /** Number of delays that have not fired yet. */
  get pendingTimers(): number {
    return this.timers.length;
  }

  async advance(ms: number): Promise<void> {
    await this.advanceTo(this.current + ms);
  }

  async advanceTo(target: number): Promise<void> {
    await flushPending();
    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.timers = this.timers.filter((t) => t !== next);
      this.current = Math.max(this.current, next.due);
      next.resolve();
      await flushPending();
    }
    this.current = Math.max(this.current, target);
    await flushPending();
  }

  private nextDue(target: number): PendingTimer | undefined {
    let best: PendingTimer | undefined;
    for (const timer of this.timers) {
      if (timer.due > target) continue;
      if (
        !best ||
        timer.due < best.due ||
        (timer.due === best.due && timer.order < best.order)
      ) {
        best = timer;
      }
    }
    return best;
  }
}
