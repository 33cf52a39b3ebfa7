/**
 * Error types raised by the engine and its adapters.
 *
 * Only ConfigError is ever thrown to a caller; the others travel through the
 * ErrorReporter boundary from background finalization tasks.
 */

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super(
      `Invalid fall detection config: ${issues
        .map((i) => `${i.path}: ${i.message}`)
        .join("; ")}`,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class ClipStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClipStoreError";
  }
}

export class FinalizationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Clip finalization exceeded ${timeoutMs}ms`);
    this.name = "FinalizationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class PublishError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PublishError";
    this.attempts = attempts;
  }
}

/** The clip ring hit its hard cap and dropped frames still inside retention. */
export class ClipBufferOverflowError extends Error {
  readonly capacity: number;

  constructor(capacity: number, droppedTimestamp: number) {
    super(`Clip buffer full at ${capacity} frames; dropped frame at ${droppedTimestamp}ms`);
    this.name = "ClipBufferOverflowError";
    this.capacity = capacity;
  }
}

/** Thrown into a finalization task when its source is reset. */
export class CancelledError extends Error {
  constructor(message = "Finalization cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
