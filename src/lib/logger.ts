/**
 * Process-wide logging utility
 *
 * - Level comes from LOG_LEVEL (trace | debug | info | warn | error)
 * - Without LOG_LEVEL: debug under NODE_ENV=development, info otherwise
 * - Warnings and errors are always visible
 *
 * Usage:
 *   import { pipelineLog } from '../lib/logger';
 *   pipelineLog.trace('No pose in frame');   // Only with LOG_LEVEL=trace
 *   pipelineLog.info('Source started');
 *   pipelineLog.warn('Recording already in flight');
 *   pipelineLog.error('Clip upload failed', err);
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function resolveThreshold(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "development" ? "debug" : "info";
}

let threshold: LogLevel = resolveThreshold();

/** Override the level at runtime (tests, replay CLI --verbose). */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

export interface Logger {
  trace(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

function createLogger(prefix: string): Logger {
  return {
    /**
     * Per-frame detail (no-pose frames, every confidence value)
     */
    trace(message: string, ...args: unknown[]) {
      if (enabled("trace")) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    debug(message: string, ...args: unknown[]) {
      if (enabled("debug")) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message: string, ...args: unknown[]) {
      if (enabled("info")) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    /**
     * Warning-level logging (always visible)
     */
    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    /**
     * Error-level logging (always visible, timestamped)
     */
    error(message: string, ...args: unknown[]) {
      console.error(formatMessage(prefix, message, true), ...args);
    },

    /**
     * Create a sub-logger with extended prefix
     */
    child(subPrefix: string) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

// Pre-configured loggers for common modules
export const log = createLogger("FallSentinel");
export const pipelineLog = createLogger("Pipeline");
export const detectorLog = createLogger("Detector");
export const clipLog = createLogger("Clip");
export const eventLog = createLogger("Events");
export const configLog = createLogger("Config");
export const storageLog = createLogger("Storage");

// Factory for custom loggers
export { createLogger };

// Default export
export default log;
