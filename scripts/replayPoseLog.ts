/**
 * Replay a Pose Log
 * =================
 *
 * Runs a JSONL pose log through one source pipeline on a hand-driven clock,
 * writing clips with the local clip store and logging every event.
 *
 * Run with: npx tsx scripts/replayPoseLog.ts <log.jsonl> [--config file.json] [--out dir] [--verbose]
 */

import * as fs from "fs";
import { parseArgs } from "util";
import { LocalClipStore } from "../src/adapters/LocalClipStore";
import { LogEventPublisher } from "../src/adapters/LogEventPublisher";
import { LoggingErrorReporter } from "../src/adapters/LoggingErrorReporter";
import { loadConfig } from "../src/config/detectorConfig";
import { ManualClock } from "../src/lib/clock";
import { ConfigError } from "../src/lib/errors";
import { log, setLogLevel } from "../src/lib/logger";
import { SourcePipeline } from "../src/pipeline/SourcePipeline";
import type { Pose } from "../src/pose/poseTypes";
import { createConfigStore } from "../src/store/configStore";
import { createMonitorStore } from "../src/store/monitorStore";
import { parsePoseLog, placeholderJpeg } from "../src/utils/poseLog";

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      config: { type: "string" },
      out: { type: "string" },
      verbose: { type: "boolean", default: false },
    },
  });

  const logPath = positionals[0];
  if (!logPath) {
    console.error("Usage: replayPoseLog <log.jsonl> [--config file.json] [--out dir] [--verbose]");
    return 2;
  }
  if (values.verbose) setLogLevel("debug");

  const { frames, issues } = parsePoseLog(fs.readFileSync(logPath, "utf8"));
  for (const issue of issues) log.warn(`${logPath}:${issue.line}: ${issue.message}`);
  if (frames.length === 0) {
    log.error(`No frames in ${logPath}`);
    return 1;
  }

  const config = loadConfig({
    file: values.config,
    env: process.env,
    overrides: values.out ? { clipsDir: values.out } : undefined,
  });
  const clock = new ManualClock(frames[0]?.t ?? 0);
  const publisher = new LogEventPublisher();
  const monitor = createMonitorStore();

  let current: Pose | null = null;
  const pipeline = new SourcePipeline({
    sourceId: "replay",
    poseSource: { detect: () => current },
    clipStore: new LocalClipStore(config.clipsDir),
    publisher,
    statusPublisher: publisher,
    errorReporter: new LoggingErrorReporter(),
    clock,
    config: createConfigStore(config),
    monitor,
  });

  await pipeline.start();
  for (const [index, frame] of frames.entries()) {
    await clock.advanceTo(frame.t);
    current = frame.landmarks;
    await pipeline.push({ data: placeholderJpeg(index), timestamp: frame.t });
  }

  // Let the last post-event window and storage run out on the replay clock
  await clock.advance(config.postEventMs + config.finalizeAllowanceMs);
  await pipeline.stop();

  const state = monitor.getState();
  log.info(
    `Replayed ${frames.length} frames: ${publisher.published.length} fall event(s), final status ${state.sources.replay?.status ?? "unknown"}`,
  );
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) log.error(`config ${issue.path}: ${issue.message}`);
    } else {
      log.error("Replay failed", error);
    }
    process.exitCode = 1;
  },
);
