/**
 * Generate Demo Pose Log
 * ======================
 *
 * Writes a synthetic session (standing, a fall, lying, then standing again
 * after getting up) as JSONL for scripts/replayPoseLog.ts.
 *
 * Run with: npx tsx scripts/generateDemoPoseLog.ts [output.jsonl]
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { fallScript, standingScript, type ScriptedFrame } from '../src/utils/SyntheticPoseGenerator';
import { formatPoseLog } from '../src/utils/poseLog';

// ESM-compatible __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_OUTPUT = path.join(__dirname, '../demo/fall-session.jsonl');

function buildSession(): ScriptedFrame[] {
    const fall = fallScript({ standMs: 3000, fallMs: 600, lieMs: 4000, jitter: 0.002 });
    const lastT = fall[fall.length - 1]?.t ?? 0;

    // Camera loses the person for half a second
    const gap: ScriptedFrame[] = [];
    for (let t = lastT + 33; t < lastT + 533; t += 33) gap.push({ t, landmarks: null });

    const recovered = standingScript(4000, { startMs: lastT + 533, jitter: 0.002 });
    return [...fall, ...gap, ...recovered];
}

function main(): void {
    const output = path.resolve(process.argv[2] ?? DEFAULT_OUTPUT);
    const frames = buildSession();

    fs.mkdirSync(path.dirname(output), { recursive: true });
    fs.writeFileSync(output, formatPoseLog(frames));
    console.log(`✓ Wrote ${frames.length} frames to ${output}`);
}

main();
