import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Clip } from "../clip/clipTypes";
import type { ClipStore } from "../lib/boundaries";
import { ClipStoreError } from "../lib/errors";
import { storageLog } from "../lib/logger";
import { CLIP_EXTENSION, buildClipManifest, clipBaseName, encodeMjpeg } from "./clipEncoding";

/**
 * Writes clips to a directory on disk: `<name>.mjpeg` plus a `<name>.json`
 * manifest. Resolves to the clip's path.
 */
export class LocalClipStore implements ClipStore {
  constructor(private readonly clipsDir: string) {}

  async store(clip: Clip): Promise<string> {
    if (clip.frames.length === 0) {
      throw new ClipStoreError(`Clip ${clip.eventId} has no frames`);
    }

    const base = path.join(this.clipsDir, clipBaseName(clip));
    const clipPath = `${base}${CLIP_EXTENSION}`;
    try {
      await mkdir(this.clipsDir, { recursive: true });
      await writeFile(clipPath, encodeMjpeg(clip));
      await writeFile(`${base}.json`, JSON.stringify(buildClipManifest(clip), null, 2));
    } catch (error) {
      throw new ClipStoreError(`Failed to write ${clipPath}`, { cause: error });
    }

    storageLog.info(`Saved clip ${clipPath} (${clip.frames.length} frames)`);
    return clipPath;
  }
}
