import type { Clip } from "../clip/clipTypes";
import type { ClipStore } from "../lib/boundaries";
import { ClipStoreError } from "../lib/errors";
import { storageLog } from "../lib/logger";
import {
  CLIP_CONTENT_TYPE,
  CLIP_EXTENSION,
  buildClipManifest,
  clipBaseName,
  encodeMjpeg,
} from "./clipEncoding";

export interface HttpClipStoreOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

/**
 * Uploads clips with `PUT <baseUrl>/clips/<name>.mjpeg`; the manifest rides
 * along in the `X-Clip-Manifest` header. Resolves to the clip URL.
 */
export class HttpClipStore implements ClipStore {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpClipStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async store(clip: Clip): Promise<string> {
    if (clip.frames.length === 0) {
      throw new ClipStoreError(`Clip ${clip.eventId} has no frames`);
    }

    const url = `${this.baseUrl}/clips/${clipBaseName(clip)}${CLIP_EXTENSION}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "PUT",
        headers: {
          ...this.options.headers,
          "Content-Type": CLIP_CONTENT_TYPE,
          "X-Clip-Manifest": JSON.stringify(buildClipManifest(clip)),
        },
        body: encodeMjpeg(clip),
      });
    } catch (error) {
      throw new ClipStoreError(`Upload of ${clip.eventId} failed`, { cause: error });
    }

    if (!response.ok) {
      throw new ClipStoreError(
        `Upload of ${clip.eventId} failed: ${response.status} ${response.statusText}`,
      );
    }

    storageLog.info(`Uploaded clip ${url}`);
    return url;
  }
}
