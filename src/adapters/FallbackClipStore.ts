import type { Clip } from "../clip/clipTypes";
import type { ClipStore, ErrorReporter } from "../lib/boundaries";
import { toError } from "../lib/errors";
import { storageLog } from "../lib/logger";

/**
 * Remote-first storage with a local backup: the primary's failure is
 * reported, then the clip goes to the secondary. Only a failure of both
 * rejects.
 */
export class FallbackClipStore implements ClipStore {
  constructor(
    private readonly primary: ClipStore,
    private readonly secondary: ClipStore,
    private readonly reporter: ErrorReporter,
  ) {}

  async store(clip: Clip): Promise<string> {
    try {
      return await this.primary.store(clip);
    } catch (error) {
      this.reporter.report(toError(error), {
        stage: "clip-store-primary",
        eventId: clip.eventId,
      });
      storageLog.warn(`Falling back to secondary storage for ${clip.eventId}`);
      return this.secondary.store(clip);
    }
  }
}
