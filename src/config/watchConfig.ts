import * as fs from "node:fs";
import { ConfigError } from "../lib/errors";
import type { ErrorReporter } from "../lib/boundaries";
import { configLog } from "../lib/logger";
import type { ConfigStore } from "../store/configStore";
import { readConfigFile } from "./detectorConfig";

/**
 * Apply the file at `path` to the store. Values absent from the file keep
 * their current value; a file with any invalid value is rejected whole and
 * reported. Returns whether the store took the file.
 */
export function reloadConfigFile(
  path: string,
  store: ConfigStore,
  reporter: ErrorReporter,
): boolean {
  const { input, issues } = readConfigFile(path);
  const rejected = issues.length > 0 ? issues : store.getState().apply(input);
  if (rejected.length > 0) {
    reporter.report(new ConfigError(rejected), { stage: "config-reload", path });
    return false;
  }
  configLog.info(`Reloaded ${path} (revision ${store.getState().revision})`);
  return true;
}

/**
 * Reload `path` into the store whenever the file changes.
 * Returns a function that stops watching.
 */
export function watchConfigFile(
  path: string,
  store: ConfigStore,
  reporter: ErrorReporter,
): () => void {
  let debounce: NodeJS.Timeout | null = null;
  const watcher = fs.watch(path, () => {
    // Editors often emit several change events per save
    if (debounce) clearTimeout(debounce);
    debounce = setTimeout(() => {
      debounce = null;
      reloadConfigFile(path, store, reporter);
    }, 100);
  });
  watcher.on("error", (error) => {
    reporter.report(error, { stage: "config-watch", path });
  });

  configLog.info(`Watching ${path} for config changes`);
  return () => {
    if (debounce) clearTimeout(debounce);
    watcher.close();
  };
}
