import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { PipelineConfig } from "../schemas/pipeline-config.js";
import {
  DEFAULT_HUB_DIR,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_ROOT_PATH,
} from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured root path (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

export const IN_MEMORY_MANIFEST = ":memory:";

/**
 * SQLite ledger path: `manifest.path`, or `<root>/manifest.db`.
 * ":memory:" is passed through for runs that keep no state.
 */
export function resolveManifestPath(
  config: PipelineConfig,
  rootPath: string,
): string {
  const path = config.manifest.path;
  if (path === IN_MEMORY_MANIFEST) return path;
  return path !== undefined
    ? resolve(expandHomePath(path))
    : join(rootPath, DEFAULT_MANIFEST_FILE);
}

/** Local hub directory: `storage.config.local.rootDir`, or `<root>/hub`. */
export function resolveLocalHubDir(
  config: PipelineConfig,
  rootPath: string,
): string {
  const rootDir = config.storage.config.local?.rootDir;
  return rootDir !== undefined
    ? resolve(expandHomePath(rootDir))
    : join(rootPath, DEFAULT_HUB_DIR);
}
