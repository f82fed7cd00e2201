import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".neuroshard");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");
export const DEFAULT_MANIFEST_FILE = "manifest.db";
export const DEFAULT_HUB_DIR = "hub";
export const CONFIG_FILE_NAME = "config.json";

/** Hub credentials stay out of config.json; this variable supplies them. */
export const HUB_TOKEN_ENV = "NEUROSHARD_HUB_TOKEN";
