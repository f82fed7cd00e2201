export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_HUB_DIR,
  CONFIG_FILE_NAME,
  HUB_TOKEN_ENV,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export {
  expandHomePath,
  resolveRootPath,
  resolveManifestPath,
  IN_MEMORY_MANIFEST,
  resolveLocalHubDir,
} from "./paths.js";
