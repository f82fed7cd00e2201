import { resolveLocalHubDir } from "../config/paths.js";
import type { PipelineConfig } from "../schemas/pipeline-config.js";
import { createHttpShardStore } from "./http.js";
import type { ShardStore } from "./interface.js";
import { createLocalShardStore } from "./local.js";

export interface ShardStoreFactoryOptions {
  rootPath: string;
  fetchFn?: typeof fetch;
}

/** Build the store selected by `storage.backend`. */
export function createShardStore(
  config: PipelineConfig,
  options: ShardStoreFactoryOptions,
): ShardStore {
  switch (config.storage.backend) {
    case "local":
      return createLocalShardStore({
        rootDir: resolveLocalHubDir(config, options.rootPath),
      });
    case "http": {
      const http = config.storage.config.http;
      if (!http) {
        throw new Error(
          'storage.backend is "http" but storage.config.http is not set',
        );
      }
      return createHttpShardStore({ ...http, fetchFn: options.fetchFn });
    }
  }
}
