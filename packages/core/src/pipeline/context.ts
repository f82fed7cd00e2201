import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import {
  DEFAULT_ROOT_PATH,
  IN_MEMORY_MANIFEST,
  resolveManifestPath,
  resolveRootPath,
} from "../config/index.js";
import type { DatasetProfile } from "../dataset/types.js";
import { createLogger, type Logger } from "../logger/index.js";
import { initializeManifestDatabase } from "../manifest/schema.js";
import { createManifestLedger, type ManifestLedger } from "../manifest/ledger.js";
import type { PipelineConfig } from "../schemas/pipeline-config.js";
import { createShardStore } from "../stores/factory.js";
import type { ShardStore } from "../stores/interface.js";
import { runUpload, type UploadRunResult } from "./run-upload.js";

export interface PipelineContext {
  logger: Logger;
  config: PipelineConfig;
  rootPath: string;
  ledger: ManifestLedger;
  store: ShardStore;
  upload: (request: UploadRequest) => Promise<UploadRunResult>;
  cleanup: () => void;
}

export interface UploadRequest {
  datasetId: string;
  root: string;
  profile: DatasetProfile;
  signal?: AbortSignal;
}

export interface CreatePipelineContextOptions {
  rootPath?: string;
  /** Replaces the store selected by config, e.g. an in-memory one for dry runs. */
  store?: ShardStore;
  logger?: Logger;
  fetchFn?: typeof fetch;
}

/** Wire logger, manifest ledger and store from config. */
export async function createPipelineContext(
  config: PipelineConfig,
  options?: CreatePipelineContextOptions,
): Promise<PipelineContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const rootPath = resolveRootPath(options?.rootPath ?? DEFAULT_ROOT_PATH);
  const manifestPath = resolveManifestPath(config, rootPath);

  await mkdir(rootPath, { recursive: true });
  if (manifestPath !== IN_MEMORY_MANIFEST) {
    await mkdir(dirname(manifestPath), { recursive: true });
  }

  const store =
    options?.store ?? createShardStore(config, { rootPath, fetchFn: options?.fetchFn });
  const ledger = createManifestLedger(initializeManifestDatabase(manifestPath));

  logger.info(
    { rootPath, manifestPath, backend: options?.store ? "custom" : config.storage.backend },
    "Pipeline context ready",
  );

  return {
    logger,
    config,
    rootPath,
    ledger,
    store,
    upload: (request) =>
      runUpload({ ...request, store, ledger, config, logger }),
    cleanup: () => {
      ledger.close();
    },
  };
}
