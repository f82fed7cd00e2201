import type { Logger } from "pino";
import type { ManifestPlan, ShardStore } from "../stores/interface.js";
import { missingIndices, type ManifestLedger } from "./ledger.js";

export interface ManifestWriterDeps {
  ledger: ManifestLedger;
  store: ShardStore;
  datasetId: string;
  logger: Logger;
}

/**
 * The only path through which the manifest changes. Appends and the final
 * close run one at a time in arrival order, whatever the number of workers.
 */
export interface ManifestWriter {
  /** Bind the remote manifest to the plan before any shard is transmitted. */
  open(plan: ManifestPlan): Promise<void>;
  /** Record a committed shard remotely, then in the ledger. */
  append(shardIndex: number, revision: string): Promise<void>;
  /**
   * Finalize the remote manifest and close the ledger entry.
   * @throws when any planned shard has no entry
   */
  finalize(): Promise<void>;
  committedIndices(): ReadonlySet<number>;
}

export function createManifestWriter(deps: ManifestWriterDeps): ManifestWriter {
  const { ledger, store, datasetId, logger } = deps;
  let tail: Promise<void> = Promise.resolve();

  function enqueue(task: () => Promise<void>): Promise<void> {
    const run = tail.then(task);
    // Keep the queue moving after a failed task; the caller still sees the error.
    tail = run.catch(() => undefined);
    return run;
  }

  function committedIndices(): ReadonlySet<number> {
    const manifest = ledger.read(datasetId);
    return new Set(manifest?.entries.map((e) => e.shardIndex) ?? []);
  }

  return {
    open(plan) {
      return enqueue(async () => {
        await store.openManifest(datasetId, plan);
        logger.debug(
          { datasetId, fingerprint: plan.fingerprint, shardCount: plan.shardCount },
          "Remote manifest opened",
        );
      });
    },

    append(shardIndex, revision) {
      return enqueue(async () => {
        await store.appendManifestEntry(datasetId, shardIndex, revision);
        ledger.recordCommit(datasetId, shardIndex, revision);
        logger.debug({ datasetId, shardIndex, revision }, "Manifest entry recorded");
      });
    },

    finalize() {
      return enqueue(async () => {
        const manifest = ledger.read(datasetId);
        if (!manifest) {
          throw new Error(`No manifest for ${datasetId}`);
        }
        const missing = missingIndices(manifest);
        if (missing.length > 0) {
          throw new Error(
            `Cannot finalize manifest for ${datasetId}: shards ${missing.join(", ")} are not committed`,
          );
        }
        await store.finalizeManifest(datasetId);
        ledger.closeManifest(datasetId);
        logger.info({ datasetId, shardCount: manifest.shardCount }, "Manifest finalized");
      });
    },

    committedIndices,
  };
}
