import { randomUUID } from "node:crypto";
import { TransferError } from "../errors/catalog.js";
import { sha256Hex } from "./checksum.js";
import type { ManifestPlan, ShardStore, TransferReceipt } from "./interface.js";

export type StoreOperation = "begin" | "confirm" | "open" | "append" | "finalize";

export interface StoreCall {
  operation: StoreOperation;
  shardId?: string;
  datasetId?: string;
  shardIndex?: number;
}

export interface MemoryShardStoreOptions {
  /** Runs before every operation; throwing fails that call. */
  beforeCall?: (call: StoreCall) => void | Promise<void>;
  /** Rewrites confirmation receipts, e.g. to report a truncated upload. */
  mapReceipt?: (receipt: TransferReceipt, shardId: string) => TransferReceipt;
}

export interface MemoryManifest {
  entries: Map<number, string>;
  status: "open" | "complete";
  /** Set by openManifest; absent when entries were appended without one. */
  plan?: ManifestPlan;
}

export interface MemoryShardStore extends ShardStore {
  /** Durable shards by shard id. */
  readonly shards: ReadonlyMap<string, Uint8Array>;
  /** Every call in arrival order, including failed ones. */
  readonly calls: readonly StoreCall[];
  manifest(datasetId: string): MemoryManifest | undefined;
}

/**
 * In-process store for tests and dry runs. Revisions are sequential
 * (`mem-1`, `mem-2`, ...) in confirmation order.
 */
export function createMemoryShardStore(
  options?: MemoryShardStoreOptions,
): MemoryShardStore {
  const staged = new Map<string, { shardId: string; bytes: Uint8Array }>();
  const shards = new Map<string, Uint8Array>();
  const manifests = new Map<string, MemoryManifest>();
  const calls: StoreCall[] = [];
  let revision = 0;

  async function enter(call: StoreCall): Promise<void> {
    calls.push(call);
    await options?.beforeCall?.(call);
  }

  function manifestFor(datasetId: string): MemoryManifest {
    let manifest = manifests.get(datasetId);
    if (!manifest) {
      manifest = { entries: new Map(), status: "open" };
      manifests.set(datasetId, manifest);
    }
    return manifest;
  }

  return {
    shards,
    calls,

    manifest(datasetId) {
      return manifests.get(datasetId);
    },

    async beginShardTransfer(shardId, payload) {
      await enter({ operation: "begin", shardId });
      const transferId = randomUUID();
      staged.set(transferId, { shardId, bytes: payload.slice() });
      return { shardId, transferId, byteLength: payload.byteLength };
    },

    async confirmTransfer(handle) {
      await enter({ operation: "confirm", shardId: handle.shardId });
      const transfer = staged.get(handle.transferId);
      if (!transfer) {
        throw new TransferError(`Unknown transfer ${handle.transferId}`, {
          retryable: false,
          shardId: handle.shardId,
        });
      }
      staged.delete(handle.transferId);
      shards.set(transfer.shardId, transfer.bytes);
      revision += 1;
      const receipt: TransferReceipt = {
        size: transfer.bytes.byteLength,
        checksum: sha256Hex(transfer.bytes),
        revision: `mem-${revision}`,
      };
      return options?.mapReceipt ? options.mapReceipt(receipt, transfer.shardId) : receipt;
    },

    async openManifest(datasetId, plan) {
      await enter({ operation: "open", datasetId });
      const current = manifests.get(datasetId);
      if (
        current?.plan?.fingerprint === plan.fingerprint &&
        current.plan.shardCount === plan.shardCount
      ) {
        return;
      }
      manifests.set(datasetId, { entries: new Map(), status: "open", plan: { ...plan } });
    },

    async appendManifestEntry(datasetId, shardIndex, rev) {
      await enter({ operation: "append", datasetId, shardIndex });
      const manifest = manifestFor(datasetId);
      manifest.entries.set(shardIndex, rev);
      manifest.status = "open";
    },

    async finalizeManifest(datasetId) {
      await enter({ operation: "finalize", datasetId });
      manifestFor(datasetId).status = "complete";
    },
  };
}
