/**
 * Remote dataset store. A shard becomes durable in two steps: the bytes are
 * handed over with beginShardTransfer, then confirmTransfer reports what the
 * store actually holds so the caller can compare it with what it sent.
 * Keys are `<datasetId>/data/shard-XXXXX-of-XXXXX.arrow`.
 */
export interface ShardStore {
  /**
   * Hand a serialized shard to the store.
   * @throws TransferError; `retryable` says whether another attempt may succeed
   */
  beginShardTransfer(shardId: string, payload: Uint8Array): Promise<TransferHandle>;

  /**
   * Wait for the transfer to become durable and report the stored size and
   * SHA-256 checksum.
   */
  confirmTransfer(handle: TransferHandle): Promise<TransferReceipt>;

  /**
   * Start or resume the dataset's remote manifest for a shard plan. A
   * manifest written for any other plan, complete or not, is replaced by an
   * empty open one before a shard of the new plan is transmitted.
   */
  openManifest(datasetId: string, plan: ManifestPlan): Promise<void>;

  /** Record a committed shard in the dataset's remote manifest. */
  appendManifestEntry(datasetId: string, shardIndex: number, revision: string): Promise<void>;

  /** Mark the remote manifest complete. Only called once every shard is committed. */
  finalizeManifest(datasetId: string): Promise<void>;
}

export interface TransferHandle {
  shardId: string;
  transferId: string;
  /** Bytes handed to the store. */
  byteLength: number;
}

export interface TransferReceipt {
  size: number;
  /** Lowercase hex SHA-256 of the stored bytes. */
  checksum: string;
  /** Store-assigned revision, when the store has one. */
  revision?: string;
}

/** Identifies the shard boundaries a remote manifest describes. */
export interface ManifestPlan {
  fingerprint: string;
  shardCount: number;
}
