import type { EntityRecord } from "../scan/types.js";

export interface ShardDescriptor {
  index: number;
  /** `<datasetId>/<fileName>`, the key under which the store keeps the shard. */
  shardId: string;
  /** `data/shard-00000-of-00004.arrow` */
  fileName: string;
  records: readonly EntityRecord[];
  /** Sum of the records' declared sizes. */
  totalBytes: number;
}

export interface ShardPlan {
  datasetId: string;
  shardSizeBytes: number;
  maxRecordsPerShard?: number;
  totalBytes: number;
  /** SHA-256 over the ordered shard boundaries; changes when any boundary does. */
  fingerprint: string;
  shards: ShardDescriptor[];
}

export interface PlanOptions {
  datasetId: string;
  shardSizeBytes: number;
  maxRecordsPerShard?: number;
}
