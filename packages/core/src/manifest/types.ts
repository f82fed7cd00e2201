export type ManifestStatus = "open" | "closed";

export interface ManifestEntry {
  shardIndex: number;
  /** Store revision, or the shard checksum when the store has no revisions. */
  revision: string;
  committedAt: string; // ISO 8601
}

/** Durable record of which shards of a plan are committed. */
export interface UploadManifest {
  datasetId: string;
  planFingerprint: string;
  shardCount: number;
  status: ManifestStatus;
  createdAt: string;
  closedAt: string | null;
  /** Ordered by shard index. */
  entries: ManifestEntry[];
}

export interface OpenManifestResult {
  manifest: UploadManifest;
  /** An open manifest for the same plan was found and will be continued. */
  resumed: boolean;
  /** A closed manifest for an older plan was replaced. */
  superseded: boolean;
}
