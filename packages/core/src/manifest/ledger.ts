import type Database from "better-sqlite3";
import { ManifestCorruptionError } from "../errors/catalog.js";
import type {
  ManifestEntry,
  ManifestStatus,
  OpenManifestResult,
  UploadManifest,
} from "./types.js";

/**
 * Persisted upload state, keyed by dataset id. Survives process restarts so
 * an interrupted run can skip the shards it already committed.
 */
export interface ManifestLedger {
  read(datasetId: string): UploadManifest | undefined;
  /**
   * Start or resume the manifest for a plan.
   * @throws ManifestCorruptionError when an open manifest belongs to a
   * different plan or holds entries outside it
   */
  open(datasetId: string, planFingerprint: string, shardCount: number): OpenManifestResult;
  /** Idempotent; a repeated commit keeps the latest revision. */
  recordCommit(datasetId: string, shardIndex: number, revision: string): void;
  /** Mark closed. Throws unless every planned index is committed. */
  closeManifest(datasetId: string): UploadManifest;
  /** Forget a dataset's manifest and entries. */
  reset(datasetId: string): void;
  close(): void;
}

export interface ManifestLedgerOptions {
  now?: () => Date;
}

interface ManifestRow {
  dataset_id: string;
  plan_fingerprint: string;
  shard_count: number;
  status: string;
  created_at: string;
  closed_at: string | null;
}

interface EntryRow {
  shard_index: number;
  revision: string;
  committed_at: string;
}

function toStatus(datasetId: string, value: string): ManifestStatus {
  if (value === "open" || value === "closed") return value;
  throw new ManifestCorruptionError(datasetId, `unknown status "${value}"`);
}

/** Indices in [0, shardCount) with no entry. */
export function missingIndices(manifest: UploadManifest): number[] {
  const present = new Set(manifest.entries.map((e) => e.shardIndex));
  const missing: number[] = [];
  for (let i = 0; i < manifest.shardCount; i++) {
    if (!present.has(i)) missing.push(i);
  }
  return missing;
}

export function createManifestLedger(
  db: Database.Database,
  options?: ManifestLedgerOptions,
): ManifestLedger {
  const now = options?.now ?? (() => new Date());

  const selectManifestStmt = db.prepare<{ dataset_id: string }>(
    "SELECT * FROM upload_manifests WHERE dataset_id = @dataset_id",
  );

  const selectEntriesStmt = db.prepare<{ dataset_id: string }>(
    `SELECT shard_index, revision, committed_at FROM manifest_entries
     WHERE dataset_id = @dataset_id ORDER BY shard_index ASC`,
  );

  const insertManifestStmt = db.prepare<{
    dataset_id: string;
    plan_fingerprint: string;
    shard_count: number;
    created_at: string;
  }>(
    `INSERT INTO upload_manifests (dataset_id, plan_fingerprint, shard_count, status, created_at)
     VALUES (@dataset_id, @plan_fingerprint, @shard_count, 'open', @created_at)`,
  );

  const upsertEntryStmt = db.prepare<{
    dataset_id: string;
    shard_index: number;
    revision: string;
    committed_at: string;
  }>(
    `INSERT INTO manifest_entries (dataset_id, shard_index, revision, committed_at)
     VALUES (@dataset_id, @shard_index, @revision, @committed_at)
     ON CONFLICT (dataset_id, shard_index) DO UPDATE SET
       revision = excluded.revision,
       committed_at = excluded.committed_at`,
  );

  const closeManifestStmt = db.prepare<{ dataset_id: string; closed_at: string }>(
    `UPDATE upload_manifests SET status = 'closed', closed_at = @closed_at
     WHERE dataset_id = @dataset_id`,
  );

  const deleteEntriesStmt = db.prepare<{ dataset_id: string }>(
    "DELETE FROM manifest_entries WHERE dataset_id = @dataset_id",
  );

  const deleteManifestStmt = db.prepare<{ dataset_id: string }>(
    "DELETE FROM upload_manifests WHERE dataset_id = @dataset_id",
  );

  function read(datasetId: string): UploadManifest | undefined {
    const row = selectManifestStmt.get({ dataset_id: datasetId }) as ManifestRow | undefined;
    if (!row) return undefined;
    const entries = selectEntriesStmt.all({ dataset_id: datasetId }) as EntryRow[];
    return {
      datasetId: row.dataset_id,
      planFingerprint: row.plan_fingerprint,
      shardCount: row.shard_count,
      status: toStatus(datasetId, row.status),
      createdAt: row.created_at,
      closedAt: row.closed_at,
      entries: entries.map(
        (e): ManifestEntry => ({
          shardIndex: e.shard_index,
          revision: e.revision,
          committedAt: e.committed_at,
        }),
      ),
    };
  }

  function reset(datasetId: string): void {
    deleteEntriesStmt.run({ dataset_id: datasetId });
    deleteManifestStmt.run({ dataset_id: datasetId });
  }

  function create(datasetId: string, planFingerprint: string, shardCount: number): UploadManifest {
    insertManifestStmt.run({
      dataset_id: datasetId,
      plan_fingerprint: planFingerprint,
      shard_count: shardCount,
      created_at: now().toISOString(),
    });
    const manifest = read(datasetId);
    if (!manifest) {
      throw new ManifestCorruptionError(datasetId, "manifest vanished after insert");
    }
    return manifest;
  }

  const openTx = db.transaction(
    (datasetId: string, planFingerprint: string, shardCount: number): OpenManifestResult => {
      const existing = read(datasetId);
      if (!existing) {
        return {
          manifest: create(datasetId, planFingerprint, shardCount),
          resumed: false,
          superseded: false,
        };
      }

      if (existing.status === "closed") {
        if (
          existing.planFingerprint === planFingerprint &&
          existing.shardCount === shardCount
        ) {
          return { manifest: existing, resumed: true, superseded: false };
        }
        reset(datasetId);
        return {
          manifest: create(datasetId, planFingerprint, shardCount),
          resumed: false,
          superseded: true,
        };
      }

      if (existing.planFingerprint !== planFingerprint) {
        throw new ManifestCorruptionError(
          datasetId,
          `open manifest was written for plan ${existing.planFingerprint}, current plan is ${planFingerprint}`,
        );
      }
      if (existing.shardCount !== shardCount) {
        throw new ManifestCorruptionError(
          datasetId,
          `open manifest expects ${existing.shardCount} shards, current plan has ${shardCount}`,
        );
      }
      const outOfRange = existing.entries.filter(
        (e) => e.shardIndex < 0 || e.shardIndex >= shardCount,
      );
      if (outOfRange.length > 0) {
        throw new ManifestCorruptionError(
          datasetId,
          `entries outside the plan: ${outOfRange.map((e) => e.shardIndex).join(", ")}`,
        );
      }
      return { manifest: existing, resumed: true, superseded: false };
    },
  );

  return {
    read,

    open(datasetId, planFingerprint, shardCount) {
      return openTx(datasetId, planFingerprint, shardCount);
    },

    recordCommit(datasetId, shardIndex, revision) {
      const manifest = read(datasetId);
      if (!manifest || manifest.status !== "open") {
        throw new Error(`No open manifest for ${datasetId}`);
      }
      if (!Number.isInteger(shardIndex) || shardIndex < 0 || shardIndex >= manifest.shardCount) {
        throw new RangeError(
          `Shard index ${shardIndex} is outside the plan of ${manifest.shardCount} shards`,
        );
      }
      upsertEntryStmt.run({
        dataset_id: datasetId,
        shard_index: shardIndex,
        revision,
        committed_at: now().toISOString(),
      });
    },

    closeManifest(datasetId) {
      const manifest = read(datasetId);
      if (!manifest) {
        throw new Error(`No manifest for ${datasetId}`);
      }
      const missing = missingIndices(manifest);
      if (missing.length > 0) {
        throw new Error(
          `Cannot close manifest for ${datasetId}: shards ${missing.join(", ")} are not committed`,
        );
      }
      if (manifest.status === "closed") return manifest;
      const closedAt = now().toISOString();
      closeManifestStmt.run({ dataset_id: datasetId, closed_at: closedAt });
      return { ...manifest, status: "closed", closedAt };
    },

    reset,

    close() {
      db.close();
    },
  };
}
