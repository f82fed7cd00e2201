import { createHash } from "node:crypto";
import type { EntityRecord } from "../scan/types.js";
import type { PlanOptions, ShardDescriptor, ShardPlan } from "./types.js";

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Partition order: subject, then session, then modality, ascending, with
 * the relative path as the final tiebreaker so the order is total.
 * Session-less records sort before any session of the same subject.
 */
export function compareRecords(a: EntityRecord, b: EntityRecord): number {
  return (
    compareStrings(a.subject, b.subject) ||
    compareStrings(a.session ?? "", b.session ?? "") ||
    compareStrings(a.modality, b.modality) ||
    compareStrings(a.relativePath, b.relativePath)
  );
}

export function shardFileName(index: number, count: number): string {
  const pad = (n: number) => String(n).padStart(5, "0");
  return `data/shard-${pad(index)}-of-${pad(count)}.arrow`;
}

function planFingerprint(groups: readonly (readonly EntityRecord[])[]): string {
  const hash = createHash("sha256");
  groups.forEach((records, index) => {
    for (const r of records) {
      hash.update(`${index}\t${r.relativePath}\t${r.sizeBytes}\n`);
    }
  });
  return hash.digest("hex");
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Split the validated records into contiguous shards. A shard closes when
 * the next record would push it past the byte or record budget; a record
 * larger than the byte budget gets a shard of its own. The same records and
 * budgets always produce the same plan.
 */
export function planShards(
  records: readonly EntityRecord[],
  options: PlanOptions,
): ShardPlan {
  const { datasetId, shardSizeBytes, maxRecordsPerShard } = options;
  assertPositiveInteger("shardSizeBytes", shardSizeBytes);
  if (maxRecordsPerShard !== undefined) {
    assertPositiveInteger("maxRecordsPerShard", maxRecordsPerShard);
  }

  const sorted = [...records].sort(compareRecords);
  const groups: EntityRecord[][] = [];
  let current: EntityRecord[] = [];
  let currentBytes = 0;

  for (const record of sorted) {
    const overBytes = currentBytes + record.sizeBytes > shardSizeBytes;
    const overCount =
      maxRecordsPerShard !== undefined && current.length >= maxRecordsPerShard;
    if (current.length > 0 && (overBytes || overCount)) {
      groups.push(current);
      current = [];
      currentBytes = 0;
    }
    current.push(record);
    currentBytes += record.sizeBytes;
  }
  if (current.length > 0) groups.push(current);

  const shards: ShardDescriptor[] = groups.map((group, index) => {
    const fileName = shardFileName(index, groups.length);
    return {
      index,
      shardId: `${datasetId}/${fileName}`,
      fileName,
      records: group,
      totalBytes: group.reduce((sum, r) => sum + r.sizeBytes, 0),
    };
  });

  return {
    datasetId,
    shardSizeBytes,
    ...(maxRecordsPerShard !== undefined && { maxRecordsPerShard }),
    totalBytes: shards.reduce((sum, s) => sum + s.totalBytes, 0),
    fingerprint: planFingerprint(groups),
    shards,
  };
}
