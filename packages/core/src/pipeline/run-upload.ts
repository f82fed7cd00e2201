import type { Logger } from "pino";
import { createRecordAssembler } from "../assemble/assembler.js";
import type { DatasetProfile } from "../dataset/types.js";
import type { ManifestLedger } from "../manifest/ledger.js";
import { createManifestWriter } from "../manifest/writer.js";
import { planShards } from "../plan/planner.js";
import { collectRecords, scanDataset } from "../scan/scanner.js";
import type { PipelineConfig } from "../schemas/pipeline-config.js";
import type { ShardStore } from "../stores/interface.js";
import { uploadShards, type FailedShard } from "../upload/pool.js";
import { retryWithBackoff, type Sleeper } from "../upload/retry.js";
import { toleranceFromConfig } from "../validate/tolerance.js";
import type { ValidationReport } from "../validate/types.js";
import { assertValidationPassed, validate } from "../validate/validator.js";

export interface RunUploadOptions {
  datasetId: string;
  /** Local dataset root. */
  root: string;
  profile: DatasetProfile;
  store: ShardStore;
  ledger: ManifestLedger;
  config: Pick<PipelineConfig, "validation" | "sharding" | "upload">;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleeper;
  random?: () => number;
  now?: () => Date;
  /** Injectable for tests; defaults to fs.readFile. */
  readFile?: (path: string) => Promise<Uint8Array>;
}

export interface UploadRunResult {
  datasetId: string;
  report: ValidationReport;
  shardCount: number;
  committed: number[];
  failed: FailedShard[];
  skipped: number[];
  pending: number[];
  /** True only when every planned shard is committed and the manifest is closed. */
  complete: boolean;
}

/**
 * build → validate → shard → upload for one dataset.
 *
 * @throws ScanError when the root cannot be walked
 * @throws ValidationBlockedError before any shard is planned
 * @throws ManifestCorruptionError when the persisted manifest disagrees with the plan
 */
export async function runUpload(options: RunUploadOptions): Promise<UploadRunResult> {
  const { datasetId, profile, store, ledger, config } = options;
  const logger = options.logger.child({ datasetId });
  const schema = profile.featureSchema();

  const records = await collectRecords(
    scanDataset(options.root, schema, { now: options.now }),
  );
  logger.info({ root: options.root, records: records.length }, "Dataset scanned");

  const report = await validate(
    records,
    profile.expectedCounts(),
    toleranceFromConfig(config.validation.tolerance),
    { schema, checkExistence: config.validation.checkExistence, now: options.now },
  );
  for (const check of report.checks.filter((c) => c.status !== "pass")) {
    const context = {
      check: check.name,
      group: check.group,
      offendingPaths: check.offendingPaths.slice(0, 10),
    };
    if (check.fatal && check.status === "fail") {
      logger.error(context, check.message);
    } else {
      logger.warn(context, check.message);
    }
  }
  assertValidationPassed(report);

  const plan = planShards(records, {
    datasetId,
    shardSizeBytes: config.sharding.shardSizeBytes,
    maxRecordsPerShard: config.sharding.maxRecordsPerShard,
  });
  const { manifest, resumed, superseded } = ledger.open(
    datasetId,
    plan.fingerprint,
    plan.shards.length,
  );
  logger.info(
    {
      shards: plan.shards.length,
      totalBytes: plan.totalBytes,
      fingerprint: plan.fingerprint,
      resumed,
      superseded,
      alreadyCommitted: manifest.entries.length,
    },
    "Shard plan ready",
  );

  const allIndices = plan.shards.map((s) => s.index);
  if (manifest.status === "closed") {
    logger.info("Manifest already closed for this plan; nothing to upload");
    return {
      datasetId,
      report,
      shardCount: plan.shards.length,
      committed: [],
      failed: [],
      skipped: allIndices,
      pending: [],
      complete: true,
    };
  }

  const writer = createManifestWriter({ ledger, store, datasetId, logger });
  const retry = {
    policy: config.upload,
    logger,
    sleep: options.sleep,
    random: options.random,
    signal: options.signal,
  };
  // A remote manifest left complete by a superseded plan must read as open
  // before any shard of this plan overwrites its files.
  await retryWithBackoff(
    "Manifest open",
    () => writer.open({ fingerprint: plan.fingerprint, shardCount: plan.shards.length }),
    retry,
  );

  const result = await uploadShards(
    {
      store,
      assembler: createRecordAssembler({ schema, readFile: options.readFile }),
      manifest: writer,
      policy: config.upload,
      logger,
      sleep: options.sleep,
      random: options.random,
    },
    plan.shards,
    {
      concurrency: config.upload.concurrency,
      skip: new Set(manifest.entries.map((e) => e.shardIndex)),
      signal: options.signal,
    },
  );

  let complete = result.failed.length === 0 && result.pending.length === 0;
  if (complete) {
    try {
      await retryWithBackoff("Manifest finalize", () => writer.finalize(), retry);
    } catch (err) {
      complete = false;
      logger.error({ err }, "Manifest finalize failed; manifest left open for the next run");
    }
  } else {
    logger.warn(
      { failed: result.failed.map((f) => f.index), pending: result.pending },
      "Upload incomplete; manifest left open for the next run",
    );
  }

  logger.info(
    {
      committed: result.committed.length,
      skipped: result.skipped.length,
      failed: result.failed.length,
      pending: result.pending.length,
      complete,
    },
    "Upload run finished",
  );

  return {
    datasetId,
    report,
    shardCount: plan.shards.length,
    ...result,
    complete,
  };
}
