import type { ShardDescriptor } from "../plan/types.js";
import { uploadShard, type ShardOutcome, type ShardUploaderDeps } from "./uploader.js";

export interface UploadShardsOptions {
  concurrency: number;
  /** Indices already committed by an earlier run. */
  skip?: ReadonlySet<number>;
  signal?: AbortSignal;
}

export interface FailedShard {
  index: number;
  attempts: number;
  message: string;
}

export interface UploadShardsResult {
  committed: number[];
  failed: FailedShard[];
  skipped: number[];
  /** Never started, or stopped by the abort signal. */
  pending: number[];
}

/**
 * Upload shards with a fixed number of workers. Each worker owns one shard
 * from assembly to commit before taking the next, so at most `concurrency`
 * encoded shards are in memory. One shard's failure does not stop the rest.
 */
export async function uploadShards(
  deps: ShardUploaderDeps,
  shards: readonly ShardDescriptor[],
  options: UploadShardsOptions,
): Promise<UploadShardsResult> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
  }
  const skip = options.skip ?? new Set<number>();
  const skipped = shards.filter((s) => skip.has(s.index)).map((s) => s.index);
  const queue = shards.filter((s) => !skip.has(s.index));
  const outcomes: ShardOutcome[] = [];

  const processNext = async () => {
    for (let shard = queue.shift(); shard; shard = queue.shift()) {
      if (options.signal?.aborted) {
        queue.unshift(shard);
        return;
      }
      outcomes.push(await uploadShard(deps, shard, options.signal));
    }
  };

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(options.concurrency, queue.length);
  for (let i = 0; i < workerCount; i++) {
    workers.push(processNext());
  }
  await Promise.all(workers);

  const byIndex = (a: number, b: number) => a - b;
  const committed: number[] = [];
  const failed: FailedShard[] = [];
  const pending = queue.map((s) => s.index);
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "committed":
        committed.push(outcome.index);
        break;
      case "failed":
        failed.push({
          index: outcome.index,
          attempts: outcome.attempts,
          message: outcome.error.message,
        });
        break;
      case "cancelled":
        pending.push(outcome.index);
        break;
    }
  }

  return {
    committed: committed.sort(byIndex),
    failed: failed.sort((a, b) => a.index - b.index),
    skipped: skipped.sort(byIndex),
    pending: pending.sort(byIndex),
  };
}
