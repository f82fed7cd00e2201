import type { Logger } from "pino";
import { serializeBatch, type RecordAssembler } from "../assemble/assembler.js";
import { ShardFailedError, TransferError } from "../errors/catalog.js";
import type { ManifestWriter } from "../manifest/writer.js";
import type { ShardDescriptor } from "../plan/types.js";
import { sha256Hex } from "../stores/checksum.js";
import type { ShardStore, TransferReceipt } from "../stores/interface.js";
import {
  backoffDelay,
  isRetryable,
  retryAfterHint,
  sleep as defaultSleep,
  type RetryPolicy,
  type Sleeper,
} from "./retry.js";
import { ShardStateMachine } from "./state-machine.js";

export interface ShardUploaderDeps {
  store: ShardStore;
  assembler: RecordAssembler;
  manifest: ManifestWriter;
  policy: RetryPolicy;
  logger: Logger;
  sleep?: Sleeper;
  random?: () => number;
}

export type ShardOutcome =
  | { index: number; status: "committed"; attempts: number; revision: string }
  | { index: number; status: "failed"; attempts: number; error: ShardFailedError }
  /** Stopped by the abort signal before it could commit. */
  | { index: number; status: "cancelled"; attempts: number };

interface EncodedPayload {
  bytes: Uint8Array;
  checksum: string;
}

function verifyReceipt(
  shard: ShardDescriptor,
  payload: EncodedPayload,
  receipt: TransferReceipt,
): void {
  if (receipt.size !== payload.bytes.byteLength) {
    throw new TransferError(
      `Store holds ${receipt.size} bytes for ${shard.shardId}, sent ${payload.bytes.byteLength}`,
      { retryable: true, shardId: shard.shardId },
    );
  }
  if (receipt.checksum !== payload.checksum) {
    throw new TransferError(
      `Checksum mismatch for ${shard.shardId}: store reported ${receipt.checksum}, sent ${payload.checksum}`,
      { retryable: true, shardId: shard.shardId },
    );
  }
}

/**
 * Take one shard from pending to committed: assemble, serialize, transmit,
 * verify the receipt, then append to the manifest. Transient failures are
 * retried with backoff up to `policy.maxAttempts`; the encoded payload is
 * kept across retries so only a failed assembly is redone.
 */
export async function uploadShard(
  deps: ShardUploaderDeps,
  shard: ShardDescriptor,
  signal?: AbortSignal,
): Promise<ShardOutcome> {
  const { store, assembler, manifest, policy } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;
  const log = deps.logger.child({ shardIndex: shard.index, shardId: shard.shardId });

  const machine = new ShardStateMachine(shard.index);
  machine.onStateChange((event) => {
    log.debug(
      { from: event.from, to: event.to, attempt: event.attempt, reason: event.reason },
      "Shard state changed",
    );
  });

  let payload: EncodedPayload | undefined;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (signal?.aborted) {
      return { index: shard.index, status: "cancelled", attempts: machine.getAttempts() };
    }

    try {
      if (!payload) {
        machine.transition("assembling");
        const batch = await assembler.assemble(shard.records);
        const bytes = serializeBatch(batch);
        payload = { bytes, checksum: sha256Hex(bytes) };
      }

      machine.transition("transmitting");
      const handle = await store.beginShardTransfer(shard.shardId, payload.bytes);
      const receipt = await store.confirmTransfer(handle);
      verifyReceipt(shard, payload, receipt);

      const revision = receipt.revision ?? payload.checksum;
      await manifest.append(shard.index, revision);
      machine.transition("committed");
      log.info(
        { attempt, bytes: payload.bytes.byteLength, records: shard.records.length, revision },
        "Shard committed",
      );
      return { index: shard.index, status: "committed", attempts: attempt, revision };
    } catch (err) {
      lastError = err;
      machine.transition("failed", err instanceof Error ? err.message : String(err));

      if (!isRetryable(err) || attempt === policy.maxAttempts) {
        break;
      }

      const delayMs = backoffDelay(policy, attempt - 1, random, retryAfterHint(err));
      log.warn({ err, attempt, delayMs }, "Shard attempt failed, retrying");
      try {
        await sleep(delayMs, signal);
      } catch (sleepErr) {
        log.info({ reason: String(sleepErr) }, "Shard retry cancelled");
        return { index: shard.index, status: "cancelled", attempts: machine.getAttempts() };
      }
    }
  }

  const error = new ShardFailedError(shard.index, machine.getAttempts(), lastError);
  log.error({ err: lastError, attempts: machine.getAttempts() }, error.message);
  return { index: shard.index, status: "failed", attempts: machine.getAttempts(), error };
}
