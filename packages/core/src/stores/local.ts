/**
 * Filesystem hub. Shards are written to `<rootDir>/.staging/<transferId>`
 * and renamed into `<rootDir>/<shardId>` on confirmation; the receipt is
 * computed from the bytes on disk after the rename. Each dataset keeps
 * `<rootDir>/<datasetId>/manifest.json`, tied to the plan that opened it.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, posix } from "node:path";
import { z } from "zod";
import { TransferError } from "../errors/catalog.js";
import { sha256Hex } from "./checksum.js";
import type { ShardStore } from "./interface.js";

const STAGING_DIR = ".staging";

export const LocalManifestSchema = z.object({
  datasetId: z.string(),
  status: z.enum(["open", "complete"]),
  planFingerprint: z.string().nullable().default(null),
  shardCount: z.number().int().min(0).nullable().default(null),
  entries: z.record(z.string(), z.string()),
  updatedAt: z.string(),
});

export type LocalManifest = z.infer<typeof LocalManifestSchema>;

export interface LocalShardStoreOptions {
  rootDir: string;
  now?: () => Date;
}

/** Reject keys that would escape the hub directory. */
function assertSafeKey(key: string): void {
  const normalized = posix.normalize(key);
  if (
    key === "" ||
    isAbsolute(key) ||
    key.includes("\\") ||
    normalized !== key ||
    normalized.split("/").some((segment) => segment === ".." || segment === "." || segment === "")
  ) {
    throw new TransferError(`Invalid store key: ${key}`, { retryable: false });
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err as NodeJS.ErrnoException).code === "ENOENT";
}

export function createLocalShardStore(options: LocalShardStoreOptions): ShardStore {
  const { rootDir } = options;
  const now = options.now ?? (() => new Date());
  const stagingDir = join(rootDir, STAGING_DIR);

  function manifestPath(datasetId: string): string {
    return join(rootDir, datasetId, "manifest.json");
  }

  async function readManifest(datasetId: string): Promise<LocalManifest> {
    let raw: string;
    try {
      raw = await readFile(manifestPath(datasetId), "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return {
          datasetId,
          status: "open",
          planFingerprint: null,
          shardCount: null,
          entries: {},
          updatedAt: now().toISOString(),
        };
      }
      throw err;
    }
    return LocalManifestSchema.parse(JSON.parse(raw));
  }

  async function writeManifest(manifest: LocalManifest): Promise<void> {
    const path = manifestPath(manifest.datasetId);
    const tmp = `${path}.${randomUUID()}.tmp`;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmp, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
    await rename(tmp, path);
  }

  return {
    async beginShardTransfer(shardId, payload) {
      assertSafeKey(shardId);
      const transferId = randomUUID();
      try {
        await mkdir(stagingDir, { recursive: true });
        await writeFile(join(stagingDir, transferId), payload);
      } catch (err) {
        throw new TransferError(`Failed to stage ${shardId}`, {
          retryable: true,
          shardId,
          cause: err,
        });
      }
      return { shardId, transferId, byteLength: payload.byteLength };
    },

    async confirmTransfer(handle) {
      const target = join(rootDir, handle.shardId);
      try {
        await mkdir(dirname(target), { recursive: true });
        await rename(join(stagingDir, handle.transferId), target);
      } catch (err) {
        throw new TransferError(`Failed to commit ${handle.shardId}`, {
          retryable: !isNotFound(err),
          shardId: handle.shardId,
          cause: err,
        });
      }
      const stored = await readFile(target);
      return { size: stored.byteLength, checksum: sha256Hex(stored) };
    },

    async openManifest(datasetId, plan) {
      assertSafeKey(datasetId);
      const manifest = await readManifest(datasetId);
      if (
        manifest.planFingerprint === plan.fingerprint &&
        manifest.shardCount === plan.shardCount
      ) {
        return;
      }
      await writeManifest({
        datasetId,
        status: "open",
        planFingerprint: plan.fingerprint,
        shardCount: plan.shardCount,
        entries: {},
        updatedAt: now().toISOString(),
      });
    },

    async appendManifestEntry(datasetId, shardIndex, revision) {
      assertSafeKey(datasetId);
      const manifest = await readManifest(datasetId);
      await writeManifest({
        ...manifest,
        status: "open",
        entries: { ...manifest.entries, [String(shardIndex)]: revision },
        updatedAt: now().toISOString(),
      });
    },

    async finalizeManifest(datasetId) {
      assertSafeKey(datasetId);
      const manifest = await readManifest(datasetId);
      await writeManifest({
        ...manifest,
        status: "complete",
        updatedAt: now().toISOString(),
      });
    },
  };
}
