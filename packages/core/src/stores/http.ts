/**
 * REST hub client.
 *   PUT  {apiUrl}/v1/shards/{shardId}                      → { transferId }
 *   GET  {apiUrl}/v1/shards/{shardId}?transfer={id}        → { durable, size, sha256, revision? }
 *   PUT  {apiUrl}/v1/datasets/{datasetId}/manifest          { planFingerprint, shardCount }
 *   POST {apiUrl}/v1/datasets/{datasetId}/manifest/entries  { shardIndex, revision }
 *   POST {apiUrl}/v1/datasets/{datasetId}/manifest/finalize
 * The hub replaces a manifest whose plan differs from the PUT body with an
 * empty open one and leaves a matching one untouched.
 * Auth: optional bearer token on every request.
 */

import { z } from "zod";
import { TransferError } from "../errors/catalog.js";
import type { ShardStore } from "./interface.js";

export interface HttpShardStoreOptions {
  apiUrl: string;
  token?: string;
  /** Timeout per request in ms (default: 30000) */
  timeoutMs?: number;
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
}

const BeginResponseSchema = z.object({ transferId: z.string().min(1) });

const StatusResponseSchema = z.object({
  durable: z.boolean(),
  size: z.number().int().min(0),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  revision: z.string().min(1).optional(),
});

/** 408, 429 and 5xx may succeed on a later attempt; other statuses will not. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Retry-After as delta-seconds or an HTTP date, in ms from `now`. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === "") return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function encodeKey(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

export function createHttpShardStore(options: HttpShardStoreOptions): ShardStore {
  const base = options.apiUrl.replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? 30_000;
  const fetchFn = options.fetchFn ?? fetch;

  function headers(extra?: Record<string, string>): Record<string, string> {
    return {
      ...(options.token !== undefined && { Authorization: `Bearer ${options.token}` }),
      ...extra,
    };
  }

  async function send(
    operation: string,
    url: string,
    init: RequestInit,
    shardId?: string,
  ): Promise<Response> {
    let res: Response;
    try {
      res = await fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      throw new TransferError(`${operation} failed: ${err instanceof Error ? err.message : String(err)}`, {
        retryable: true,
        shardId,
        cause: err,
      });
    }
    if (!res.ok) {
      throw new TransferError(`${operation} failed: ${res.status} ${res.statusText}`, {
        retryable: isRetryableStatus(res.status),
        shardId,
        status: res.status,
        retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
      });
    }
    return res;
  }

  async function parseBody<T>(
    operation: string,
    res: Response,
    schema: z.ZodType<T>,
    shardId?: string,
  ): Promise<T> {
    const result = schema.safeParse(await res.json());
    if (!result.success) {
      throw new TransferError(`${operation} returned an unexpected body`, {
        retryable: false,
        shardId,
        cause: result.error,
      });
    }
    return result.data;
  }

  return {
    async beginShardTransfer(shardId, payload) {
      const res = await send(
        "Shard upload",
        `${base}/v1/shards/${encodeKey(shardId)}`,
        {
          method: "PUT",
          body: Buffer.from(payload),
          headers: headers({ "Content-Type": "application/octet-stream" }),
        },
        shardId,
      );
      const body = await parseBody("Shard upload", res, BeginResponseSchema, shardId);
      return { shardId, transferId: body.transferId, byteLength: payload.byteLength };
    },

    async confirmTransfer(handle) {
      const url = `${base}/v1/shards/${encodeKey(handle.shardId)}?transfer=${encodeURIComponent(handle.transferId)}`;
      const res = await send("Transfer status", url, { headers: headers() }, handle.shardId);
      const status = await parseBody("Transfer status", res, StatusResponseSchema, handle.shardId);
      if (!status.durable) {
        throw new TransferError(`Transfer ${handle.transferId} is not durable yet`, {
          retryable: true,
          shardId: handle.shardId,
        });
      }
      return {
        size: status.size,
        checksum: status.sha256,
        ...(status.revision !== undefined && { revision: status.revision }),
      };
    },

    async openManifest(datasetId, plan) {
      await send(
        "Manifest open",
        `${base}/v1/datasets/${encodeURIComponent(datasetId)}/manifest`,
        {
          method: "PUT",
          body: JSON.stringify({ planFingerprint: plan.fingerprint, shardCount: plan.shardCount }),
          headers: headers({ "Content-Type": "application/json" }),
        },
      );
    },

    async appendManifestEntry(datasetId, shardIndex, revision) {
      await send(
        "Manifest append",
        `${base}/v1/datasets/${encodeURIComponent(datasetId)}/manifest/entries`,
        {
          method: "POST",
          body: JSON.stringify({ shardIndex, revision }),
          headers: headers({ "Content-Type": "application/json" }),
        },
      );
    },

    async finalizeManifest(datasetId) {
      await send(
        "Manifest finalize",
        `${base}/v1/datasets/${encodeURIComponent(datasetId)}/manifest/finalize`,
        { method: "POST", headers: headers() },
      );
    },
  };
}
