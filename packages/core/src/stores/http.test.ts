import { describe, it, expect, vi, type Mock } from "vitest";
import { createHttpShardStore, isRetryableStatus, parseRetryAfter } from "./http.js";
import { TransferError } from "../errors/catalog.js";

const API_URL = "https://hub.example.org/";
const SHA = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

function jsonResponse(status: number, body: unknown, headers?: Record<string, string>): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function setup(...responses: Array<Response | Error>) {
  const fetchFn = vi.fn<typeof fetch>();
  for (const response of responses) {
    if (response instanceof Error) {
      fetchFn.mockRejectedValueOnce(response);
    } else {
      fetchFn.mockResolvedValueOnce(response);
    }
  }
  const store = createHttpShardStore({ apiUrl: API_URL, token: "test-secret", fetchFn });
  return { store, fetchFn };
}

function callAt(fetchFn: Mock<typeof fetch>, i: number) {
  const call = fetchFn.mock.calls[i];
  if (!call) throw new Error(`no fetch call ${i}`);
  const [url, init] = call;
  return { url: String(url), init: init ?? {} };
}

describe("createHttpShardStore", () => {
  it("PUTs the shard bytes with bearer auth", async () => {
    const { store, fetchFn } = setup(jsonResponse(201, { transferId: "t-1" }));

    const handle = await store.beginShardTransfer(
      "arc/data/shard-00000-of-00002.arrow",
      new Uint8Array([1, 2, 3]),
    );

    expect(handle).toEqual({
      shardId: "arc/data/shard-00000-of-00002.arrow",
      transferId: "t-1",
      byteLength: 3,
    });
    const { url, init } = callAt(fetchFn, 0);
    expect(url).toBe("https://hub.example.org/v1/shards/arc/data/shard-00000-of-00002.arrow");
    expect(init.method).toBe("PUT");
    expect(init.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Content-Type": "application/octet-stream",
    });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("returns the stored size, checksum and revision once durable", async () => {
    const { store, fetchFn } = setup(
      jsonResponse(200, { durable: true, size: 3, sha256: SHA, revision: "r-42" }),
    );

    const receipt = await store.confirmTransfer({
      shardId: "arc/data/a.arrow",
      transferId: "t 1",
      byteLength: 3,
    });

    expect(receipt).toEqual({ size: 3, checksum: SHA, revision: "r-42" });
    expect(callAt(fetchFn, 0).url).toBe(
      "https://hub.example.org/v1/shards/arc/data/a.arrow?transfer=t%201",
    );
  });

  it("omits the revision when the hub has none", async () => {
    const { store } = setup(jsonResponse(200, { durable: true, size: 3, sha256: SHA }));

    const receipt = await store.confirmTransfer({ shardId: "a", transferId: "t", byteLength: 3 });

    expect(receipt).toEqual({ size: 3, checksum: SHA });
  });

  it("treats a transfer that is not durable as retryable", async () => {
    const { store } = setup(jsonResponse(200, { durable: false, size: 0, sha256: SHA }));

    await expect(
      store.confirmTransfer({ shardId: "a", transferId: "t", byteLength: 3 }),
    ).rejects.toMatchObject({ retryable: true, message: "Transfer t is not durable yet" });
  });

  it("marks 503 retryable with Retry-After", async () => {
    const { store } = setup(jsonResponse(503, {}, { "Retry-After": "7" }));

    const err = await store.beginShardTransfer("a", new Uint8Array(1)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransferError);
    expect(err).toMatchObject({ retryable: true, retryAfterMs: 7000, details: { shardId: "a", status: 503, retryable: true } });
  });

  it("marks 403 permanent", async () => {
    const { store } = setup(jsonResponse(403, {}));

    await expect(store.beginShardTransfer("a", new Uint8Array(1))).rejects.toMatchObject({
      retryable: false,
    });
  });

  it("marks network errors retryable", async () => {
    const { store } = setup(new TypeError("fetch failed"));

    await expect(store.beginShardTransfer("a", new Uint8Array(1))).rejects.toMatchObject({
      retryable: true,
      message: "Shard upload failed: fetch failed",
    });
  });

  it("rejects a malformed body as permanent", async () => {
    const { store } = setup(jsonResponse(200, { durable: true, size: 3, sha256: "nothex" }));

    await expect(
      store.confirmTransfer({ shardId: "a", transferId: "t", byteLength: 3 }),
    ).rejects.toMatchObject({
      retryable: false,
      message: "Transfer status returned an unexpected body",
    });
  });

  it("posts manifest entries and finalize", async () => {
    const { store, fetchFn } = setup(jsonResponse(200, {}), jsonResponse(200, {}));

    await store.appendManifestEntry("arc", 3, "r-3");
    await store.finalizeManifest("arc");

    const append = callAt(fetchFn, 0);
    expect(append.url).toBe("https://hub.example.org/v1/datasets/arc/manifest/entries");
    expect(append.init.method).toBe("POST");
    expect(append.init.body).toBe(JSON.stringify({ shardIndex: 3, revision: "r-3" }));
    expect(callAt(fetchFn, 1).url).toBe(
      "https://hub.example.org/v1/datasets/arc/manifest/finalize",
    );
  });

  it("opens the manifest for a plan with a PUT", async () => {
    const { store, fetchFn } = setup(jsonResponse(200, {}));

    await store.openManifest("arc", { fingerprint: "plan-a", shardCount: 4 });

    const open = callAt(fetchFn, 0);
    expect(open.url).toBe("https://hub.example.org/v1/datasets/arc/manifest");
    expect(open.init.method).toBe("PUT");
    expect(open.init.body).toBe(JSON.stringify({ planFingerprint: "plan-a", shardCount: 4 }));
  });
});

describe("isRetryableStatus", () => {
  it("retries 408, 429 and 5xx only", () => {
    expect([408, 429, 500, 502, 503].map(isRetryableStatus)).toEqual([true, true, true, true, true]);
    expect([400, 401, 404, 409].map(isRetryableStatus)).toEqual([false, false, false, false]);
  });
});

describe("parseRetryAfter", () => {
  it("parses seconds and HTTP dates", () => {
    const now = Date.parse("2026-01-21T10:00:00Z");
    expect(parseRetryAfter("2", now)).toBe(2000);
    expect(parseRetryAfter("Wed, 21 Jan 2026 10:00:05 GMT", now)).toBe(5000);
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter("soon", now)).toBeUndefined();
  });
});
