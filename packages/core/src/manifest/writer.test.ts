import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { initializeManifestDatabase } from "./schema.js";
import { createManifestLedger, type ManifestLedger } from "./ledger.js";
import { createManifestWriter } from "./writer.js";
import { createMemoryShardStore } from "../stores/memory.js";
import { TransferError } from "../errors/catalog.js";
import { makeMockLogger } from "../test-utils/dataset.js";

describe("ManifestWriter", () => {
  let db: Database.Database;
  let ledger: ManifestLedger;

  beforeEach(() => {
    db = initializeManifestDatabase(":memory:");
    ledger = createManifestLedger(db);
    ledger.open("arc", "fp", 3);
  });

  afterEach(() => {
    db.close();
  });

  it("appends remotely before recording in the ledger", async () => {
    const store = createMemoryShardStore({
      beforeCall: (call) => {
        if (call.operation === "append") {
          expect(ledger.read("arc")?.entries).toEqual([]);
        }
      },
    });
    const writer = createManifestWriter({ ledger, store, datasetId: "arc", logger: makeMockLogger() });

    await writer.append(1, "rev-1");

    expect(store.manifest("arc")?.entries.get(1)).toBe("rev-1");
    expect([...writer.committedIndices()]).toEqual([1]);
  });

  it("opens the remote manifest ahead of queued appends", async () => {
    const store = createMemoryShardStore();
    const writer = createManifestWriter({ ledger, store, datasetId: "arc", logger: makeMockLogger() });

    await Promise.all([writer.open({ fingerprint: "fp", shardCount: 3 }), writer.append(0, "rev-0")]);

    expect(store.calls.map((c) => c.operation)).toEqual(["open", "append"]);
    expect(store.manifest("arc")?.plan).toEqual({ fingerprint: "fp", shardCount: 3 });
    expect(store.manifest("arc")?.entries.get(0)).toBe("rev-0");
  });

  it("runs appends one at a time in arrival order", async () => {
    const order: string[] = [];
    let active = 0;
    const store = createMemoryShardStore({
      beforeCall: async (call) => {
        active += 1;
        expect(active).toBe(1);
        order.push(`start:${call.shardIndex}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(`end:${call.shardIndex}`);
        active -= 1;
      },
    });
    const writer = createManifestWriter({ ledger, store, datasetId: "arc", logger: makeMockLogger() });

    await Promise.all([writer.append(2, "r2"), writer.append(0, "r0"), writer.append(1, "r1")]);

    expect(order).toEqual(["start:2", "end:2", "start:0", "end:0", "start:1", "end:1"]);
  });

  it("does not record a commit the store rejected", async () => {
    const store = createMemoryShardStore({
      beforeCall: (call) => {
        if (call.shardIndex === 0) throw new TransferError("append refused", { retryable: true });
      },
    });
    const writer = createManifestWriter({ ledger, store, datasetId: "arc", logger: makeMockLogger() });

    await expect(writer.append(0, "r0")).rejects.toThrow("append refused");
    await writer.append(1, "r1");

    expect([...writer.committedIndices()]).toEqual([1]);
  });

  it("refuses to finalize while shards are missing", async () => {
    const store = createMemoryShardStore();
    const writer = createManifestWriter({ ledger, store, datasetId: "arc", logger: makeMockLogger() });
    await writer.append(0, "r0");

    await expect(writer.finalize()).rejects.toThrow(
      "Cannot finalize manifest for arc: shards 1, 2 are not committed",
    );
    expect(store.calls.some((c) => c.operation === "finalize")).toBe(false);
    expect(ledger.read("arc")?.status).toBe("open");
  });

  it("finalizes the store and closes the ledger", async () => {
    const store = createMemoryShardStore();
    const logger = makeMockLogger();
    const writer = createManifestWriter({ ledger, store, datasetId: "arc", logger });
    await Promise.all([writer.append(0, "r0"), writer.append(1, "r1"), writer.append(2, "r2")]);

    await writer.finalize();

    expect(store.manifest("arc")?.status).toBe("complete");
    expect(ledger.read("arc")?.status).toBe("closed");
    expect(logger.info).toHaveBeenCalledWith({ datasetId: "arc", shardCount: 3 }, "Manifest finalized");
  });
});
