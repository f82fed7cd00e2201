import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import { tableFromIPC } from "apache-arrow";
import { createRecordAssembler, serializeBatch } from "./assembler.js";
import { EncodingError } from "../errors/catalog.js";
import { collectRecords, scanDataset } from "../scan/scanner.js";
import { TEST_SCHEMA, makeRecord, withTempDir, writeTree } from "../test-utils/dataset.js";

describe("createRecordAssembler", () => {
  it("encodes metadata columns and the blob column", async () => {
    await withTempDir("assemble", async (root) => {
      await writeTree(root, {
        "sub-01/ses-1/anat/sub-01_ses-1_T1w.nii.gz": "abc",
        "sub-02/anat/sub-02_T1w.nii.gz": "defgh",
      });
      const records = await collectRecords(scanDataset(root, TEST_SCHEMA));
      const assembler = createRecordAssembler({ schema: TEST_SCHEMA });

      const batch = await assembler.assemble(records);

      expect(batch.rowCount).toBe(2);
      expect(batch.payloadBytes).toBe(8);
      expect(batch.records).toBe(records);
      expect(batch.table.schema.fields.map((f) => f.name)).toEqual([
        "subject_id",
        "session_id",
        "modality",
        "relative_path",
        "size_bytes",
        "nifti",
      ]);
      expect(batch.table.getChild("subject_id")?.toArray()).toEqual(["01", "02"]);
      expect(batch.table.getChild("session_id")?.get(1)).toBeNull();
      expect(batch.table.getChild("size_bytes")?.get(1)).toBe(5n);
    });
  });

  it("round-trips through the Arrow IPC file format", async () => {
    await withTempDir("assemble", async (root) => {
      await writeTree(root, { "sub-01/ses-1/anat/sub-01_ses-1_T1w.nii.gz": "payload" });
      const records = await collectRecords(scanDataset(root, TEST_SCHEMA));
      const batch = await createRecordAssembler({ schema: TEST_SCHEMA }).assemble(records);

      const bytes = serializeBatch(batch);
      const table = tableFromIPC(bytes);

      expect(table.numRows).toBe(1);
      expect(table.getChild("relative_path")?.get(0)).toBe(
        "sub-01/ses-1/anat/sub-01_ses-1_T1w.nii.gz",
      );
      expect(new TextDecoder().decode(table.getChild("nifti")?.get(0))).toBe("payload");
    });
  });

  it("reads only the records it is given", async () => {
    const readFile = vi.fn(async (_path: string) => new Uint8Array(100));
    const assembler = createRecordAssembler({ schema: TEST_SCHEMA, readFile });
    const records = [makeRecord({ subject: "01" }), makeRecord({ subject: "02" })];

    await assembler.assemble(records);

    expect(readFile).toHaveBeenCalledTimes(2);
    expect(readFile.mock.calls.map((call) => call[0])).toEqual([
      records[0]?.path,
      records[1]?.path,
    ]);
  });

  it("fails with EncodingError naming the record on an I/O error", async () => {
    await withTempDir("assemble", async (root) => {
      const record = makeRecord({ path: join(root, "gone.nii.gz") });
      const assembler = createRecordAssembler({ schema: TEST_SCHEMA });

      const result = assembler.assemble([record]);

      await expect(result).rejects.toBeInstanceOf(EncodingError);
      await expect(assembler.assemble([record])).rejects.toMatchObject({
        recordPath: join(root, "gone.nii.gz"),
        errorCode: "ENCODING_FAILED",
      });
    });
  });

  it("fails when the file size changed since the scan", async () => {
    const assembler = createRecordAssembler({
      schema: TEST_SCHEMA,
      readFile: async () => new Uint8Array(60),
    });
    const record = makeRecord({ path: "/data/ds/x.nii.gz", sizeBytes: 100 });

    await expect(assembler.assemble([record])).rejects.toThrow(
      "Failed to encode /data/ds/x.nii.gz: read 60 bytes, expected 100",
    );
  });
});
