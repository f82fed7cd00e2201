import { readFile as fsReadFile } from "node:fs/promises";
import {
  Binary,
  Int64,
  Table,
  Utf8,
  tableToIPC,
  vectorFromArray,
  type Vector,
} from "apache-arrow";
import type { FeatureSchema, RecordField } from "../dataset/types.js";
import { EncodingError } from "../errors/catalog.js";
import type { EntityRecord } from "../scan/types.js";

/** One shard's records encoded into the feature schema's column layout. */
export interface EncodedBatch {
  table: Table;
  rowCount: number;
  /** Sum of the blob payload lengths. */
  payloadBytes: number;
  records: readonly EntityRecord[];
}

export interface RecordAssembler {
  assemble(batch: readonly EntityRecord[]): Promise<EncodedBatch>;
}

export interface RecordAssemblerDeps {
  schema: FeatureSchema;
  /** Injectable for tests; defaults to fs.readFile. */
  readFile?: (path: string) => Promise<Uint8Array>;
}

function metadataVector(records: readonly EntityRecord[], field: RecordField): Vector {
  if (field === "sizeBytes") {
    return vectorFromArray(
      records.map((r) => BigInt(r.sizeBytes)),
      new Int64(),
    );
  }
  return vectorFromArray(
    records.map((r) => r[field]),
    new Utf8(),
  );
}

/**
 * Reads exactly the records of one batch and encodes them as an Arrow table:
 * the schema's metadata columns followed by the binary blob column. Files
 * are read one at a time; only this batch's payloads are held in memory.
 */
export function createRecordAssembler(deps: RecordAssemblerDeps): RecordAssembler {
  const read = deps.readFile ?? ((path: string) => fsReadFile(path));
  const { schema } = deps;

  return {
    async assemble(batch) {
      const payloads: Uint8Array[] = [];
      let payloadBytes = 0;

      for (const record of batch) {
        let payload: Uint8Array;
        try {
          payload = await read(record.path);
        } catch (err) {
          throw new EncodingError(record.path, err);
        }
        if (payload.byteLength !== record.sizeBytes) {
          throw new EncodingError(
            record.path,
            new Error(
              `read ${payload.byteLength} bytes, expected ${record.sizeBytes}`,
            ),
          );
        }
        payloads.push(payload);
        payloadBytes += payload.byteLength;
      }

      const columns: Record<string, Vector> = {};
      for (const column of schema.columns) {
        columns[column.name] = metadataVector(batch, column.source);
      }
      columns[schema.blobColumn] = vectorFromArray(payloads, new Binary());

      return {
        table: new Table(columns),
        rowCount: batch.length,
        payloadBytes,
        records: batch,
      };
    },
  };
}

/** Arrow IPC file format bytes for one encoded batch. */
export function serializeBatch(batch: EncodedBatch): Uint8Array {
  return tableToIPC(batch.table, "file");
}
