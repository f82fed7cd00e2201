export {
  createRecordAssembler,
  serializeBatch,
  type EncodedBatch,
  type RecordAssembler,
  type RecordAssemblerDeps,
} from "./assembler.js";
