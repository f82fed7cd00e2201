export type {
  ManifestEntry,
  ManifestStatus,
  OpenManifestResult,
  UploadManifest,
} from "./types.js";
export { initializeManifestDatabase } from "./schema.js";
export {
  createManifestLedger,
  missingIndices,
  type ManifestLedger,
  type ManifestLedgerOptions,
} from "./ledger.js";
export {
  createManifestWriter,
  type ManifestWriter,
  type ManifestWriterDeps,
} from "./writer.js";
