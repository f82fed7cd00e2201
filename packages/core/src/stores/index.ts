export type { ManifestPlan, ShardStore, TransferHandle, TransferReceipt } from "./interface.js";
export { sha256Hex } from "./checksum.js";
export {
  createMemoryShardStore,
  type MemoryShardStore,
  type MemoryShardStoreOptions,
  type MemoryManifest,
  type StoreCall,
  type StoreOperation,
} from "./memory.js";
export {
  createLocalShardStore,
  LocalManifestSchema,
  type LocalManifest,
  type LocalShardStoreOptions,
} from "./local.js";
export {
  createHttpShardStore,
  isRetryableStatus,
  parseRetryAfter,
  type HttpShardStoreOptions,
} from "./http.js";
export { createShardStore, type ShardStoreFactoryOptions } from "./factory.js";
